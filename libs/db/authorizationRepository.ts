/**
 * PostgreSQL implementation of the authorization read contract.
 * Every statement is parameterized and filtered by tenant_id = $1.
 */

import { z } from 'zod';
import type { AuthorizationDataSource, StudentAccount } from '../tenancy/dataSource.js';
import type { Queryable, TenantDb } from './index.js';

const ExistsRow = z.object({ exists: z.boolean() });
const StudentAccountRow = z.object({ student_id: z.coerce.number(), user_id: z.string().nullable() });

async function queryExists(tx: Queryable, text: string, params: unknown[]): Promise<boolean> {
    const result = await tx.query(text, params);
    return ExistsRow.parse(result.rows[0]).exists;
}

export class PgAuthorizationDataSource implements AuthorizationDataSource {
    constructor(private readonly db: TenantDb) {}

    existsAssignment(
        tenantId: string,
        teacherId: string,
        sectionId: number,
        subjectId: number,
        signal?: AbortSignal
    ): Promise<boolean> {
        return this.db.readAsTenant(tenantId, (tx) => queryExists(
            tx,
            `SELECT EXISTS (
                SELECT 1
                FROM teacher_assignments
                WHERE tenant_id = $1
                  AND teacher_id = $2
                  AND section_id = $3
                  AND subject_id = $4
                  AND is_active = true
            ) AS exists`,
            [tenantId, teacherId, sectionId, subjectId]
        ), signal);
    }

    existsGuardianRelation(
        tenantId: string,
        guardianId: string,
        studentId: number,
        signal?: AbortSignal
    ): Promise<boolean> {
        return this.db.readAsTenant(tenantId, (tx) => queryExists(
            tx,
            `SELECT EXISTS (
                SELECT 1
                FROM student_guardians
                WHERE tenant_id = $1
                  AND guardian_user_id = $2
                  AND student_id = $3
            ) AS exists`,
            [tenantId, guardianId, studentId]
        ), signal);
    }

    existsSection(tenantId: string, sectionId: number, signal?: AbortSignal): Promise<boolean> {
        return this.db.readAsTenant(tenantId, (tx) => queryExists(
            tx,
            `SELECT EXISTS (
                SELECT 1 FROM sections WHERE tenant_id = $1 AND section_id = $2
            ) AS exists`,
            [tenantId, sectionId]
        ), signal);
    }

    existsStudent(tenantId: string, studentId: number, signal?: AbortSignal): Promise<boolean> {
        return this.db.readAsTenant(tenantId, (tx) => queryExists(
            tx,
            `SELECT EXISTS (
                SELECT 1 FROM students WHERE tenant_id = $1 AND student_id = $2
            ) AS exists`,
            [tenantId, studentId]
        ), signal);
    }

    findStudentAccount(tenantId: string, studentId: number, signal?: AbortSignal): Promise<StudentAccount | null> {
        return this.db.readAsTenant(tenantId, async (tx) => {
            const result = await tx.query(
                `SELECT student_id, user_id
                FROM students
                WHERE tenant_id = $1 AND student_id = $2
                LIMIT 1`,
                [tenantId, studentId]
            );
            if (result.rows.length === 0) {
                return null;
            }
            const row = StudentAccountRow.parse(result.rows[0]);
            return { studentId: row.student_id, userId: row.user_id };
        }, signal);
    }
}
