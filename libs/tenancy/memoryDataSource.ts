import type { PermissionStore } from '../context/resolveIdentity.js';
import type { AuthorizationDataSource, StudentAccount } from './dataSource.js';

export type AssignmentRow = {
    tenantId: string;
    teacherId: string;
    sectionId: number;
    subjectId: number;
    active: boolean;
};

export type GuardianRow = {
    tenantId: string;
    guardianId: string;
    studentId: number;
};

export type StudentRow = {
    tenantId: string;
    studentId: number;
    userId: string | null;
};

export type SectionRow = {
    tenantId: string;
    sectionId: number;
};

export type UserPermissionRow = {
    tenantId: string;
    userId: string;
    permission: string;
};

export type MemorySeed = {
    assignments?: AssignmentRow[];
    guardians?: GuardianRow[];
    students?: StudentRow[];
    sections?: SectionRow[];
    permissions?: UserPermissionRow[];
};

/**
 * In-process stand-in for the PostgreSQL stores. Same tenant semantics:
 * every read is filtered by tenant first.
 */
export class MemoryAuthorizationStore implements AuthorizationDataSource, PermissionStore {
    private readonly assignments: AssignmentRow[];
    private readonly guardians: GuardianRow[];
    private readonly students: StudentRow[];
    private readonly sections: SectionRow[];
    private readonly permissions: UserPermissionRow[];

    constructor(seed: MemorySeed = {}) {
        this.assignments = [...(seed.assignments ?? [])];
        this.guardians = [...(seed.guardians ?? [])];
        this.students = [...(seed.students ?? [])];
        this.sections = [...(seed.sections ?? [])];
        this.permissions = [...(seed.permissions ?? [])];
    }

    async existsAssignment(tenantId: string, teacherId: string, sectionId: number, subjectId: number, signal?: AbortSignal): Promise<boolean> {
        signal?.throwIfAborted();
        return this.assignments.some(
            (row) =>
                row.tenantId === tenantId &&
                row.active &&
                row.teacherId === teacherId &&
                row.sectionId === sectionId &&
                row.subjectId === subjectId
        );
    }

    async existsGuardianRelation(tenantId: string, guardianId: string, studentId: number, signal?: AbortSignal): Promise<boolean> {
        signal?.throwIfAborted();
        return this.guardians.some(
            (row) => row.tenantId === tenantId && row.guardianId === guardianId && row.studentId === studentId
        );
    }

    async existsSection(tenantId: string, sectionId: number, signal?: AbortSignal): Promise<boolean> {
        signal?.throwIfAborted();
        return this.sections.some((row) => row.tenantId === tenantId && row.sectionId === sectionId);
    }

    async existsStudent(tenantId: string, studentId: number, signal?: AbortSignal): Promise<boolean> {
        signal?.throwIfAborted();
        return this.students.some((row) => row.tenantId === tenantId && row.studentId === studentId);
    }

    async findStudentAccount(tenantId: string, studentId: number, signal?: AbortSignal): Promise<StudentAccount | null> {
        signal?.throwIfAborted();
        const row = this.students.find((candidate) => candidate.tenantId === tenantId && candidate.studentId === studentId);
        return row ? { studentId: row.studentId, userId: row.userId } : null;
    }

    async findPermissions(subjectId: string, tenantId: string, signal?: AbortSignal): Promise<readonly string[]> {
        signal?.throwIfAborted();
        return this.permissions
            .filter((row) => row.tenantId === tenantId && row.userId === subjectId)
            .map((row) => row.permission);
    }
}
