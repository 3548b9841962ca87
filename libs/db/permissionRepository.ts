import { z } from 'zod';
import type { PermissionStore } from '../context/resolveIdentity.js';
import type { TenantDb } from './index.js';

const PermissionRow = z.object({ permission: z.string() });

/**
 * Per-tenant permission assignments, used when tokens do not embed them.
 */
export class PgPermissionStore implements PermissionStore {
    constructor(private readonly db: TenantDb) {}

    findPermissions(subjectId: string, tenantId: string, signal?: AbortSignal): Promise<readonly string[]> {
        return this.db.readAsTenant(tenantId, async (tx) => {
            const result = await tx.query(
                `SELECT DISTINCT permission
                FROM user_permissions
                WHERE tenant_id = $1 AND user_id = $2
                ORDER BY permission`,
                [tenantId, subjectId]
            );
            return result.rows.map((row) => PermissionRow.parse(row).permission);
        }, signal);
    }
}
