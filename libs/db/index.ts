import { AsyncLocalStorage } from 'node:async_hooks';
import { z } from 'zod';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import { untilAborted } from '../tenancy/abortable.js';

export type Queryable = {
    query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
};

export type ReleasableClient = Queryable & {
    release(err?: Error | boolean): void;
};

export type ConnectionSource = {
    connect(): Promise<ReleasableClient>;
};

const transactionContext = new AsyncLocalStorage<{ inTx: boolean }>();

function releaseClient(client: ReleasableClient, forceDestroy: boolean, context: string): void {
    try {
        if (forceDestroy) {
            client.release(new Error(`[DB] Forcing client destroy after ${context}`));
        } else {
            client.release();
        }
    } catch (error) {
        logger.error({ error }, `[DB] Failed to release client during ${context}`);
    }
}

const TenantSettingRow = z.object({ tenant: z.string().nullable() });

async function verifyTenant(client: Queryable, tenantId: string): Promise<void> {
    const check = await client.query("SELECT current_setting('app.current_tenant', true) AS tenant");
    const parsed = TenantSettingRow.safeParse(check.rows[0]);
    const current = parsed.success ? parsed.data.tenant : null;
    if (current !== tenantId) {
        throw new Error(`CRITICAL: Tenant binding failure. Target: ${tenantId}, Actual: ${String(current)}`);
    }
}

export type TenantDb = ReturnType<typeof createTenantDb>;

export type TenantDbOptions = {
    /** Applied with SET LOCAL semantics to every tenant read. */
    statementTimeoutMs?: number;
};

/**
 * Tenant-bound database access.
 *
 * Every read runs in a read-only transaction with `app.current_tenant` set
 * locally, so row-level security sees the same tenant the query filters on.
 * Statements still carry an explicit `tenant_id = $1` predicate.
 *
 * An abort rejects the read at once. The client may still be mid-query at
 * that point, so it is destroyed rather than returned to the pool.
 */
export function createTenantDb(connections: ConnectionSource, options: TenantDbOptions = {}) {
    const { statementTimeoutMs } = options;
    return {
        readAsTenant: async <T>(
            tenantId: string,
            callback: (tx: Queryable) => Promise<T>,
            signal?: AbortSignal
        ): Promise<T> => {
            if (!tenantId.trim()) {
                throw new Error('Tenant id is required for tenant-scoped reads');
            }
            if (transactionContext.getStore()?.inTx) {
                throw new Error('Nested transaction detected: readAsTenant cannot be invoked within an active transaction.');
            }
            signal?.throwIfAborted();

            const client = await connections.connect();
            let forceDestroy = false;
            try {
                return await transactionContext.run({ inTx: true }, async () => {
                    const work = async (): Promise<T> => {
                        await client.query('BEGIN READ ONLY');
                        if (statementTimeoutMs !== undefined) {
                            await client.query("SELECT set_config('statement_timeout', $1, true)", [String(statementTimeoutMs)]);
                        }
                        await client.query("SELECT set_config('app.current_tenant', $1, true)", [tenantId]);
                        await verifyTenant(client, tenantId);

                        const tx: Queryable = { query: (text, params) => client.query(text, params) };
                        const result = await callback(tx);

                        await client.query('COMMIT');
                        return result;
                    };

                    try {
                        return await untilAborted(work(), signal);
                    } catch (error) {
                        if (signal?.aborted) {
                            forceDestroy = true;
                            throw error;
                        }
                        try {
                            await client.query('ROLLBACK');
                        } catch (rollbackError) {
                            forceDestroy = true;
                            logger.error({ error: rollbackError }, '[DB] Failed to rollback transaction');
                        }
                        throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:TenantReadFailed');
                    }
                });
            } finally {
                releaseClient(client, forceDestroy, 'readAsTenant');
            }
        }
    };
}
