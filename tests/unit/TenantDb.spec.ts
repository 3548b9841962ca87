import { describe, it, mock } from 'node:test';
import assert from 'node:assert';
import { createTenantDb, ReleasableClient } from '../../libs/db/index.js';
import { PgAuthorizationDataSource } from '../../libs/db/authorizationRepository.js';
import { PgPermissionStore } from '../../libs/db/permissionRepository.js';
import { AppError } from '../../libs/errors/sanitizer.js';

interface RecordedQuery {
    text: string;
    params?: unknown[];
}

interface FakeOptions {
    /** Rows returned for statements other than the transaction plumbing. */
    rows?: unknown[];
    /** Simulate a session where set_config does not stick. */
    dropTenantSetting?: boolean;
    failRollback?: boolean;
}

function fakePool(options: FakeOptions = {}) {
    const queries: RecordedQuery[] = [];
    let currentTenant: string | null = null;
    const release = mock.fn((_err?: Error | boolean) => undefined);

    const client: ReleasableClient = {
        query: async (text, params) => {
            queries.push({ text, params });
            if (text.startsWith("SELECT set_config('statement_timeout'")) {
                return { rows: [{ set_config: params?.[0] }] };
            }
            if (text.startsWith("SELECT set_config('app.current_tenant'")) {
                const value = params?.[0];
                currentTenant = !options.dropTenantSetting && typeof value === 'string' ? value : null;
                return { rows: [{ set_config: currentTenant }] };
            }
            if (text.startsWith('SELECT current_setting')) {
                return { rows: [{ tenant: currentTenant }] };
            }
            if (text === 'ROLLBACK' && options.failRollback) {
                throw new Error('connection reset');
            }
            if (text === 'BEGIN READ ONLY' || text === 'COMMIT' || text === 'ROLLBACK') {
                return { rows: [] };
            }
            return { rows: options.rows ?? [] };
        },
        release
    };
    const connect = mock.fn(async () => client);

    return { connections: { connect }, queries, release, connect };
}

const statements = (queries: RecordedQuery[]) => queries.map((query) => query.text.split('\n')[0]?.trim());

describe('Tenant-bound database access', () => {
    it('wraps a read in a read-only transaction bound to the tenant', async () => {
        const pool = fakePool({ rows: [{ exists: true }] });
        const source = new PgAuthorizationDataSource(createTenantDb(pool.connections));

        const assigned = await source.existsAssignment('tenant-a', 'teacher-1', 10, 3);

        assert.strictEqual(assigned, true);
        assert.deepStrictEqual(statements(pool.queries), [
            'BEGIN READ ONLY',
            "SELECT set_config('app.current_tenant', $1, true)",
            "SELECT current_setting('app.current_tenant', true) AS tenant",
            'SELECT EXISTS (',
            'COMMIT'
        ]);
        assert.deepStrictEqual(pool.queries[1]?.params, ['tenant-a']);
        assert.deepStrictEqual(pool.queries[3]?.params, ['tenant-a', 'teacher-1', 10, 3]);
        assert.deepStrictEqual(pool.release.mock.calls[0]?.arguments, []);
    });

    it('filters every authorization statement by tenant_id = $1', async () => {
        const pool = fakePool({ rows: [{ exists: false }] });
        const source = new PgAuthorizationDataSource(createTenantDb(pool.connections));

        await source.existsAssignment('tenant-a', 'teacher-1', 10, 3);
        await source.existsGuardianRelation('tenant-a', 'guardian-1', 100);
        await source.existsSection('tenant-a', 10);
        await source.existsStudent('tenant-a', 100);

        const reads = pool.queries.filter((query) => query.text.includes('SELECT EXISTS'));
        assert.strictEqual(reads.length, 4);
        for (const read of reads) {
            assert.match(read.text, /WHERE tenant_id = \$1/);
            assert.strictEqual(read.params?.[0], 'tenant-a');
        }
    });

    it('maps a missing student row to null', async () => {
        const pool = fakePool({ rows: [] });
        const source = new PgAuthorizationDataSource(createTenantDb(pool.connections));

        assert.strictEqual(await source.findStudentAccount('tenant-a', 100), null);
    });

    it('returns a student together with its linked user', async () => {
        const pool = fakePool({ rows: [{ student_id: 100, user_id: 'student-100' }] });
        const source = new PgAuthorizationDataSource(createTenantDb(pool.connections));

        assert.deepStrictEqual(await source.findStudentAccount('tenant-a', 100), { studentId: 100, userId: 'student-100' });
        assert.deepStrictEqual(pool.queries[3]?.params, ['tenant-a', 100]);
    });

    it('reads permissions per user and tenant', async () => {
        const pool = fakePool({ rows: [{ permission: 'Grades.List' }, { permission: 'Payment.Get' }] });
        const store = new PgPermissionStore(createTenantDb(pool.connections));

        const permissions = await store.findPermissions('user-1', 'tenant-a');

        assert.deepStrictEqual(permissions, ['Grades.List', 'Payment.Get']);
        assert.deepStrictEqual(pool.queries[3]?.params, ['tenant-a', 'user-1']);
    });

    it('rolls back and hides the cause when the tenant binding does not hold', async () => {
        const pool = fakePool({ dropTenantSetting: true, rows: [{ exists: true }] });
        const source = new PgAuthorizationDataSource(createTenantDb(pool.connections));

        await assert.rejects(
            source.existsSection('tenant-a', 10),
            (error: unknown) =>
                error instanceof AppError &&
                error.publicMessage === 'An internal system error occurred (DatabaseLayer:TenantReadFailed)'
        );
        assert.strictEqual(statements(pool.queries).includes('SELECT EXISTS ('), false);
        assert.strictEqual(statements(pool.queries).at(-1), 'ROLLBACK');
        assert.strictEqual(pool.release.mock.callCount(), 1);
    });

    it('destroys the client when the rollback fails', async () => {
        const pool = fakePool({ failRollback: true, rows: [{ unexpected: 1 }] });
        const source = new PgAuthorizationDataSource(createTenantDb(pool.connections));

        await assert.rejects(source.existsStudent('tenant-a', 100), AppError);
        assert.ok(pool.release.mock.calls[0]?.arguments[0] instanceof Error);
    });

    it('refuses an empty tenant id without touching the pool', async () => {
        const pool = fakePool();
        const db = createTenantDb(pool.connections);

        await assert.rejects(db.readAsTenant('  ', async () => true), /Tenant id is required/);
        assert.strictEqual(pool.connect.mock.callCount(), 0);
    });

    it('refuses nested tenant transactions', async () => {
        const pool = fakePool();
        const db = createTenantDb(pool.connections);

        await assert.rejects(
            db.readAsTenant('tenant-a', () => db.readAsTenant('tenant-a', async () => true)),
            AppError
        );
        assert.strictEqual(pool.connect.mock.callCount(), 1);
    });

    it('does not connect once the signal is aborted', async () => {
        const pool = fakePool();
        const db = createTenantDb(pool.connections);
        const controller = new AbortController();
        controller.abort();

        await assert.rejects(db.readAsTenant('tenant-a', async () => true, controller.signal), { name: 'AbortError' });
        assert.strictEqual(pool.connect.mock.callCount(), 0);
    });

    it('rejects a hung read on abort and destroys the client', async () => {
        const pool = fakePool();
        const db = createTenantDb(pool.connections);
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 10);

        await assert.rejects(
            db.readAsTenant('tenant-a', () => new Promise<boolean>(() => undefined), controller.signal),
            { name: 'AbortError' }
        );
        assert.strictEqual(statements(pool.queries).includes('ROLLBACK'), false);
        assert.strictEqual(pool.release.mock.callCount(), 1);
        assert.ok(pool.release.mock.calls[0]?.arguments[0] instanceof Error);
    });

    it('sets a local statement timeout when configured', async () => {
        const pool = fakePool({ rows: [{ exists: true }] });
        const source = new PgAuthorizationDataSource(createTenantDb(pool.connections, { statementTimeoutMs: 2500 }));

        await source.existsSection('tenant-a', 10);

        assert.deepStrictEqual(statements(pool.queries).slice(0, 3), [
            'BEGIN READ ONLY',
            "SELECT set_config('statement_timeout', $1, true)",
            "SELECT set_config('app.current_tenant', $1, true)"
        ]);
        assert.deepStrictEqual(pool.queries[1]?.params, ['2500']);
        assert.deepStrictEqual(pool.queries[2]?.params, ['tenant-a']);
    });
});
