import { describe, it } from 'node:test';
import assert from 'node:assert';
import { RequestContext, RequestScope } from '../../libs/context/requestContext.js';
import { identity } from '../helpers/fixtures.js';

const scopeA: RequestScope = {
    requestId: 'req-A',
    identity: identity({ userId: 'user-A', tenantId: 'tenant-1' })
};

const scopeB: RequestScope = {
    requestId: 'req-B',
    identity: identity({ userId: 'user-B', tenantId: 'tenant-2' })
};

describe('RequestContext', () => {
    it('should throw when accessing context outside run()', () => {
        assert.throws(() => RequestContext.get(), /MISSING_REQUEST_CONTEXT/);
        assert.strictEqual(RequestContext.tryGet(), undefined);
    });

    it('should return context inside run()', () => {
        const result = RequestContext.run(scopeA, () => {
            const ctx = RequestContext.get();
            assert.deepStrictEqual(ctx, scopeA);
            return 'success';
        });
        assert.strictEqual(result, 'success');
    });

    it('should hand out a frozen copy of the scope', () => {
        RequestContext.run(scopeA, () => {
            const ctx = RequestContext.get();
            assert.notStrictEqual(ctx, scopeA);
            assert.ok(Object.isFrozen(ctx));
            assert.strictEqual(ctx.identity, scopeA.identity);
        });
    });

    it('should maintain isolation between concurrent async requests', async () => {
        const flowA = RequestContext.run(scopeA, async () => {
            assert.strictEqual(RequestContext.get().requestId, 'req-A');
            await new Promise(resolve => setTimeout(resolve, 30));
            assert.strictEqual(RequestContext.get().identity.tenantId, 'tenant-1');
            return 'A';
        });

        const flowB = RequestContext.run(scopeB, async () => {
            assert.strictEqual(RequestContext.get().requestId, 'req-B');
            await new Promise(resolve => setTimeout(resolve, 10));
            assert.strictEqual(RequestContext.get().identity.tenantId, 'tenant-2');
            return 'B';
        });

        const [resA, resB] = await Promise.all([flowA, flowB]);
        assert.strictEqual(resA, 'A');
        assert.strictEqual(resB, 'B');
    });

    it('should not leak the scope after run() returns', async () => {
        await RequestContext.run(scopeA, async () => undefined);
        assert.strictEqual(RequestContext.tryGet(), undefined);
    });
});
