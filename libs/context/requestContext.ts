import { AsyncLocalStorage } from 'node:async_hooks';
import { IdentityContext } from "./identity.js";

export interface RequestScope {
    readonly requestId: string;
    readonly identity: IdentityContext;
}

/**
 * Request Context Container
 * AsyncLocalStorage-backed for concurrent request isolation.
 *
 * Only the dispatch boundary calls run(). Everything downstream calls get().
 */

const storage = new AsyncLocalStorage<RequestScope>();

export class RequestContext {
    /**
     * Establish the identity scope for one request.
     * Supports both sync and async functions.
     */
    public static run<T>(
        scope: RequestScope,
        fn: () => Promise<T> | T
    ): Promise<T> | T {
        return storage.run(Object.freeze({ ...scope }), fn);
    }

    /**
     * FAIL-CLOSED: throws if called outside run().
     */
    public static get(): RequestScope {
        const scope = storage.getStore();
        if (!scope) {
            throw new Error("MISSING_REQUEST_CONTEXT: No identity scope established - execution denied");
        }
        return scope;
    }

    public static tryGet(): RequestScope | undefined {
        return storage.getStore();
    }
}
