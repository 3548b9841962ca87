/**
 * Request Dispatcher
 *
 * claims -> IdentityContext -> authorization pipeline -> handler.
 * The handler runs if and only if the pipeline allows the request.
 * Each dispatch owns its own identity, tenant scope and abort signal.
 */

import crypto from 'crypto';
import { getContextLogger, Logger } from '../logging/logger.js';
import { AuthorizableRequest } from '../authz/capabilities.js';
import { AuthorizationDenial } from '../authz/decision.js';
import { AuthorizationPipeline } from '../authz/pipeline.js';
import { IdentityContext } from '../context/identity.js';
import { RequestContext } from '../context/requestContext.js';
import { PermissionSource, PermissionStore, resolveIdentity } from '../context/resolveIdentity.js';
import { AuthorizationCancelledError } from '../errors/authorizationErrors.js';
import { AppError } from '../errors/sanitizer.js';
import { AuthorizationDataSource } from '../tenancy/dataSource.js';
import { TenantScope } from '../tenancy/tenantScope.js';

export interface HandlerContext {
    readonly requestId: string;
    readonly identity: IdentityContext;
    readonly tenant: TenantScope;
    readonly signal: AbortSignal;
    readonly log: Logger;
}

export type RequestHandler<TRequest, TResult = unknown> = (
    request: TRequest,
    context: HandlerContext
) => Promise<TResult>;

export type DispatchFailure =
    | { reason: 'Unauthenticated'; details: string }
    | AuthorizationDenial;

export type DispatchResult<T = unknown> =
    | { ok: true; requestId: string; value: T }
    | { ok: false; requestId: string; failure: DispatchFailure };

export interface DispatcherDeps {
    readonly pipeline: AuthorizationPipeline;
    readonly dataSource: AuthorizationDataSource;
    readonly permissionStore?: PermissionStore;
    readonly permissionSource?: PermissionSource;
    /** Upper bound for identity resolution + authorization + handler. */
    readonly timeoutMs?: number;
}

export interface DispatchOptions {
    readonly requestId?: string;
    readonly signal?: AbortSignal;
}

type ErasedHandler<TRequest> = (request: TRequest, context: HandlerContext) => Promise<unknown>;

export class RequestDispatcher<TRequest extends AuthorizableRequest> {
    private readonly handlers = new Map<string, ErasedHandler<TRequest>>();

    constructor(private readonly deps: DispatcherDeps) {}

    register<K extends TRequest['requestType']>(
        requestType: K,
        handler: RequestHandler<Extract<TRequest, { requestType: K }>>
    ): this {
        if (this.handlers.has(requestType)) {
            throw new Error(`Configuration Error: handler for ${requestType} registered twice`);
        }
        const matches = (request: TRequest): request is Extract<TRequest, { requestType: K }> =>
            request.requestType === requestType;

        this.handlers.set(requestType, async (request, context) => {
            if (!matches(request)) {
                throw new AppError('Request routed to the wrong handler', { requestType, received: request.requestType }, 'CONFIG');
            }
            return handler(request, context);
        });
        return this;
    }

    hasHandler(requestType: string): boolean {
        return this.handlers.has(requestType);
    }

    async dispatch(request: TRequest, claims: unknown, options: DispatchOptions = {}): Promise<DispatchResult> {
        const requestId = options.requestId ?? crypto.randomUUID();
        const { signal, dispose } = this.linkSignal(options.signal);

        try {
            const resolution = await resolveIdentity(claims, {
                permissionStore: this.deps.permissionStore,
                permissionSource: this.deps.permissionSource,
                signal
            });
            if (!resolution.success) {
                return { ok: false, requestId, failure: { reason: 'Unauthenticated', details: resolution.details } };
            }
            const { identity } = resolution;

            return await RequestContext.run({ requestId, identity }, async (): Promise<DispatchResult> => {
                const decision = await this.deps.pipeline.authorize(request, identity, { signal, requestId });
                if (!decision.allowed) {
                    return { ok: false, requestId, failure: decision };
                }

                const handler = this.handlers.get(request.requestType);
                if (!handler) {
                    throw new AppError('No handler registered for request type', { requestType: request.requestType }, 'CONFIG');
                }

                const value = await handler(request, {
                    requestId,
                    identity,
                    tenant: TenantScope.forIdentity(identity, this.deps.dataSource, signal),
                    signal,
                    log: getContextLogger(identity, requestId)
                });
                signal.throwIfAborted();
                return { ok: true, requestId, value };
            });
        } catch (error) {
            if (signal.aborted && !(error instanceof AuthorizationCancelledError)) {
                throw new AuthorizationCancelledError(request.requestType, error);
            }
            throw error;
        } finally {
            dispose();
        }
    }

    /**
     * One signal per dispatch that fires on caller cancellation or timeout.
     */
    private linkSignal(external?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
        const controller = new AbortController();
        const onAbort = () => controller.abort(external?.reason);

        if (external?.aborted) {
            controller.abort(external.reason);
        } else {
            external?.addEventListener('abort', onAbort, { once: true });
        }

        const timer = this.deps.timeoutMs
            ? setTimeout(() => controller.abort(new Error(`Request timed out after ${this.deps.timeoutMs}ms`)), this.deps.timeoutMs)
            : undefined;

        return {
            signal: controller.signal,
            dispose: () => {
                if (timer) clearTimeout(timer);
                external?.removeEventListener('abort', onAbort);
            }
        };
    }
}
