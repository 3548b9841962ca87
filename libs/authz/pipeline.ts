/**
 * Authorization Pipeline Stage
 *
 * Order is fixed and short-circuiting:
 * 1. Requirement lookup (none / empty -> allowed)
 * 2. Roles       (OR)
 * 3. Permissions (AND)
 * 4. Policies    (AND, declared order, first failure wins)
 *
 * No writes, no state kept between calls. Policy lookups suspend; many
 * authorizations may be in flight at once.
 */

import { logger } from '../logging/logger.js';
import type { Permission } from '../auth/permissions.js';
import { IdentityContext } from '../context/identity.js';
import { AuthorizationCancelledError } from '../errors/authorizationErrors.js';
import { AuthorizationDataSource } from '../tenancy/dataSource.js';
import { TenantScope } from '../tenancy/tenantScope.js';
import { AuthorizableRequest } from './capabilities.js';
import { ALLOWED, AuthorizationDecision, AuthorizationDenial, classifyDenial } from './decision.js';
import { PolicyEvaluation, PolicyRegistry } from './policyRegistry.js';
import { isEmptyRequirement, RequirementTable } from './requirements.js';

export interface AuthorizationPipelineDeps {
    readonly requirements: RequirementTable;
    readonly policies: PolicyRegistry;
    readonly dataSource: AuthorizationDataSource;
}

export interface AuthorizeOptions {
    readonly signal?: AbortSignal;
    readonly requestId?: string;
}

export class AuthorizationPipeline {
    constructor(private readonly deps: AuthorizationPipelineDeps) {
        Object.freeze(this);
    }

    async authorize(
        request: AuthorizableRequest,
        identity: IdentityContext,
        options: AuthorizeOptions = {}
    ): Promise<AuthorizationDecision> {
        const { signal } = options;
        const { requestType } = request;
        const log = logger.child({ requestId: options.requestId, requestType, userId: identity.userId, tenantId: identity.tenantId });

        this.checkCancelled(requestType, signal);

        const descriptor = this.deps.requirements.get(requestType);
        if (!descriptor || isEmptyRequirement(descriptor)) {
            log.debug('Authorization passed (no requirements)');
            return ALLOWED;
        }

        // Roles: OR
        if (descriptor.requiredRoles.size > 0) {
            const hasAnyRole = [...descriptor.requiredRoles].some((role) => identity.roles.has(role));
            if (!hasAnyRole) {
                return this.report(log, { allowed: false, reason: 'RoleDenied', requiredRoles: [...descriptor.requiredRoles] });
            }
        }

        // Permissions: AND
        if (descriptor.requiredPermissions.size > 0) {
            const missing: Permission[] = [...descriptor.requiredPermissions].filter((p) => !identity.permissions.has(p));
            if (missing.length > 0) {
                return this.report(log, { allowed: false, reason: 'PermissionDenied', missingPermissions: missing });
            }
        }

        // Policies: AND, in order
        const scope = TenantScope.forIdentity(identity, this.deps.dataSource, signal);
        for (const policy of descriptor.requiredPolicies) {
            this.checkCancelled(requestType, signal);

            let outcome: PolicyEvaluation;
            try {
                outcome = await this.deps.policies.evaluate(policy, request, identity, scope);
            } catch (error) {
                if (signal?.aborted) {
                    throw new AuthorizationCancelledError(requestType, error);
                }
                throw error;
            }
            this.checkCancelled(requestType, signal);

            if (outcome.allowed) {
                continue;
            }
            switch (outcome.reason) {
                case 'PolicyMismatch':
                    return this.report(log, { allowed: false, reason: 'PolicyMismatch', policy, expectedCapability: outcome.expectedCapability });
                case 'PolicyNotRegistered':
                    return this.report(log, { allowed: false, reason: 'PolicyNotRegistered', policy });
                default:
                    return this.report(log, { allowed: false, reason: outcome.reason, policy });
            }
        }

        log.debug({ policies: descriptor.requiredPolicies }, 'Authorization passed');
        return ALLOWED;
    }

    private report(log: typeof logger, decision: AuthorizationDenial): AuthorizationDenial {
        if (classifyDenial(decision.reason) === 'configuration') {
            log.error({ decision }, 'Authorization wiring defect');
        } else {
            log.warn({ decision }, 'Authorization denied');
        }
        return decision;
    }

    private checkCancelled(requestType: string, signal: AbortSignal | undefined): void {
        if (signal?.aborted) {
            throw new AuthorizationCancelledError(requestType, signal.reason);
        }
    }
}
