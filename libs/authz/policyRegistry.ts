/**
 * Policy Registry & Evaluator
 *
 * Policies are registered once at startup and read concurrently afterwards.
 * Each policy names the one capability marker it reads; the evaluator hands
 * the routine that marker and nothing else of the request.
 */

import { ADMIN_ROLE } from '../auth/roles.js';
import { IdentityContext } from '../context/identity.js';
import { TenantScope, TenantScopedLookups } from '../tenancy/tenantScope.js';
import { AuthorizableRequest, CapabilityKind, findMarker, MarkerOf } from './capabilities.js';
import { ALLOWED, PolicyOutcome } from './decision.js';

export interface PolicyContext {
    readonly identity: IdentityContext;
    readonly lookups: TenantScopedLookups;
}

export interface PolicyDefinition<K extends CapabilityKind = CapabilityKind> {
    readonly name: string;
    readonly capability: K;
    readonly evaluate: (marker: MarkerOf<K>, context: PolicyContext) => Promise<PolicyOutcome>;
}

/**
 * Outcome of one evaluation, including the wiring defects the routine
 * itself can never produce.
 */
export type PolicyEvaluation =
    | PolicyOutcome
    | { allowed: false; reason: 'PolicyNotRegistered' }
    | { allowed: false; reason: 'PolicyMismatch'; expectedCapability: CapabilityKind };

/**
 * Erased form stored in the registry. Keeps the marker lookup next to the
 * routine so the pairing K <-> MarkerOf<K> is checked where it is created.
 */
interface RegisteredPolicy {
    readonly name: string;
    readonly capability: CapabilityKind;
    run(request: AuthorizableRequest, context: PolicyContext): Promise<PolicyEvaluation>;
}

export type AnyPolicyDefinition = { [K in CapabilityKind]: PolicyDefinition<K> }[CapabilityKind];

export function definePolicy<K extends CapabilityKind>(definition: PolicyDefinition<K>): PolicyDefinition<K> {
    return Object.freeze({ ...definition });
}

function erase<K extends CapabilityKind>(definition: PolicyDefinition<K>): RegisteredPolicy {
    return Object.freeze({
        name: definition.name,
        capability: definition.capability,
        async run(request: AuthorizableRequest, context: PolicyContext): Promise<PolicyEvaluation> {
            const marker = findMarker(request, definition.capability);
            if (!marker) {
                return { allowed: false, reason: 'PolicyMismatch', expectedCapability: definition.capability };
            }
            return definition.evaluate(marker, context);
        }
    });
}

export class PolicyRegistry {
    private readonly policies: ReadonlyMap<string, RegisteredPolicy>;

    private constructor(policies: Map<string, RegisteredPolicy>) {
        this.policies = policies;
        Object.freeze(this);
    }

    static create(definitions: readonly AnyPolicyDefinition[]): PolicyRegistry {
        const policies = new Map<string, RegisteredPolicy>();
        for (const definition of definitions) {
            if (policies.has(definition.name)) {
                throw new Error(`Configuration Error: policy ${definition.name} registered twice`);
            }
            policies.set(definition.name, erasePolicy(definition));
        }
        return new PolicyRegistry(policies);
    }

    has(name: string): boolean {
        return this.policies.has(name);
    }

    capabilityOf(name: string): CapabilityKind | undefined {
        return this.policies.get(name)?.capability;
    }

    names(): string[] {
        return [...this.policies.keys()];
    }

    /**
     * Evaluate one named policy for one request.
     * Admin identities pass every registered policy without running it.
     */
    async evaluate(
        policyName: string,
        request: AuthorizableRequest,
        identity: IdentityContext,
        scope: TenantScope
    ): Promise<PolicyEvaluation> {
        const policy = this.policies.get(policyName);
        if (!policy) {
            return { allowed: false, reason: 'PolicyNotRegistered' };
        }

        if (identity.roles.has(ADMIN_ROLE)) {
            return ALLOWED;
        }

        return policy.run(request, { identity, lookups: scope.lookups });
    }
}

function erasePolicy(definition: AnyPolicyDefinition): RegisteredPolicy {
    switch (definition.capability) {
        case 'teacherScoped':
            return erase(definition);
        case 'studentScoped':
            return erase(definition);
        case 'selfScoped':
            return erase(definition);
    }
}
