/**
 * Authorization Requirement Descriptors
 *
 * Static registration table: request type -> what it takes to run it.
 * Built once at startup through RequirementTableBuilder, frozen, then only read.
 *
 *   roles        OR  (any one is enough)
 *   permissions  AND (all are needed)
 *   policies     AND, evaluated in declared order
 */

import type { Role } from '../auth/roles.js';
import type { Permission } from '../auth/permissions.js';
import type { CapabilityKind } from './capabilities.js';
import { freezeSet } from '../context/identity.js';

export interface RequirementDescriptor {
    readonly requiredRoles: ReadonlySet<Role>;
    readonly requiredPermissions: ReadonlySet<Permission>;
    readonly requiredPolicies: readonly string[];
    readonly capabilities: ReadonlySet<CapabilityKind>;
}

export function isEmptyRequirement(descriptor: RequirementDescriptor): boolean {
    return descriptor.requiredRoles.size === 0
        && descriptor.requiredPermissions.size === 0
        && descriptor.requiredPolicies.length === 0;
}

export class RequirementBuilder {
    private readonly roles = new Set<Role>();
    private readonly permissions = new Set<Permission>();
    private readonly policies: string[] = [];
    private readonly capabilities = new Set<CapabilityKind>();

    /** Any one of these roles satisfies the role check. */
    anyRole(...roles: Role[]): this {
        roles.forEach((role) => this.roles.add(role));
        return this;
    }

    /** Every one of these permissions is required. */
    allPermissions(...permissions: Permission[]): this {
        permissions.forEach((permission) => this.permissions.add(permission));
        return this;
    }

    /** Appended in order; evaluation follows this order. */
    policy(...names: string[]): this {
        for (const name of names) {
            if (!this.policies.includes(name)) {
                this.policies.push(name);
            }
        }
        return this;
    }

    exposes(...kinds: CapabilityKind[]): this {
        kinds.forEach((kind) => this.capabilities.add(kind));
        return this;
    }

    build(): RequirementDescriptor {
        return Object.freeze({
            requiredRoles: freezeSet(new Set(this.roles), 'RequirementDescriptor'),
            requiredPermissions: freezeSet(new Set(this.permissions), 'RequirementDescriptor'),
            requiredPolicies: Object.freeze([...this.policies]),
            capabilities: freezeSet(new Set(this.capabilities), 'RequirementDescriptor')
        });
    }
}

export class RequirementTable {
    private constructor(private readonly entries: ReadonlyMap<string, RequirementDescriptor>) {
        Object.freeze(this);
    }

    static fromEntries(entries: Iterable<readonly [string, RequirementDescriptor]>): RequirementTable {
        return new RequirementTable(new Map(entries));
    }

    get(requestType: string): RequirementDescriptor | undefined {
        return this.entries.get(requestType);
    }

    entriesList(): Array<[string, RequirementDescriptor]> {
        return [...this.entries.entries()];
    }

    get size(): number {
        return this.entries.size;
    }
}

export class RequirementTableBuilder {
    private readonly entries = new Map<string, RequirementDescriptor>();
    private sealed = false;

    register(requestType: string, configure: (requirement: RequirementBuilder) => RequirementBuilder = (r) => r): this {
        if (this.sealed) {
            throw new Error('Requirement table already built; registrations are startup-only');
        }
        if (this.entries.has(requestType)) {
            throw new Error(`Configuration Error: request type ${requestType} registered twice`);
        }
        this.entries.set(requestType, configure(new RequirementBuilder()).build());
        return this;
    }

    build(): RequirementTable {
        this.sealed = true;
        return RequirementTable.fromEntries(this.entries);
    }
}
