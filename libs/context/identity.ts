/**
 * Identity Context
 * The resolved caller for exactly one request. Built from verified claims,
 * frozen on construction, discarded when the request ends.
 */

import type { Role } from '../auth/roles.js';
import type { Permission } from '../auth/permissions.js';
export type { Role, Permission };

export interface IdentityContext {
    readonly userId: string;
    readonly tenantId: string;
    readonly roles: ReadonlySet<Role>;
    readonly permissions: ReadonlySet<Permission>;
}

export function createIdentityContext(input: {
    userId: string;
    tenantId: string;
    roles: Iterable<Role>;
    permissions: Iterable<Permission>;
}): IdentityContext {
    return Object.freeze({
        userId: input.userId,
        tenantId: input.tenantId,
        roles: freezeSet(new Set(input.roles)),
        permissions: freezeSet(new Set(input.permissions))
    });
}

/**
 * A Set whose mutators throw. Object.freeze alone does not protect Set contents.
 */
export function freezeSet<T>(source: Set<T>, owner = 'IdentityContext'): ReadonlySet<T> {
    const locked = (): never => {
        throw new TypeError(`${owner} is immutable`);
    };
    source.add = locked;
    source.delete = locked;
    source.clear = locked;
    return Object.freeze(source);
}
