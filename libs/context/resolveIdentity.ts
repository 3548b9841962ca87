/**
 * Identity Context Resolution
 *
 * Shapes verified claims into an IdentityContext. Signature checks belong to
 * the token verifier; this step only trusts what it is handed and fails
 * closed when the tenant or subject anchor is missing.
 */

import { logger } from '../logging/logger.js';
import { isRole, Role } from '../auth/roles.js';
import { isPermission, Permission } from '../auth/permissions.js';
import { VerifiedClaimsSchema } from '../validation/claimsSchema.js';
import { createIdentityContext, IdentityContext } from './identity.js';

/** Permission lookup keyed by (subject, tenant). */
export interface PermissionStore {
    findPermissions(subjectId: string, tenantId: string, signal?: AbortSignal): Promise<readonly string[]>;
}

/**
 * Where granted permissions come from.
 * `store`: the permission store only; permissions embedded in the token are ignored.
 * `claims`: the token's list when it carries one, the store otherwise.
 */
export type PermissionSource = 'claims' | 'store';

export type IdentityResolutionResult =
    | { success: true; identity: IdentityContext }
    | { success: false; reason: 'Unauthenticated'; details: string };

export interface ResolveIdentityOptions {
    readonly permissionStore?: PermissionStore;
    /** Defaults to `store` when a store is given, `claims` otherwise. */
    readonly permissionSource?: PermissionSource;
    readonly signal?: AbortSignal;
}

export async function resolveIdentity(
    claims: unknown,
    options: ResolveIdentityOptions = {}
): Promise<IdentityResolutionResult> {
    const parsed = VerifiedClaimsSchema.safeParse(claims);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || 'claims'}: ${issue.message}`)
            .join('; ');
        logger.warn({ details }, 'Identity resolution rejected claims');
        return { success: false, reason: 'Unauthenticated', details };
    }

    const { sub, tenant_id: tenantId } = parsed.data;
    const roles = keepKnown(parsed.data.roles, isRole, 'role', sub);

    const permissions = keepKnown(
        await grantedPermissions(sub, tenantId, parsed.data.permissions, options),
        isPermission,
        'permission',
        sub
    );

    return {
        success: true,
        identity: createIdentityContext({ userId: sub, tenantId, roles, permissions })
    };
}

async function grantedPermissions(
    subjectId: string,
    tenantId: string,
    claimed: readonly string[] | undefined,
    options: ResolveIdentityOptions
): Promise<readonly string[]> {
    const { permissionStore, signal } = options;
    const source = options.permissionSource ?? (permissionStore ? 'store' : 'claims');

    if (source === 'store') {
        if (claimed !== undefined && claimed.length > 0) {
            logger.warn({ subjectId, tenantId }, 'Ignoring permissions embedded in token; permission source is the store');
        }
        if (!permissionStore) {
            logger.error({ subjectId, tenantId }, 'Permission source is the store but no store is configured');
            return [];
        }
        return permissionStore.findPermissions(subjectId, tenantId, signal);
    }

    if (claimed !== undefined) {
        return claimed;
    }
    return permissionStore ? permissionStore.findPermissions(subjectId, tenantId, signal) : [];
}

function keepKnown<T extends Role | Permission>(
    values: readonly string[],
    guard: (value: string) => value is T,
    kind: 'role' | 'permission',
    subjectId: string
): T[] {
    const known: T[] = [];
    for (const raw of values) {
        const value = raw.trim();
        if (guard(value)) {
            known.push(value);
        } else {
            logger.warn({ subjectId, [kind]: value }, `Dropping unknown ${kind} claim`);
        }
    }
    return known;
}
