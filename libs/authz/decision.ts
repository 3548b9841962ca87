import type { Role } from '../auth/roles.js';
import type { Permission } from '../auth/permissions.js';
import type { CapabilityKind } from './capabilities.js';

/** Expected access-control outcomes. Never retried. */
type AccessDenyReason =
    | 'RoleDenied'
    | 'PermissionDenied'
    | 'NotAssigned'
    | 'NotSelf'
    | 'NotGuardian';

/** Tenant-boundary or missing-resource denial. Both share one shape. */
type NotFoundReason = 'NotFound';

/** Wiring defects. Not the caller's fault. */
type ConfigurationDefectReason =
    | 'PolicyNotRegistered'
    | 'PolicyMismatch';

export type PolicyDenyReason = 'NotAssigned' | 'NotSelf' | 'NotGuardian' | NotFoundReason;

export type AuthorizationDenyReason = AccessDenyReason | NotFoundReason | ConfigurationDefectReason;

export type AuthorizationFailure =
    | { reason: 'RoleDenied'; requiredRoles: readonly Role[] }
    | { reason: 'PermissionDenied'; missingPermissions: readonly Permission[] }
    | { reason: PolicyDenyReason; policy: string }
    | { reason: 'PolicyNotRegistered'; policy: string }
    | { reason: 'PolicyMismatch'; policy: string; expectedCapability: CapabilityKind };

export type AuthorizationDecision =
    | { allowed: true }
    | ({ allowed: false } & AuthorizationFailure);

export type AuthorizationDenial = AuthorizationDecision & { allowed: false };

export type PolicyOutcome =
    | { allowed: true }
    | { allowed: false; reason: PolicyDenyReason };

export type DenialClass = 'access' | 'not_found' | 'configuration';

export function classifyDenial(reason: AuthorizationDenyReason): DenialClass {
    switch (reason) {
        case 'PolicyNotRegistered':
        case 'PolicyMismatch':
            return 'configuration';
        case 'NotFound':
            return 'not_found';
        case 'RoleDenied':
        case 'PermissionDenied':
        case 'NotAssigned':
        case 'NotSelf':
        case 'NotGuardian':
            return 'access';
    }
}

export const ALLOWED = Object.freeze({ allowed: true as const });
