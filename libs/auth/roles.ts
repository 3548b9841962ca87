/**
 * Coarse-grained roles.
 * Names are global; assignment is always per tenant.
 */
export const ROLES = [
    'Admin',
    'Teacher',
    'Student',
    'Guardian',
    'GradeManager'
] as const;

export type Role = typeof ROLES[number];

/** Holding this role bypasses every policy routine. */
export const ADMIN_ROLE: Role = 'Admin';

const ROLE_NAMES: ReadonlySet<string> = new Set(ROLES);

export function isRole(value: string): value is Role {
    return ROLE_NAMES.has(value);
}
