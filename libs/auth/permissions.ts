/**
 * Permission Registry
 *
 * Principles:
 * - `<Resource>.<Action>`, never a role name
 * - Assigned per user per tenant
 * - Additive-only once released
 */

export const PERMISSIONS = [
    // Grades
    'Grades.List',
    'Grades.Get',
    'Grades.Create',
    'Grades.Update',
    'Grades.Delete',

    // Students
    'Students.List',
    'Students.Get',

    // Sections & subjects
    'Sections.List',
    'Subjects.List',

    // Payments
    'Payment.List',
    'Payment.Get',
    'Payment.Create',

    // Users
    'Users.Get',
    'Users.Update'
] as const;

export type Permission = typeof PERMISSIONS[number];

const PERMISSION_TAGS: ReadonlySet<string> = new Set(PERMISSIONS);

export function isPermission(value: string): value is Permission {
    return PERMISSION_TAGS.has(value);
}
