import { POLICY_NAMES } from '../authz/policies.js';
import { RequirementBuilder, RequirementTable, RequirementTableBuilder } from '../authz/requirements.js';
import type { SchoolRequestType } from './requests.js';

/**
 * Static requirement table for the school request catalog.
 * Built once at startup; the returned table is frozen.
 */
export function buildSchoolRequirementTable(): RequirementTable {
    const builder = new RequirementTableBuilder();
    const register = (type: SchoolRequestType, configure?: (r: RequirementBuilder) => RequirementBuilder) =>
        builder.register(type, configure);

    register('CreateGrade', (r) => r
        .anyRole('Teacher', 'Admin')
        .policy(POLICY_NAMES.TeacherOfClassOrAdmin)
        .exposes('teacherScoped'));

    register('ListSectionGrades', (r) => r
        .anyRole('Teacher', 'GradeManager', 'Admin')
        .allPermissions('Grades.List')
        .policy(POLICY_NAMES.TeacherOfClassOrAdmin)
        .exposes('teacherScoped'));

    register('ListStudentGrades', (r) => r
        .anyRole('Student', 'Guardian', 'Admin')
        .allPermissions('Grades.List')
        .policy(POLICY_NAMES.StudentSelfOrGuardianOrAdmin)
        .exposes('studentScoped'));

    register('GetStudentReportCard', (r) => r
        .anyRole('Guardian', 'Admin')
        .allPermissions('Grades.Get', 'Students.Get')
        .policy(POLICY_NAMES.GuardianOfStudentOrAdmin)
        .exposes('studentScoped'));

    register('GetUserProfile', (r) => r
        .anyRole('Admin', 'Teacher', 'Student', 'Guardian', 'GradeManager')
        .policy(POLICY_NAMES.SelfOrAdmin)
        .exposes('selfScoped'));

    register('UpdateUserProfile', (r) => r
        .allPermissions('Users.Update')
        .policy(POLICY_NAMES.SelfOrAdmin)
        .exposes('selfScoped'));

    register('GetPayment', (r) => r
        .allPermissions('Payment.Get'));

    register('ListPayments', (r) => r
        .anyRole('Admin')
        .allPermissions('Payment.List'));

    register('ListSections');

    return builder.build();
}
