/**
 * Built-in school policies.
 *
 * The Admin override is applied by the registry before any routine runs,
 * so none of these check for it.
 */

import { ALLOWED, PolicyDenyReason, PolicyOutcome } from './decision.js';
import { AnyPolicyDefinition, definePolicy } from './policyRegistry.js';

export const POLICY_NAMES = {
    TeacherOfClassOrAdmin: 'TeacherOfClassOrAdmin',
    GuardianOfStudentOrAdmin: 'GuardianOfStudentOrAdmin',
    StudentSelfOrGuardianOrAdmin: 'StudentSelfOrGuardianOrAdmin',
    SelfOrAdmin: 'SelfOrAdmin',
} as const;

function deny(reason: PolicyDenyReason): PolicyOutcome {
    return { allowed: false, reason };
}

/**
 * Caller must hold an active teaching assignment for exactly this
 * (section, subject) pair.
 */
export const teacherOfClassPolicy = definePolicy({
    name: POLICY_NAMES.TeacherOfClassOrAdmin,
    capability: 'teacherScoped',
    async evaluate(marker, { identity, lookups }) {
        if (!(await lookups.existsSection(marker.sectionId))) {
            return deny('NotFound');
        }
        const assigned = await lookups.existsAssignment(identity.userId, marker.sectionId, marker.subjectId);
        return assigned ? ALLOWED : deny('NotAssigned');
    }
});

export const guardianOfStudentPolicy = definePolicy({
    name: POLICY_NAMES.GuardianOfStudentOrAdmin,
    capability: 'studentScoped',
    async evaluate(marker, { identity, lookups }) {
        if (!(await lookups.existsStudent(marker.studentId))) {
            return deny('NotFound');
        }
        const related = await lookups.existsGuardianRelation(identity.userId, marker.studentId);
        return related ? ALLOWED : deny('NotGuardian');
    }
});

/**
 * The student themself, or one of their guardians.
 */
export const studentSelfOrGuardianPolicy = definePolicy({
    name: POLICY_NAMES.StudentSelfOrGuardianOrAdmin,
    capability: 'studentScoped',
    async evaluate(marker, { identity, lookups }) {
        const student = await lookups.findStudentAccount(marker.studentId);
        if (!student) {
            return deny('NotFound');
        }
        if (student.userId === identity.userId) {
            return ALLOWED;
        }
        const related = await lookups.existsGuardianRelation(identity.userId, marker.studentId);
        return related ? ALLOWED : deny('NotGuardian');
    }
});

export const selfPolicy = definePolicy({
    name: POLICY_NAMES.SelfOrAdmin,
    capability: 'selfScoped',
    async evaluate(marker, { identity }) {
        return marker.targetUserId === identity.userId ? ALLOWED : deny('NotSelf');
    }
});

export const BUILT_IN_POLICIES: readonly AnyPolicyDefinition[] = [
    teacherOfClassPolicy,
    guardianOfStudentPolicy,
    studentSelfOrGuardianPolicy,
    selfPolicy
];
