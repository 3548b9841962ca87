import type { Permission } from '../../libs/auth/permissions.js';
import type { Role } from '../../libs/auth/roles.js';
import { AuthorizationPipeline } from '../../libs/authz/pipeline.js';
import { BUILT_IN_POLICIES } from '../../libs/authz/policies.js';
import { PolicyRegistry } from '../../libs/authz/policyRegistry.js';
import type { RequirementTable } from '../../libs/authz/requirements.js';
import { buildSchoolRequirementTable } from '../../libs/catalog/requirementTable.js';
import { createIdentityContext, IdentityContext } from '../../libs/context/identity.js';
import type { AuthorizationDataSource } from '../../libs/tenancy/dataSource.js';
import { MemoryAuthorizationStore } from '../../libs/tenancy/memoryDataSource.js';

export const TENANT_A = 'tenant-a';
export const TENANT_B = 'tenant-b';

export function identity(input: {
    userId?: string;
    tenantId?: string;
    roles?: Role[];
    permissions?: Permission[];
} = {}): IdentityContext {
    return createIdentityContext({
        userId: input.userId ?? 'user-1',
        tenantId: input.tenantId ?? TENANT_A,
        roles: input.roles ?? [],
        permissions: input.permissions ?? []
    });
}

/**
 * Two schools. Section 30 and student 200 exist only in tenant B.
 */
export function seededStore(): MemoryAuthorizationStore {
    return new MemoryAuthorizationStore({
        sections: [
            { tenantId: TENANT_A, sectionId: 10 },
            { tenantId: TENANT_A, sectionId: 20 },
            { tenantId: TENANT_B, sectionId: 30 }
        ],
        assignments: [
            { tenantId: TENANT_A, teacherId: 'teacher-1', sectionId: 10, subjectId: 3, active: true },
            { tenantId: TENANT_A, teacherId: 'teacher-1', sectionId: 20, subjectId: 3, active: false },
            { tenantId: TENANT_B, teacherId: 'teacher-2', sectionId: 30, subjectId: 3, active: true }
        ],
        students: [
            { tenantId: TENANT_A, studentId: 100, userId: 'student-100' },
            { tenantId: TENANT_A, studentId: 101, userId: null },
            { tenantId: TENANT_B, studentId: 200, userId: 'student-200' }
        ],
        guardians: [
            { tenantId: TENANT_A, guardianId: 'guardian-1', studentId: 100 },
            { tenantId: TENANT_B, guardianId: 'guardian-2', studentId: 200 }
        ],
        permissions: [
            { tenantId: TENANT_A, userId: 'teacher-1', permission: 'Grades.List' },
            { tenantId: TENANT_A, userId: 'guardian-1', permission: 'Grades.Get' },
            { tenantId: TENANT_A, userId: 'guardian-1', permission: 'Students.Get' },
            { tenantId: TENANT_B, userId: 'teacher-1', permission: 'Payment.List' }
        ]
    });
}

/** Every lookup answers "absent" unless overridden. */
export function stubDataSource(overrides: Partial<AuthorizationDataSource> = {}): AuthorizationDataSource {
    return {
        existsAssignment: async () => false,
        existsGuardianRelation: async () => false,
        existsSection: async () => false,
        existsStudent: async () => false,
        findStudentAccount: async () => null,
        ...overrides
    };
}

export function schoolPipeline(
    dataSource: AuthorizationDataSource = seededStore(),
    requirements: RequirementTable = buildSchoolRequirementTable(),
    policies: PolicyRegistry = PolicyRegistry.create(BUILT_IN_POLICIES)
): AuthorizationPipeline {
    return new AuthorizationPipeline({ requirements, policies, dataSource });
}
