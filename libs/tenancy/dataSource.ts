/**
 * Tenant-scoped read contract used by authorization.
 *
 * Every method takes the tenant id first. Implementations must constrain
 * every statement by it; a row from another tenant is treated as absent.
 * Callers never build these arguments themselves: TenantScope binds the
 * tenant id from the IdentityContext.
 */
export interface AuthorizationDataSource {
    existsAssignment(
        tenantId: string,
        teacherId: string,
        sectionId: number,
        subjectId: number,
        signal?: AbortSignal
    ): Promise<boolean>;

    existsGuardianRelation(
        tenantId: string,
        guardianId: string,
        studentId: number,
        signal?: AbortSignal
    ): Promise<boolean>;

    existsSection(tenantId: string, sectionId: number, signal?: AbortSignal): Promise<boolean>;

    existsStudent(tenantId: string, studentId: number, signal?: AbortSignal): Promise<boolean>;

    /** Null when the student does not exist in the tenant. */
    findStudentAccount(tenantId: string, studentId: number, signal?: AbortSignal): Promise<StudentAccount | null>;
}

/** A student record and the user account linked to it, if any. */
export interface StudentAccount {
    readonly studentId: number;
    readonly userId: string | null;
}

/** Anything persisted on behalf of a tenant. */
export interface TenantOwned {
    readonly tenantId: string;
}
