/**
 * Tenant Isolation Guard
 *
 * The only way policy routines and handlers reach tenant-owned data.
 * The tenant id comes from the IdentityContext and cannot be overridden.
 * Rows that are missing and rows that belong to another tenant produce the
 * same NotFound result.
 */

import { logger } from '../logging/logger.js';
import { IdentityContext } from '../context/identity.js';
import { untilAborted } from './abortable.js';
import { AuthorizationDataSource, StudentAccount, TenantOwned } from './dataSource.js';

export type TenantLookupResult<T> =
    | { found: true; value: T }
    | { found: false; reason: 'NotFound' };

export interface TenantScopedLookups {
    existsAssignment(teacherId: string, sectionId: number, subjectId: number): Promise<boolean>;
    existsGuardianRelation(guardianId: string, studentId: number): Promise<boolean>;
    existsSection(sectionId: number): Promise<boolean>;
    existsStudent(studentId: number): Promise<boolean>;
    findStudentAccount(studentId: number): Promise<StudentAccount | null>;
}

const NOT_FOUND = Object.freeze({ found: false as const, reason: 'NotFound' as const });

export class TenantScope {
    public readonly lookups: TenantScopedLookups;

    private constructor(
        private readonly tenantId: string,
        source: AuthorizationDataSource,
        private readonly signal?: AbortSignal
    ) {
        this.lookups = Object.freeze({
            existsAssignment: (teacherId: string, sectionId: number, subjectId: number) =>
                this.guarded(() => source.existsAssignment(tenantId, teacherId, sectionId, subjectId, signal)),
            existsGuardianRelation: (guardianId: string, studentId: number) =>
                this.guarded(() => source.existsGuardianRelation(tenantId, guardianId, studentId, signal)),
            existsSection: (sectionId: number) =>
                this.guarded(() => source.existsSection(tenantId, sectionId, signal)),
            existsStudent: (studentId: number) =>
                this.guarded(() => source.existsStudent(tenantId, studentId, signal)),
            findStudentAccount: (studentId: number) =>
                this.guarded(() => source.findStudentAccount(tenantId, studentId, signal))
        });
    }

    static forIdentity(
        identity: IdentityContext,
        source: AuthorizationDataSource,
        signal?: AbortSignal
    ): TenantScope {
        return new TenantScope(identity.tenantId, source, signal);
    }

    /** Read-only, for log correlation. */
    get id(): string {
        return this.tenantId;
    }

    /**
     * Run a loader with the bound tenant id. A null result, or a row owned by
     * a different tenant, becomes NotFound.
     */
    async load<T extends TenantOwned>(
        loader: (tenantId: string, signal?: AbortSignal) => Promise<T | null>
    ): Promise<TenantLookupResult<T>> {
        const row = await this.guarded(() => loader(this.tenantId, this.signal));
        return this.require(row);
    }

    require<T extends TenantOwned>(entity: T | null | undefined): TenantLookupResult<T> {
        if (!entity) {
            return NOT_FOUND;
        }
        if (entity.tenantId !== this.tenantId) {
            // Logged internally only; the caller sees the same NotFound as a missing row.
            logger.warn({ tenantId: this.tenantId }, 'Cross-tenant reference suppressed');
            return NOT_FOUND;
        }
        return { found: true, value: entity };
    }

    /** An aborted signal rejects the lookup at once, even one still in flight. */
    private async guarded<T>(lookup: () => Promise<T>): Promise<T> {
        this.signal?.throwIfAborted();
        return untilAborted(lookup(), this.signal);
    }
}
