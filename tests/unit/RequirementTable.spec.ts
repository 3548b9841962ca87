import { describe, it } from 'node:test';
import assert from 'node:assert';
import { isEmptyRequirement, RequirementBuilder, RequirementTableBuilder } from '../../libs/authz/requirements.js';
import { lintRequirementTable } from '../../libs/authz/requirementLint.js';
import { PolicyRegistry } from '../../libs/authz/policyRegistry.js';
import { BUILT_IN_POLICIES, POLICY_NAMES } from '../../libs/authz/policies.js';
import { buildSchoolRequirementTable } from '../../libs/catalog/requirementTable.js';
import { REQUEST_SCHEMAS } from '../../libs/catalog/requests.js';

const registry = PolicyRegistry.create(BUILT_IN_POLICIES);

describe('RequirementBuilder', () => {
    it('starts empty', () => {
        assert.ok(isEmptyRequirement(new RequirementBuilder().build()));
    });

    it('is not empty once it names a policy', () => {
        const descriptor = new RequirementBuilder().policy('A').build();
        assert.strictEqual(isEmptyRequirement(descriptor), false);
    });

    it('keeps declared policy order and drops repeats', () => {
        const descriptor = new RequirementBuilder()
            .policy('B', 'A')
            .policy('B', 'C')
            .build();

        assert.deepStrictEqual(descriptor.requiredPolicies, ['B', 'A', 'C']);
    });

    it('produces a frozen descriptor detached from the builder', () => {
        const builder = new RequirementBuilder().anyRole('Teacher');
        const descriptor = builder.build();
        builder.anyRole('Admin');

        assert.ok(Object.isFrozen(descriptor));
        assert.ok(Object.isFrozen(descriptor.requiredPolicies));
        assert.deepStrictEqual([...descriptor.requiredRoles], ['Teacher']);
    });

    it('refuses to grow the sets of a built descriptor', () => {
        const descriptor = new RequirementBuilder().anyRole('Teacher').allPermissions('Grades.List').exposes('teacherScoped').build();
        const { requiredRoles, requiredPermissions, capabilities } = descriptor;
        assert.ok(requiredRoles instanceof Set && requiredPermissions instanceof Set && capabilities instanceof Set);

        assert.throws(() => requiredRoles.add('Admin'), /RequirementDescriptor is immutable/);
        assert.throws(() => requiredPermissions.delete('Grades.List'), /RequirementDescriptor is immutable/);
        assert.throws(() => capabilities.clear(), /RequirementDescriptor is immutable/);
        assert.deepStrictEqual([...requiredRoles], ['Teacher']);
        assert.ok(requiredPermissions.has('Grades.List'));
    });
});

describe('RequirementTableBuilder', () => {
    it('rejects a request type registered twice', () => {
        const builder = new RequirementTableBuilder().register('CreateGrade');
        assert.throws(() => builder.register('CreateGrade'), /CreateGrade registered twice/);
    });

    it('refuses registrations after build()', () => {
        const builder = new RequirementTableBuilder();
        builder.build();
        assert.throws(() => builder.register('Late'), /already built/);
    });

    it('looks descriptors up by request type', () => {
        const table = new RequirementTableBuilder()
            .register('GetPayment', (r) => r.allPermissions('Payment.Get'))
            .build();

        assert.strictEqual(table.size, 1);
        assert.deepStrictEqual([...(table.get('GetPayment')?.requiredPermissions ?? [])], ['Payment.Get']);
        assert.strictEqual(table.get('Other'), undefined);
    });
});

describe('School requirement table', () => {
    const table = buildSchoolRequirementTable();

    it('covers every request type in the catalog', () => {
        assert.deepStrictEqual(
            table.entriesList().map(([type]) => type).sort(),
            Object.keys(REQUEST_SCHEMAS).sort()
        );
    });

    it('declares grade creation for teachers of the class', () => {
        const descriptor = table.get('CreateGrade');

        assert.deepStrictEqual([...(descriptor?.requiredRoles ?? [])], ['Teacher', 'Admin']);
        assert.deepStrictEqual(descriptor?.requiredPolicies, [POLICY_NAMES.TeacherOfClassOrAdmin]);
        assert.ok(descriptor?.capabilities.has('teacherScoped'));
    });

    it('leaves section listing open', () => {
        const descriptor = table.get('ListSections');
        assert.ok(descriptor && isEmptyRequirement(descriptor));
    });

    it('passes the wiring lint against the built-in policies', () => {
        assert.deepStrictEqual(lintRequirementTable(table, registry), []);
    });
});

describe('lintRequirementTable', () => {
    it('reports unknown policies', () => {
        const table = new RequirementTableBuilder()
            .register('X', (r) => r.anyRole('Teacher').policy('Ghost'))
            .build();

        assert.deepStrictEqual(lintRequirementTable(table, registry), [
            { requestType: 'X', code: 'UNKNOWN_POLICY', message: 'Policy Ghost is not registered.' }
        ]);
    });

    it('reports a policy whose capability the request type does not expose', () => {
        const table = new RequirementTableBuilder()
            .register('X', (r) => r.anyRole('Teacher').policy(POLICY_NAMES.SelfOrAdmin).exposes('studentScoped'))
            .build();

        assert.deepStrictEqual(lintRequirementTable(table, registry), [
            {
                requestType: 'X',
                code: 'CAPABILITY_NOT_EXPOSED',
                message: 'Policy SelfOrAdmin reads selfScoped, which X does not expose.'
            }
        ]);
    });

    it('reports policies declared without a role or permission gate', () => {
        const table = new RequirementTableBuilder()
            .register('X', (r) => r.policy(POLICY_NAMES.SelfOrAdmin).exposes('selfScoped'))
            .build();

        const codes = lintRequirementTable(table, registry).map((issue) => issue.code);
        assert.deepStrictEqual(codes, ['POLICIES_WITHOUT_GATE']);
    });
});
