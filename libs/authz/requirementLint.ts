import type { PolicyRegistry } from './policyRegistry.js';
import type { RequirementTable } from './requirements.js';

export type RequirementLintIssue = {
    requestType: string;
    code:
        | 'UNKNOWN_POLICY'
        | 'CAPABILITY_NOT_EXPOSED'
        | 'POLICIES_WITHOUT_GATE';
    message: string;
};

/**
 * Startup wiring check. Every issue reported here would otherwise surface
 * at request time as PolicyNotRegistered or PolicyMismatch.
 */
export function lintRequirementTable(
    table: RequirementTable,
    registry: PolicyRegistry
): RequirementLintIssue[] {
    const issues: RequirementLintIssue[] = [];
    for (const [requestType, descriptor] of table.entriesList()) {
        for (const policy of descriptor.requiredPolicies) {
            const capability = registry.capabilityOf(policy);
            if (!capability) {
                issues.push({
                    requestType,
                    code: 'UNKNOWN_POLICY',
                    message: `Policy ${policy} is not registered.`,
                });
                continue;
            }
            if (!descriptor.capabilities.has(capability)) {
                issues.push({
                    requestType,
                    code: 'CAPABILITY_NOT_EXPOSED',
                    message: `Policy ${policy} reads ${capability}, which ${requestType} does not expose.`,
                });
            }
        }
        if (
            descriptor.requiredPolicies.length > 0 &&
            descriptor.requiredRoles.size === 0 &&
            descriptor.requiredPermissions.size === 0
        ) {
            issues.push({
                requestType,
                code: 'POLICIES_WITHOUT_GATE',
                message: 'Policies are declared without any role or permission requirement.',
            });
        }
    }
    return issues;
}
