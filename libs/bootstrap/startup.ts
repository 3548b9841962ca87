import { logger } from "../logging/logger.js";
import type { PolicyRegistry } from "../authz/policyRegistry.js";
import type { RequirementTable } from "../authz/requirements.js";
import { lintRequirementTable } from "../authz/requirementLint.js";
import type { ConnectionSource } from "../db/index.js";

export interface StartupChecks {
    readonly requirements: RequirementTable;
    readonly policies: PolicyRegistry;
    /** Omitted when the service runs without a database. */
    readonly connections?: ConnectionSource;
}

/**
 * Fail-closed startup. A request type that names an unknown policy, or a
 * policy whose capability it does not expose, stops the service here rather
 * than surfacing as a 500 on the first request.
 */
export async function bootstrap(serviceName: string, checks: StartupChecks): Promise<void> {
    logger.info({ serviceName }, "Bootstrapping service");

    const issues = lintRequirementTable(checks.requirements, checks.policies);
    if (issues.length > 0) {
        logger.fatal({ serviceName, issues }, "Requirement table wiring defects");
        throw new Error(`Startup aborted: ${issues.length} requirement table issue(s)`);
    }

    if (checks.connections) {
        const client = await checks.connections.connect();
        try {
            await client.query("SELECT 1");
        } finally {
            client.release();
        }
    }

    logger.info({ serviceName, requestTypes: checks.requirements.size, policies: checks.policies.names() }, "Startup checks passed");
}
