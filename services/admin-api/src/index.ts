import { logger } from "../../../libs/logging/logger.js";
import { ConfigGuard } from "../../../libs/bootstrap/config-guard.js";
import { AUTH_CONFIG_GUARDS } from "../../../libs/bootstrap/config/auth-config.js";
import { DB_CONFIG_GUARDS } from "../../../libs/bootstrap/config/db-config.js";
import { loadServiceConfig } from "../../../libs/bootstrap/config/service-config.js";
import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { ErrorSanitizer } from "../../../libs/errors/sanitizer.js";
import { asConnectionSource, createPool } from "../../../libs/db/pool.js";
import { createTenantDb } from "../../../libs/db/index.js";
import { PgAuthorizationDataSource } from "../../../libs/db/authorizationRepository.js";
import { PgPermissionStore } from "../../../libs/db/permissionRepository.js";
import { PolicyRegistry } from "../../../libs/authz/policyRegistry.js";
import { BUILT_IN_POLICIES } from "../../../libs/authz/policies.js";
import { AuthorizationPipeline } from "../../../libs/authz/pipeline.js";
import { buildSchoolRequirementTable } from "../../../libs/catalog/requirementTable.js";
import type { SchoolRequest } from "../../../libs/catalog/requests.js";
import { RequestDispatcher } from "../../../libs/dispatch/dispatcher.js";
import { createBearerTokenVerifier } from "../../../libs/auth/bearerToken.js";
import { createHttpApp } from "../../../libs/http/app.js";
import { registerSchoolHandlers } from "./handlers.js";

async function main() {
    ConfigGuard.enforce([...DB_CONFIG_GUARDS, ...AUTH_CONFIG_GUARDS]);
    const config = loadServiceConfig();

    const pool = createPool(config);
    const connections = asConnectionSource(pool);
    const tenantDb = createTenantDb(connections, { statementTimeoutMs: config.authorizationTimeoutMs });
    const dataSource = new PgAuthorizationDataSource(tenantDb);
    const permissionStore = new PgPermissionStore(tenantDb);

    const policies = PolicyRegistry.create(BUILT_IN_POLICIES);
    const requirements = buildSchoolRequirementTable();
    await bootstrap("admin-api", { requirements, policies, connections });

    const pipeline = new AuthorizationPipeline({ requirements, policies, dataSource });
    const dispatcher = registerSchoolHandlers(new RequestDispatcher<SchoolRequest>({
        pipeline,
        dataSource,
        permissionStore,
        permissionSource: config.permissionSource,
        timeoutMs: config.authorizationTimeoutMs
    }));

    const app = createHttpApp({
        dispatcher,
        verifier: createBearerTokenVerifier(config.auth)
    });

    const server = app.listen(config.port, () => {
        logger.info({ port: config.port, permissionSource: config.permissionSource }, "Admin API listening");
    });

    const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down");
        server.close(() => {
            pool.end().then(
                () => process.exit(0),
                (error: unknown) => {
                    logger.error({ error }, "Pool shutdown failed");
                    process.exit(1);
                }
            );
        });
    };
    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
    const sanitized = ErrorSanitizer.sanitize(err, "AdminApi:Startup", "CONFIG");
    logger.fatal({ incidentId: sanitized.incidentId }, "Admin API failed to start");
    process.exit(1);
});
