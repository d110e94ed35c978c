import { logger } from "../../../libs/logging/logger.js";
import { ConfigGuard } from "../../../libs/bootstrap/config-guard.js";
import { DB_CONFIG_GUARDS, loadDatabaseConfig } from "../../../libs/bootstrap/config/db-config.js";
import { GATEWAY_CONFIG_GUARDS, loadGatewayConfig } from "../../../libs/bootstrap/config/gateway-config.js";
import { assertTierOrdering } from "../../../libs/access/policy.js";
import { createPool } from "../../../libs/db/pool.js";
import { PgCredentialStore } from "../../../libs/credentials/repository.js";
import { CredentialIssuanceService } from "../../../libs/credentials/issuance.js";
import { UsageLedger } from "../../../libs/ledger/usageLedger.js";
import { ProcessExecutionEngine } from "../../../libs/engine/processEngine.js";
import { AdmissionGateway } from "../../../libs/gateway/admissionGateway.js";
import { createGatewayApp } from "../../../libs/http/app.js";


async function main() {
    // Fail-Closed configuration
    ConfigGuard.enforce([...DB_CONFIG_GUARDS, ...GATEWAY_CONFIG_GUARDS]);
    const dbConfig = loadDatabaseConfig();
    const config = loadGatewayConfig();

    // An inverted access-code table would grant wrong ceilings.
    assertTierOrdering();

    const pool = createPool(dbConfig);
    const store = new PgCredentialStore(pool);
    const ledger = new UsageLedger();
    const engine = new ProcessExecutionEngine({
        command: config.engine.command,
        args: config.engine.args,
        timeoutMs: config.engine.timeoutMs
    });
    const gateway = new AdmissionGateway(engine, ledger);
    const issuance = new CredentialIssuanceService(store);

    const app = createGatewayApp({ store, gateway, issuance, bodyLimit: config.bodyLimit });
    const server = app.listen(config.port, () => {
        logger.info({ port: config.port, engine: config.engine.command }, "Gateway API listening");
    });

    const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, "Shutting down gateway");
        server.close((error) => {
            if (error) {
                logger.error({ error: error.message }, "HTTP server close failed");
            }
            pool.end()
                .then(() => process.exit(error ? 1 : 0))
                .catch((poolError: unknown) => {
                    logger.error({ error: poolError }, "Pool shutdown failed");
                    process.exit(1);
                });
        });
    };

    process.once("SIGTERM", shutdown);
    process.once("SIGINT", shutdown);
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
