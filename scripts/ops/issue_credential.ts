import { ConfigGuard } from "../../libs/bootstrap/config-guard.js";
import { DB_CONFIG_GUARDS, loadDatabaseConfig } from "../../libs/bootstrap/config/db-config.js";
import { createPool } from "../../libs/db/pool.js";
import { PgCredentialStore } from "../../libs/credentials/repository.js";
import { isStorableTier, TIERS } from "../../libs/access/tier.js";
import crypto from "crypto";

/**
 * Operator credential minting.
 * The only path that creates ADMINISTRATOR credentials; the HTTP
 * issuance route refuses that tier.
 *
 * Usage: issue_credential.ts <ADMINISTRATOR|DEVELOPER|BASIC> <label>
 */
async function issueCredential(tierArg: string | undefined, labelParts: string[]) {
    const tier = TIERS.find(candidate => candidate === tierArg?.toUpperCase());
    const label = labelParts.join(" ").trim();

    if (!tier || !isStorableTier(tier) || label.length === 0) {
        console.error("Usage: issue_credential.ts <ADMINISTRATOR|DEVELOPER|BASIC> <label>");
        process.exitCode = 1;
        return;
    }

    ConfigGuard.enforce(DB_CONFIG_GUARDS);
    const pool = createPool(loadDatabaseConfig());
    const store = new PgCredentialStore(pool);

    try {
        const credential = crypto.randomUUID();
        await store.insert({ credential, tier, label });

        console.log(`--- ${tier} credential issued for "${label}" ---`);
        console.log("Store this value now; it cannot be retrieved again:");
        console.log(credential);
    } finally {
        await pool.end();
    }
}

const [, , tierArg, ...labelParts] = process.argv;
issueCredential(tierArg, labelParts).catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
