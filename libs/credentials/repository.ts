/**
 * PostgreSQL Credential Store
 *
 * All queries use parameterized statements and explicit column lists.
 * Each call holds one pooled connection for exactly one statement.
 */

import { ConnectionSource, ConnectionAcquisitionError, readSqlState, withPooledClient } from '../db/index.js';
import { logger } from '../logging/logger.js';
import { isStorableTier, StorableTier, tierCode, tierFromCode } from '../access/tier.js';
import {
    CredentialIntegrityError,
    CredentialRecord,
    CredentialStore,
    CredentialWriteError,
    StoreUnavailableError
} from './credential.js';

interface CredentialRow {
    access_level: unknown;
}

export class PgCredentialStore implements CredentialStore {
    constructor(private readonly pool: ConnectionSource) { }

    public async lookup(credential: string): Promise<StorableTier | null> {
        let row: CredentialRow | undefined;
        try {
            row = await withPooledClient(this.pool, 'credential lookup', async (client) => {
                const result = await client.query<CredentialRow>(
                    `SELECT access_level
                    FROM credentials
                    WHERE credential = $1
                    LIMIT 1`,
                    [credential]
                );
                return result.rows[0];
            });
        } catch (error) {
            throw toStoreUnavailable(error, 'lookup');
        }

        if (!row) {
            return null;
        }

        return mapAccessLevel(row.access_level);
    }

    public async insert(record: CredentialRecord): Promise<void> {
        try {
            await withPooledClient(this.pool, 'credential insert', async (client) => {
                await client.query(
                    `INSERT INTO credentials (credential, access_level, label)
                    VALUES ($1, $2, $3)`,
                    [record.credential, tierCode(record.tier), record.label]
                );
            });
        } catch (error) {
            if (error instanceof ConnectionAcquisitionError) {
                throw toStoreUnavailable(error, 'insert');
            }
            const sqlState = readSqlState(error);
            const message = error instanceof Error ? error.message : String(error);
            logger.error({ sqlState, error: message }, '[CredentialStore] Insert failed');
            throw new CredentialWriteError(`Credential insert failed: ${message}`, sqlState, { cause: error });
        }
    }
}

/**
 * Stored access levels outside the known tiers are an integrity fault,
 * never a fallback to a lower tier.
 */
function mapAccessLevel(accessLevel: unknown): StorableTier {
    const code = typeof accessLevel === 'number' ? accessLevel : Number.NaN;
    const tier = Number.isInteger(code) ? tierFromCode(code) : null;
    if (tier === null || !isStorableTier(tier)) {
        logger.error({ accessLevel }, '[CredentialStore] Unknown access level in credentials table');
        throw new CredentialIntegrityError(accessLevel);
    }
    return tier;
}

function toStoreUnavailable(error: unknown, operation: string): StoreUnavailableError {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn({ operation, error: message }, '[CredentialStore] Store unavailable');
    return new StoreUnavailableError(`Credential store unavailable during ${operation}`, { cause: error });
}
