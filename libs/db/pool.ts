import pg from 'pg';
import type { Pool } from 'pg';
import { DatabaseConfig } from '../bootstrap/config/db-config.js';
import { logger } from '../logging/logger.js';

const { Pool: PgPool } = pg;

/**
 * Bounded PostgreSQL connection pool for the credential store.
 * connectionTimeoutMillis turns pool exhaustion into a rejected connect()
 * instead of an unbounded wait.
 */
export function createPool(config: DatabaseConfig): Pool {
    const pool = new PgPool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        max: config.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: config.connectionTimeoutMillis,
        ssl: config.ssl === false ? false : { rejectUnauthorized: config.ssl.rejectUnauthorized, ca: config.ssl.ca }
    });

    // Idle client errors are emitted on the pool; unhandled they would crash the process.
    pool.on('error', (error) => {
        logger.error({ error: error.message }, '[DB] Idle client error');
    });

    return pool;
}
