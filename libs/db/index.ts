import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { logger } from '../logging/logger.js';

export type Queryable = {
    query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
};

/**
 * Minimal pool surface the store depends on.
 */
export type ConnectionSource = Pick<Pool, 'connect'>;

export class ConnectionAcquisitionError extends Error {
    readonly code = 'CONNECTION_ACQUISITION_FAILED';
    readonly statusCode = 503;

    constructor(context: string, options?: { cause?: unknown }) {
        super(`[DB] Could not acquire a pooled connection during ${context}`, options);
        this.name = 'ConnectionAcquisitionError';
    }
}

function releaseClient(client: PoolClient, forceDestroy: boolean, context: string): void {
    try {
        if (forceDestroy) {
            client.release(new Error(`[DB] Forcing client destroy after ${context}`));
        } else {
            client.release();
        }
    } catch (error) {
        logger.error({ error }, `[DB] Failed to release client during ${context}`);
    }
}

/**
 * Scoped client acquisition for a single unit of work.
 * The client is released on every exit path; a client whose connection
 * failed mid-query is destroyed rather than returned to the pool.
 *
 * @throws ConnectionAcquisitionError when no client can be acquired (pool exhausted, server down)
 */
export async function withPooledClient<T>(
    source: ConnectionSource,
    context: string,
    callback: (client: Queryable) => Promise<T>
): Promise<T> {
    let client: PoolClient;
    try {
        client = await source.connect();
    } catch (error) {
        throw new ConnectionAcquisitionError(context, { cause: error });
    }

    let forceDestroy = false;
    try {
        const scoped: Queryable = {
            query: <R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) =>
                client.query<R>(text, params)
        };
        return await callback(scoped);
    } catch (error) {
        forceDestroy = isConnectionFault(error);
        throw error;
    } finally {
        releaseClient(client, forceDestroy, context);
    }
}

/**
 * Errors without a SQLSTATE come from the socket, not the server.
 */
export function isConnectionFault(error: unknown): boolean {
    return readSqlState(error) === undefined;
}

export function readSqlState(error: unknown): string | undefined {
    if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}
