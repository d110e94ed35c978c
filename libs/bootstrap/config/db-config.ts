import { z } from 'zod';
import { GuardRule } from '../config-guard.js';

/**
 * DB Configuration Guards
 * Enforces strict presence of database connection parameters.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_PORT' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD', sensitive: true },
    { type: 'required', name: 'DB_NAME' },

    // Guard-level TLS enforcement (fail-closed)
    {
        type: 'assert',
        check: () =>
            !['production', 'staging'].includes(process.env.NODE_ENV ?? '') ||
            !!process.env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging',
    },
    {
        type: 'forbidIf',
        name: 'DB_SSL_QUERY',
        when: () => ['production', 'staging'].includes(process.env.NODE_ENV ?? '') && process.env.DB_SSL_QUERY === 'false',
        message: 'DB_SSL_QUERY=false is forbidden in production/staging'
    }
];

const DatabaseConfigSchema = z.object({
    NODE_ENV: z.string().optional(),
    DB_HOST: z.string().min(1),
    DB_PORT: z.coerce.number().int().positive(),
    DB_USER: z.string().min(1),
    DB_PASSWORD: z.string().min(1),
    DB_NAME: z.string().min(1),
    DB_CA_CERT: z.string().optional(),
    DB_SSL_QUERY: z.enum(['true', 'false']).optional(),
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),
    DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(2000)
});

export interface DatabaseConfig {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
    readonly poolMax: number;
    /** Bounded wait for a pooled connection; exhaustion beyond this is a store outage */
    readonly connectionTimeoutMillis: number;
    readonly ssl: false | { readonly rejectUnauthorized: true; readonly ca: string | undefined };
}

/**
 * Parse database settings from the environment.
 * TLS is mandatory in production/staging and opt-in elsewhere via DB_SSL_QUERY=true.
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
    const parsed = DatabaseConfigSchema.parse(env);
    const isProtectedEnv = parsed.NODE_ENV === 'production' || parsed.NODE_ENV === 'staging';

    if (isProtectedEnv && !parsed.DB_CA_CERT) {
        throw new Error('CRITICAL: Missing DB_CA_CERT in protected environment (production/staging). Database connection aborted.');
    }

    const useTls = isProtectedEnv || parsed.DB_SSL_QUERY === 'true';

    return {
        host: parsed.DB_HOST,
        port: parsed.DB_PORT,
        user: parsed.DB_USER,
        password: parsed.DB_PASSWORD,
        database: parsed.DB_NAME,
        poolMax: parsed.DB_POOL_MAX,
        connectionTimeoutMillis: parsed.DB_CONNECT_TIMEOUT_MS,
        ssl: useTls ? { rejectUnauthorized: true, ca: parsed.DB_CA_CERT } : false
    };
}
