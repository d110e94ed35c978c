import { z } from 'zod';
import { GuardRule } from '../config-guard.js';

/**
 * Gateway Configuration Guards
 * The engine executable has no sensible default and must be set explicitly.
 */
export const GATEWAY_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'ENGINE_COMMAND' },
    {
        type: 'assert',
        check: () => !process.env.PORT || /^\d+$/.test(process.env.PORT),
        message: 'PORT must be a positive integer'
    }
];

const GatewayConfigSchema = z.object({
    PORT: z.coerce.number().int().positive().max(65535).default(8000),
    ENGINE_COMMAND: z.string().min(1),
    ENGINE_ARGS: z.string().optional(),
    ENGINE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    BODY_LIMIT: z.string().min(1).default('256kb')
});

export interface GatewayConfig {
    readonly port: number;
    readonly engine: {
        readonly command: string;
        readonly args: readonly string[];
        /** Call-level guard around one engine invocation */
        readonly timeoutMs: number;
    };
    /** Maximum accepted JSON body size (express.json limit syntax) */
    readonly bodyLimit: string;
}

export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
    const parsed = GatewayConfigSchema.parse(env);

    return {
        port: parsed.PORT,
        engine: {
            command: parsed.ENGINE_COMMAND,
            args: parsed.ENGINE_ARGS ? parsed.ENGINE_ARGS.split(/\s+/).filter(arg => arg.length > 0) : [],
            timeoutMs: parsed.ENGINE_TIMEOUT_MS
        },
        bodyLimit: parsed.BODY_LIMIT
    };
}
