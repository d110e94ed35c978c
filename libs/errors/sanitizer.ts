import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Failure reported to a gateway client: a public message plus an incident id
 * that points at the full details in the log.
 */
export class GatewayError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly statusCode: number;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: 'SEC' | 'OPS' = 'OPS',
        options?: { cause?: unknown; contextLabel?: string; statusCode?: number }
    ) {
        super(publicMessage);
        this.name = 'GatewayError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.statusCode = options?.statusCode ?? 500;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

function readStatusCode(err: unknown): number | undefined {
    if (err && typeof err === 'object' && 'statusCode' in err) {
        const { statusCode } = err;
        if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 600) {
            return statusCode;
        }
    }
    return undefined;
}

export const ErrorSanitizer = {
    /**
     * Wrap anything thrown past a route handler. A 4xx/5xx `statusCode` on the
     * original (EngineInvocationError, StoreUnavailableError) is kept.
     */
    sanitize: (err: unknown, contextLabel: string): GatewayError => {
        if (err instanceof GatewayError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else {
            originalErrorMessage = String(err);
        }

        return new GatewayError(
            'An internal system error occurred.',
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            'OPS',
            { cause: err, contextLabel, statusCode: readStatusCode(err) }
        );
    }
};
