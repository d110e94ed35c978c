import { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';

export interface ValidationIssue {
    readonly path: string;
    readonly message: string;
}

export class ValidationError extends Error {
    readonly code = 'VALIDATION_FAILED';
    readonly statusCode = 400;

    constructor(
        public readonly context: string,
        public readonly issues: readonly ValidationIssue[]
    ) {
        super(`Validation Violation in ${context}: ${JSON.stringify(issues)}`);
        this.name = 'ValidationError';
    }
}

/**
 * Validation Middleware
 * Returns the parsed value or throws a strictly typed error on failure.
 * Used for "Fail-Closed" validation of request bodies and engine output.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Payloads may carry program text or credentials; only the issue list is logged.
        logger.warn({
            context,
            errors: errorDetails
        }, "Input Validation Failure");

        throw new ValidationError(context, errorDetails);
    }

    return result.data;
}

/**
 * Factory for creating reusable validators.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
