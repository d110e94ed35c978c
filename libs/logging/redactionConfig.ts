/**
 * Centralized Redaction Configuration
 * Defines keys that must be redacted from logs to prevent credential leakage.
 */
export const REDACT_KEYS = [
    // Credentials (Root and Nested)
    'credential', '*.credential',
    'key', '*.key',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',
    'headers["x-api-key"]', '*.headers["x-api-key"]',

    // Transport secrets
    'authorization', '*.authorization',
    'token', '*.token',
    'password', '*.password',
    'secret', '*.secret',

    // Database
    'connectionString', '*.connectionString'
];

export const REDACT_CENSOR = '[REDACTED]';
