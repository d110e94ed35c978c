import type { StorableTier } from '../access/tier.js';

/**
 * Persisted credential binding.
 * Immutable after creation; there is no update or delete path.
 */
export interface CredentialRecord {
    /** Opaque bearer value presented in the x-api-key header */
    readonly credential: string;
    readonly tier: StorableTier;
    /** Human-readable owner note */
    readonly label: string;
}

/**
 * Credential Store port.
 * Implementations acquire a pooled connection per call and release it on every exit path.
 */
export interface CredentialStore {
    /**
     * Returns null when no record matches — does NOT throw for a miss.
     * @throws StoreUnavailableError when the store cannot be reached
     * @throws CredentialIntegrityError when the stored access level is not a known tier
     */
    lookup(credential: string): Promise<StorableTier | null>;

    /**
     * @throws StoreUnavailableError when no connection can be acquired
     * @throws CredentialWriteError when the statement fails (e.g. duplicate credential)
     */
    insert(record: CredentialRecord): Promise<void>;
}

export class StoreUnavailableError extends Error {
    readonly code = 'STORE_UNAVAILABLE';
    readonly statusCode = 503;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StoreUnavailableError';
    }
}

export class CredentialIntegrityError extends Error {
    readonly code = 'CREDENTIAL_INTEGRITY';
    readonly statusCode = 503;

    constructor(public readonly storedAccessLevel: unknown) {
        super(`Stored access level ${String(storedAccessLevel)} does not map to a known tier`);
        this.name = 'CredentialIntegrityError';
    }
}

export class CredentialWriteError extends Error {
    readonly code = 'CREDENTIAL_WRITE_FAILED';
    readonly statusCode = 503;

    constructor(message: string, public readonly sqlState?: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'CredentialWriteError';
    }
}
