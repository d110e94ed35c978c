/**
 * Credential Issuance Service
 *
 * Only ADMINISTRATOR callers may mint credentials, and only for the issuable
 * tiers. The credential is disclosed once, in the return value; nothing
 * reads it back afterwards.
 */

import crypto from 'crypto';
import { logger } from '../logging/logger.js';
import { RejectionReason } from '../access/rejections.js';
import { isIssuableTier, Tier } from '../access/tier.js';
import { CredentialStore } from './credential.js';

export const MAX_LABEL_LENGTH = 128;

export type IssuanceResult =
    | { success: true; credential: string }
    | { success: false; reason: RejectionReason };

export type CredentialGenerator = () => string;

export class CredentialIssuanceService {
    constructor(
        private readonly store: CredentialStore,
        private readonly generate: CredentialGenerator = () => crypto.randomUUID()
    ) { }

    public async issue(requestedTier: Tier, label: string, callerTier: Tier): Promise<IssuanceResult> {
        if (callerTier !== 'ADMINISTRATOR') {
            logger.warn({ callerTier, requestedTier }, 'Credential issuance denied');
            return { success: false, reason: 'NOT_AUTHORIZED' };
        }

        if (!isIssuableTier(requestedTier)) {
            return { success: false, reason: 'INVALID_REQUESTED_TIER' };
        }

        const normalizedLabel = label.trim();
        if (normalizedLabel.length === 0 || normalizedLabel.length > MAX_LABEL_LENGTH) {
            return { success: false, reason: 'INVALID_LABEL' };
        }

        const credential = this.generate();
        try {
            await this.store.insert({ credential, tier: requestedTier, label: normalizedLabel });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error({ requestedTier, label: normalizedLabel, error: message }, 'Credential issuance failed');
            return { success: false, reason: 'ISSUANCE_FAILED' };
        }

        logger.info({ requestedTier, label: normalizedLabel }, 'Credential issued');
        return { success: true, credential };
    }
}
