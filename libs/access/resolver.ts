/**
 * Access Resolver
 *
 * Maps the credentials presented on one request to a tier:
 * 1. More than one credential -> MALFORMED_CREDENTIAL_PRESENTATION
 * 2. None -> UNAUTHENTICATED (store not consulted)
 * 3. Exactly one -> store lookup
 *
 * Resolution never touches the usage ledger; only completed executions are counted.
 */

import { logger, credentialHint } from '../logging/logger.js';
import { CredentialIntegrityError, CredentialStore } from '../credentials/credential.js';
import { RejectionReason } from './rejections.js';
import { Tier } from './tier.js';

export type AccessResolution =
    | { success: true; tier: Tier }
    | { success: false; reason: RejectionReason };

export async function resolveAccess(
    presented: readonly string[],
    store: CredentialStore
): Promise<AccessResolution> {
    if (presented.length > 1) {
        logger.warn({ presentedCount: presented.length }, 'Multiple credentials presented');
        return { success: false, reason: 'MALFORMED_CREDENTIAL_PRESENTATION' };
    }

    const credential = presented[0];
    if (credential === undefined) {
        return { success: true, tier: 'UNAUTHENTICATED' };
    }

    let tier: Tier | null;
    try {
        tier = await store.lookup(credential);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        if (error instanceof CredentialIntegrityError) {
            logger.error({ credentialHint: credentialHint(credential), error: message }, 'Credential record failed integrity check');
        } else {
            logger.warn({ error: message }, 'Credential store unavailable during resolution');
        }
        return { success: false, reason: 'STORE_UNAVAILABLE' };
    }

    if (tier === null) {
        logger.warn({ credentialHint: credentialHint(credential) }, 'Unrecognized credential presented');
        return { success: false, reason: 'UNRECOGNIZED_CREDENTIAL' };
    }

    logger.debug({ tier }, 'Credential resolved');
    return { success: true, tier };
}
