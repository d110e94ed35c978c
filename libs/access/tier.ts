/**
 * Access Tier Model
 *
 * Tiers are ordered by decreasing privilege. The numeric access code is the
 * value persisted in the credential store and reported to clients; a lower
 * code always means more privilege (asserted by assertTierOrdering).
 */

export const TIERS = ['ADMINISTRATOR', 'DEVELOPER', 'BASIC', 'UNAUTHENTICATED'] as const;

export type Tier = typeof TIERS[number];

/**
 * Tiers that may be minted through the issuance API.
 * ADMINISTRATOR is bootstrap-only; UNAUTHENTICATED is never stored.
 */
export const ISSUABLE_TIERS = ['DEVELOPER', 'BASIC'] as const satisfies readonly Tier[];

export type IssuableTier = typeof ISSUABLE_TIERS[number];

/**
 * Tiers that may appear in the credential table.
 */
export const STORABLE_TIERS = ['ADMINISTRATOR', 'DEVELOPER', 'BASIC'] as const satisfies readonly Tier[];

export type StorableTier = typeof STORABLE_TIERS[number];

export const TIER_CODES: Readonly<Record<Tier, number>> = Object.freeze({
    ADMINISTRATOR: 0,
    DEVELOPER: 1,
    BASIC: 2,
    UNAUTHENTICATED: 3
});

export function tierCode(tier: Tier): number {
    return TIER_CODES[tier];
}

/**
 * Map an access code back to its tier. Returns null for codes no tier owns.
 */
export function tierFromCode(code: number): Tier | null {
    return TIERS.find(tier => TIER_CODES[tier] === code) ?? null;
}

export function isIssuableTier(tier: Tier): tier is IssuableTier {
    return (ISSUABLE_TIERS as readonly Tier[]).includes(tier);
}

export function isStorableTier(tier: Tier): tier is StorableTier {
    return (STORABLE_TIERS as readonly Tier[]).includes(tier);
}
