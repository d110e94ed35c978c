import { Tier, TIERS, tierCode } from './tier.js';

/**
 * Execution resource budget handed to the engine for one run.
 */
export interface ResourceBudget {
    /** Maximum instructions before the engine halts the program */
    readonly instructionCeiling: number;
    /** Maximum addressable tape cells */
    readonly memoryCeiling: number;
}

export type BudgetTable = Readonly<Record<Tier, ResourceBudget>>;

/** Budget for callers without a credential. */
export const DEFAULT_BUDGET: ResourceBudget = Object.freeze({
    instructionCeiling: 500,
    memoryCeiling: 32_000
});

export const BUDGET_TABLE: BudgetTable = Object.freeze({
    ADMINISTRATOR: Object.freeze({ instructionCeiling: 10_000_000, memoryCeiling: 1_048_576 }),
    DEVELOPER: Object.freeze({ instructionCeiling: 1_000_000, memoryCeiling: 262_144 }),
    BASIC: Object.freeze({ instructionCeiling: 50_000, memoryCeiling: 65_536 }),
    UNAUTHENTICATED: DEFAULT_BUDGET
});

/**
 * Resolve the resource budget for a tier.
 * Adding a tier without a case here fails compilation.
 */
export function budgetFor(tier: Tier, table: BudgetTable = BUDGET_TABLE): ResourceBudget {
    switch (tier) {
        case 'ADMINISTRATOR':
            return table.ADMINISTRATOR;
        case 'DEVELOPER':
            return table.DEVELOPER;
        case 'BASIC':
            return table.BASIC;
        case 'UNAUTHENTICATED':
            return table.UNAUTHENTICATED;
        default: {
            const unreachable: never = tier;
            throw new Error(`Unhandled tier: ${String(unreachable)}`);
        }
    }
}

export class TierOrderingViolation extends Error {
    readonly code = 'TIER_ORDERING_VIOLATION';

    constructor(
        public readonly higher: Tier,
        public readonly lower: Tier
    ) {
        super(`Budget for ${higher} (code ${tierCode(higher)}) must be >= budget for ${lower} (code ${tierCode(lower)}) on every ceiling`);
        this.name = 'TierOrderingViolation';
    }
}

/**
 * Enforce the access-code invariant: a lower code (more privilege) never
 * receives a smaller ceiling than a higher code.
 *
 * @throws TierOrderingViolation on the first offending pair
 */
export function assertTierOrdering(table: BudgetTable = BUDGET_TABLE): void {
    const ordered = [...TIERS].sort((a, b) => tierCode(a) - tierCode(b));

    for (let i = 0; i < ordered.length; i++) {
        for (let j = i + 1; j < ordered.length; j++) {
            const higher = ordered[i];
            const lower = ordered[j];
            if (higher === undefined || lower === undefined) continue;
            if (tierCode(higher) === tierCode(lower)) {
                throw new TierOrderingViolation(higher, lower);
            }

            const a = budgetFor(higher, table);
            const b = budgetFor(lower, table);
            if (a.instructionCeiling < b.instructionCeiling || a.memoryCeiling < b.memoryCeiling) {
                throw new TierOrderingViolation(higher, lower);
            }
        }
    }
}
