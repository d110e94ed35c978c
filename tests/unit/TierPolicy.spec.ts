/**
 * Unit Tests: Tier Policy
 *
 * @see libs/access/policy.ts
 * @see libs/access/tier.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    assertTierOrdering,
    BUDGET_TABLE,
    budgetFor,
    BudgetTable,
    DEFAULT_BUDGET,
    TierOrderingViolation
} from '../../libs/access/policy.js';
import { isIssuableTier, tierCode, tierFromCode, TIERS } from '../../libs/access/tier.js';

describe('TierPolicy', () => {
    describe('budgetFor()', () => {
        it('should return the default budget for unauthenticated callers', () => {
            assert.deepStrictEqual(budgetFor('UNAUTHENTICATED'), { instructionCeiling: 500, memoryCeiling: 32_000 });
            assert.strictEqual(budgetFor('UNAUTHENTICATED'), DEFAULT_BUDGET);
        });

        it('should return the configured developer ceilings', () => {
            assert.deepStrictEqual(budgetFor('DEVELOPER'), { instructionCeiling: 1_000_000, memoryCeiling: 262_144 });
        });

        it('should be total over every tier', () => {
            for (const tier of TIERS) {
                const budget = budgetFor(tier);
                assert.ok(Number.isInteger(budget.instructionCeiling) && budget.instructionCeiling >= 0);
                assert.ok(Number.isInteger(budget.memoryCeiling) && budget.memoryCeiling >= 0);
            }
        });

        it('should read from a supplied table', () => {
            const table: BudgetTable = { ...BUDGET_TABLE, BASIC: { instructionCeiling: 7, memoryCeiling: 9 } };
            assert.deepStrictEqual(budgetFor('BASIC', table), { instructionCeiling: 7, memoryCeiling: 9 });
        });
    });

    describe('assertTierOrdering()', () => {
        it('should accept the shipped budget table', () => {
            assert.doesNotThrow(() => assertTierOrdering());
        });

        it('should reject a table where a less privileged tier gets more instructions', () => {
            const inverted: BudgetTable = {
                ...BUDGET_TABLE,
                BASIC: { instructionCeiling: 2_000_000, memoryCeiling: 65_536 }
            };

            assert.throws(
                () => assertTierOrdering(inverted),
                (err: unknown) => {
                    assert.ok(err instanceof TierOrderingViolation);
                    assert.strictEqual(err.higher, 'DEVELOPER');
                    assert.strictEqual(err.lower, 'BASIC');
                    return true;
                }
            );
        });

        it('should reject a table where only memory is inverted', () => {
            const inverted: BudgetTable = {
                ...BUDGET_TABLE,
                UNAUTHENTICATED: { instructionCeiling: 500, memoryCeiling: 100_000 }
            };

            assert.throws(() => assertTierOrdering(inverted), { name: 'TierOrderingViolation' });
        });
    });

    describe('access codes', () => {
        it('should order codes by decreasing privilege', () => {
            assert.deepStrictEqual(TIERS.map(tierCode), [0, 1, 2, 3]);
        });

        it('should round-trip known codes and reject unknown ones', () => {
            assert.strictEqual(tierFromCode(1), 'DEVELOPER');
            assert.strictEqual(tierFromCode(7), null);
            assert.strictEqual(tierFromCode(-1), null);
        });

        it('should only allow DEVELOPER and BASIC to be issued', () => {
            assert.deepStrictEqual(TIERS.filter(isIssuableTier), ['DEVELOPER', 'BASIC']);
        });
    });
});
