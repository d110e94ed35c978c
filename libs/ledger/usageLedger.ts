/**
 * Usage Ledger
 *
 * Aggregate, advisory counters for observability. Each counter is updated
 * independently in a single synchronous step; a snapshot taken while
 * requests are in flight may combine values from different instants.
 * Never consulted for admission decisions. Not persisted.
 */

export const LEDGER_COUNTERS = [
    'requestsServed',
    'instructionsExecuted',
    'engineTimeNs',
    'bytesReturned',
    'statusQueries'
] as const;

export type LedgerCounter = typeof LEDGER_COUNTERS[number];

export type LedgerSnapshot = Readonly<Record<LedgerCounter, bigint>>;

export class UsageLedger {
    private readonly counters: Record<LedgerCounter, bigint> = {
        requestsServed: 0n,
        instructionsExecuted: 0n,
        engineTimeNs: 0n,
        bytesReturned: 0n,
        statusQueries: 0n
    };

    /**
     * Add a non-negative amount to one counter.
     * @returns the counter's new total
     * @throws RangeError for negative or fractional amounts
     */
    public increment(counter: LedgerCounter, amount: number | bigint = 1n): bigint {
        const delta = toDelta(amount);
        const total = this.counters[counter] + delta;
        this.counters[counter] = total;
        return total;
    }

    public get(counter: LedgerCounter): bigint {
        return this.counters[counter];
    }

    public snapshot(): LedgerSnapshot {
        return Object.freeze({ ...this.counters });
    }
}

function toDelta(amount: number | bigint): bigint {
    if (typeof amount === 'bigint') {
        if (amount < 0n) {
            throw new RangeError(`Ledger increments must be non-negative, got ${amount}`);
        }
        return amount;
    }

    if (!Number.isSafeInteger(amount) || amount < 0) {
        throw new RangeError(`Ledger increments must be non-negative integers, got ${amount}`);
    }
    return BigInt(amount);
}
