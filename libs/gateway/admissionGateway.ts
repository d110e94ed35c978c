/**
 * Admission Gateway
 *
 * Orchestrates one execution for an already-resolved tier:
 * budget -> engine -> ledger -> serialized response.
 */

import { budgetFor, ResourceBudget } from '../access/policy.js';
import { Tier, tierCode } from '../access/tier.js';
import type { ExecutionEngine, ExecutionRequest } from '../engine/types.js';
import { LEDGER_COUNTERS, UsageLedger } from '../ledger/usageLedger.js';
import { logger } from '../logging/logger.js';
import { serializeExecution } from './serialize.js';

export interface LimitsView {
    access_level: number;
    execution_limit: number;
    memory_limit: number;
}

const STATUS_LABELS = {
    requestsServed: 'requests_served',
    instructionsExecuted: 'instructions_executed',
    engineTimeNs: 'engine_time_ns',
    bytesReturned: 'bytes_returned',
    statusQueries: 'status_queries'
} as const;

export class AdmissionGateway {
    constructor(
        private readonly engine: ExecutionEngine,
        private readonly ledger: UsageLedger,
        private readonly budgets: (tier: Tier) => ResourceBudget = budgetFor
    ) { }

    /**
     * Execute a request under the tier's budget and return the serialized trace.
     * Engine failures propagate; the ledger is only touched after the engine returns.
     */
    public async handle(request: ExecutionRequest, tier: Tier): Promise<string> {
        const budget = this.budgets(tier);
        const result = await this.engine.run(request, budget);

        this.ledger.increment('instructionsExecuted', result.instructionsExecuted);
        this.ledger.increment('engineTimeNs', result.elapsedTimeNs);

        const body = serializeExecution(result);
        const bytes = Buffer.byteLength(body, 'utf8');

        this.ledger.increment('bytesReturned', bytes);
        this.ledger.increment('requestsServed');

        logger.info({
            tier,
            executions: result.instructionsExecuted,
            elapsedMs: Number((result.elapsedTimeNs / 1_000_000).toFixed(2)),
            bytesReturned: bytes
        }, `executed ${result.instructionsExecuted} instructions, returned ${bytes} bytes`);

        return body;
    }

    public limitsFor(tier: Tier): LimitsView {
        const budget = this.budgets(tier);
        return {
            access_level: tierCode(tier),
            execution_limit: budget.instructionCeiling,
            memory_limit: budget.memoryCeiling
        };
    }

    /**
     * Count the status query, then render every counter as `name: value`.
     */
    public status(): string {
        this.ledger.increment('statusQueries');
        const snapshot = this.ledger.snapshot();
        return LEDGER_COUNTERS
            .map(counter => `${STATUS_LABELS[counter]}: ${snapshot[counter].toString()}`)
            .join('\n') + '\n';
    }
}
