import type { ResourceBudget } from '../access/policy.js';

export interface ExecutionRequest {
    readonly programText: string;
    readonly input: Uint8Array;
}

/**
 * One engine step. Error-flagged steps are payload, not gateway faults.
 */
export interface StepSnapshot {
    readonly memory: Uint8Array;
    readonly memoryPointer: number;
    readonly instructionPointer: number;
    readonly inputPointer: number;
    /** Output accumulated up to and including this step */
    readonly output: Uint8Array;
    readonly isError: boolean;
    readonly message: string | null;
}

export interface ExecutionResult {
    readonly steps: readonly StepSnapshot[];
    readonly output: Uint8Array;
    readonly instructionsExecuted: number;
    readonly elapsedTimeNs: number;
}

/**
 * Execution Engine port.
 * The engine guarantees termination within the budget's instruction ceiling
 * and never addresses memory beyond the memory ceiling.
 */
export interface ExecutionEngine {
    run(request: ExecutionRequest, budget: ResourceBudget): Promise<ExecutionResult>;
}
