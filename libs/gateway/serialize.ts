import type { ExecutionResult, StepSnapshot } from '../engine/types.js';

export interface SerializedSnapshot {
    memory: number[];
    memory_pointer: number;
    instruction_pointer: number;
    input_pointer: number;
    output: number[];
    is_error: boolean;
    message: string | null;
}

export interface SerializedExecution {
    snapshots: SerializedSnapshot[];
    output: number[];
    executions: number;
    time: number;
}

function serializeSnapshot(snapshot: StepSnapshot): SerializedSnapshot {
    return {
        memory: Array.from(snapshot.memory),
        memory_pointer: snapshot.memoryPointer,
        instruction_pointer: snapshot.instructionPointer,
        input_pointer: snapshot.inputPointer,
        output: Array.from(snapshot.output),
        is_error: snapshot.isError,
        message: snapshot.message
    };
}

/**
 * Render an engine result for the transport. Steps are passed through in
 * order, error-flagged ones included.
 */
export function serializeExecution(result: ExecutionResult): string {
    const payload: SerializedExecution = {
        snapshots: result.steps.map(serializeSnapshot),
        output: Array.from(result.output),
        executions: result.instructionsExecuted,
        time: result.elapsedTimeNs
    };
    return JSON.stringify(payload);
}
