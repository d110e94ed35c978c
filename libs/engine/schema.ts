import { z } from 'zod';
import type { ExecutionResult, StepSnapshot } from './types.js';

// Counters land in the usage ledger, which only accepts safe integers.
const Uint = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

const ByteSequence = z
    .array(z.number().int().min(0).max(255))
    .transform(bytes => Uint8Array.from(bytes));

/**
 * Engine wire format for one step (snake_case, byte sequences as integer arrays).
 */
export const EngineSnapshotSchema = z
    .object({
        memory: ByteSequence,
        memory_pointer: Uint,
        instruction_pointer: Uint,
        input_pointer: Uint,
        output: ByteSequence,
        is_error: z.boolean(),
        message: z.string().nullable().optional()
    })
    .transform((snapshot): StepSnapshot => ({
        memory: snapshot.memory,
        memoryPointer: snapshot.memory_pointer,
        instructionPointer: snapshot.instruction_pointer,
        inputPointer: snapshot.input_pointer,
        output: snapshot.output,
        isError: snapshot.is_error,
        message: snapshot.message ?? null
    }));

export const EngineOutputSchema = z
    .object({
        snapshots: z.array(EngineSnapshotSchema),
        output: ByteSequence,
        executions: Uint,
        time: Uint
    })
    .transform((product): ExecutionResult => ({
        steps: product.snapshots,
        output: product.output,
        instructionsExecuted: product.executions,
        elapsedTimeNs: product.time
    }));

/**
 * Document written to the engine's stdin.
 */
export interface EngineInvocation {
    readonly instructions: string;
    readonly input: number[];
    readonly execution_limit: number;
    readonly memory_limit: number;
}
