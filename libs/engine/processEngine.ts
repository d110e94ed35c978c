import { spawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import type { ResourceBudget } from '../access/policy.js';
import { logger } from '../logging/logger.js';
import { validate } from '../validation/zod-middleware.js';
import { EngineInvocation, EngineOutputSchema } from './schema.js';
import type { ExecutionEngine, ExecutionRequest, ExecutionResult } from './types.js';

const DEFAULT_MAX_OUTPUT_BYTES = 64 * 1024 * 1024;
const STDERR_TAIL_BYTES = 2048;

/**
 * Child process surface used by the adapter.
 */
export interface EngineProcess {
    readonly stdin: Writable | null;
    readonly stdout: Readable | null;
    readonly stderr: Readable | null;
    kill(signal?: NodeJS.Signals): boolean;
    on(event: 'error', listener: (error: Error) => void): unknown;
    on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnEngine = (command: string, args: readonly string[]) => EngineProcess;

export interface ProcessEngineOptions {
    readonly command: string;
    readonly args?: readonly string[];
    /** The child is killed and the call rejected once this elapses */
    readonly timeoutMs: number;
    readonly maxOutputBytes?: number;
    readonly spawnEngine?: SpawnEngine;
}

export class EngineInvocationError extends Error {
    readonly code = 'ENGINE_INVOCATION_FAILED';
    readonly statusCode = 502;

    constructor(
        message: string,
        public readonly reason: 'SPAWN' | 'EXIT' | 'TIMEOUT' | 'OUTPUT_LIMIT' | 'MALFORMED_OUTPUT',
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'EngineInvocationError';
    }
}

const defaultSpawn: SpawnEngine = (command, args) =>
    spawn(command, [...args], { stdio: ['pipe', 'pipe', 'pipe'] });

/**
 * Runs the sandboxed engine as a child process per request.
 *
 * Protocol: one JSON document on stdin, one JSON document on stdout, exit code 0.
 * A single invocation per call; no retries.
 */
export class ProcessExecutionEngine implements ExecutionEngine {
    private readonly spawnEngine: SpawnEngine;
    private readonly maxOutputBytes: number;

    constructor(private readonly options: ProcessEngineOptions) {
        this.spawnEngine = options.spawnEngine ?? defaultSpawn;
        this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    }

    public run(request: ExecutionRequest, budget: ResourceBudget): Promise<ExecutionResult> {
        const invocation: EngineInvocation = {
            instructions: request.programText,
            input: Array.from(request.input),
            execution_limit: budget.instructionCeiling,
            memory_limit: budget.memoryCeiling
        };

        return new Promise<ExecutionResult>((resolve, reject) => {
            let child: EngineProcess;
            try {
                child = this.spawnEngine(this.options.command, this.options.args ?? []);
            } catch (error) {
                reject(new EngineInvocationError('Engine could not be started', 'SPAWN', { cause: error }));
                return;
            }

            const stdout: Buffer[] = [];
            let stdoutBytes = 0;
            let stderrTail = '';
            let settled = false;

            const settle = (outcome: () => void): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                outcome();
            };

            const timer = setTimeout(() => {
                child.kill('SIGKILL');
                settle(() => reject(new EngineInvocationError(
                    `Engine did not finish within ${this.options.timeoutMs}ms`,
                    'TIMEOUT'
                )));
            }, this.options.timeoutMs);

            child.on('error', (error) => {
                settle(() => reject(new EngineInvocationError('Engine process failed', 'SPAWN', { cause: error })));
            });

            child.stdout?.on('data', (chunk: Buffer | string) => {
                const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
                stdoutBytes += buffer.length;
                if (stdoutBytes > this.maxOutputBytes) {
                    child.kill('SIGKILL');
                    settle(() => reject(new EngineInvocationError(
                        `Engine output exceeded ${this.maxOutputBytes} bytes`,
                        'OUTPUT_LIMIT'
                    )));
                    return;
                }
                stdout.push(buffer);
            });

            child.stderr?.on('data', (chunk: Buffer | string) => {
                stderrTail = (stderrTail + chunk.toString()).slice(-STDERR_TAIL_BYTES);
            });

            child.on('close', (code, signal) => {
                settle(() => {
                    if (code !== 0) {
                        logger.error({ code, signal, stderr: stderrTail }, '[Engine] Process exited abnormally');
                        reject(new EngineInvocationError(
                            `Engine exited with ${code === null ? `signal ${signal ?? 'unknown'}` : `code ${code}`}`,
                            'EXIT'
                        ));
                        return;
                    }

                    try {
                        resolve(parseEngineOutput(Buffer.concat(stdout).toString('utf8')));
                    } catch (error) {
                        reject(new EngineInvocationError('Engine produced malformed output', 'MALFORMED_OUTPUT', { cause: error }));
                    }
                });
            });

            // EPIPE when the engine exits before reading stdin; the close handler reports the outcome.
            child.stdin?.on('error', (error) => {
                logger.debug({ error: error.message }, '[Engine] stdin closed early');
            });
            child.stdin?.end(JSON.stringify(invocation));
        });
    }
}

export function parseEngineOutput(raw: string): ExecutionResult {
    const document: unknown = JSON.parse(raw);
    return validate(EngineOutputSchema, document, 'Engine:Output');
}
