/**
 * Unit Tests: Gateway HTTP handlers
 *
 * Handlers are driven with mocked request/response objects; no socket is opened.
 *
 * @see libs/http/app.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import type { Response } from 'express';
import { createGatewayHandlers, GatewayRequest, handleError } from '../../libs/http/app.js';
import { AdmissionGateway } from '../../libs/gateway/admissionGateway.js';
import { CredentialIssuanceService } from '../../libs/credentials/issuance.js';
import { UsageLedger } from '../../libs/ledger/usageLedger.js';
import { EngineInvocationError } from '../../libs/engine/processEngine.js';
import { ValidationError } from '../../libs/validation/zod-middleware.js';
import type { ResourceBudget } from '../../libs/access/policy.js';
import type { ExecutionEngine, ExecutionRequest, ExecutionResult } from '../../libs/engine/types.js';
import { InMemoryCredentialStore } from '../helpers/inMemoryCredentialStore.js';

class FakeResponse {
    statusCode = 200;
    body: unknown;
    contentType: string | undefined;
    readonly headers: Record<string, string> = {};
    readonly locals: Record<string, unknown> = { requestId: 'req-test' };

    status(code: number): this {
        this.statusCode = code;
        return this;
    }

    type(value: string): this {
        this.contentType = value;
        return this;
    }

    json(body: unknown): this {
        this.body = body;
        return this;
    }

    send(body: unknown): this {
        this.body = body;
        return this;
    }

    setHeader(name: string, value: string): this {
        this.headers[name.toLowerCase()] = value;
        return this;
    }
}

class StubEngine implements ExecutionEngine {
    public readonly calls: { request: ExecutionRequest; budget: ResourceBudget }[] = [];

    async run(request: ExecutionRequest, budget: ResourceBudget): Promise<ExecutionResult> {
        this.calls.push({ request, budget });
        return { steps: [], output: Uint8Array.from([33]), instructionsExecuted: 3, elapsedTimeNs: 100 };
    }
}

function request(body: unknown, credentials?: string[]): GatewayRequest {
    return {
        headersDistinct: credentials ? { 'x-api-key': credentials } : {},
        body
    };
}

function asResponse(res: FakeResponse): Response {
    return res as unknown as Response;
}

describe('Gateway handlers', () => {
    let store: InMemoryCredentialStore;
    let engine: StubEngine;
    let ledger: UsageLedger;
    let handlers: ReturnType<typeof createGatewayHandlers>;

    beforeEach(() => {
        store = new InMemoryCredentialStore([
            { credential: 'admin-key', tier: 'ADMINISTRATOR', label: 'ops' },
            { credential: 'dev-key', tier: 'DEVELOPER', label: 'dev' }
        ]);
        engine = new StubEngine();
        ledger = new UsageLedger();
        handlers = createGatewayHandlers({
            store,
            gateway: new AdmissionGateway(engine, ledger),
            issuance: new CredentialIssuanceService(store)
        });
    });

    describe('POST /request_interpretation', () => {
        it('should run anonymous requests under the default budget', async () => {
            const res = new FakeResponse();

            await handlers.interpret(request({ instructions: ',.', input: 'hé' }), asResponse(res));

            assert.strictEqual(res.statusCode, 200);
            assert.strictEqual(res.contentType, 'application/json');
            assert.strictEqual(res.body, '{"snapshots":[],"output":[33],"executions":3,"time":100}');
            assert.deepStrictEqual(engine.calls[0]?.budget, { instructionCeiling: 500, memoryCeiling: 32_000 });
            assert.deepStrictEqual(Array.from(engine.calls[0]?.request.input ?? []), [104, 195, 169]);
        });

        it('should treat a missing input as empty', async () => {
            const res = new FakeResponse();

            await handlers.interpret(request({ instructions: '+' }), asResponse(res));

            assert.strictEqual(res.statusCode, 200);
            assert.strictEqual(engine.calls[0]?.request.input.length, 0);
        });

        it('should reject two credential headers with 400', async () => {
            const res = new FakeResponse();

            await handlers.interpret(request({ instructions: '+' }, ['dev-key', 'admin-key']), asResponse(res));

            assert.strictEqual(res.statusCode, 400);
            assert.deepStrictEqual(res.body, {
                error_message: 'At most one credential may be presented per request',
                reason: 'MALFORMED_CREDENTIAL_PRESENTATION',
                retryable: false
            });
            assert.strictEqual(engine.calls.length, 0);
        });

        it('should reject an unknown credential with 401 without counting it', async () => {
            const res = new FakeResponse();

            await handlers.interpret(request({ instructions: '+' }, ['not-a-real-key']), asResponse(res));

            assert.strictEqual(res.statusCode, 401);
            assert.strictEqual(ledger.get('requestsServed'), 0n);
        });

        it('should answer 503 with Retry-After when the store is down', async () => {
            store.unavailable = true;
            const res = new FakeResponse();

            await handlers.interpret(request({ instructions: '+' }, ['dev-key']), asResponse(res));

            assert.strictEqual(res.statusCode, 503);
            assert.strictEqual(res.headers['retry-after'], '1');
            assert.deepStrictEqual(res.body, {
                error_message: 'Credential store temporarily unavailable',
                reason: 'STORE_UNAVAILABLE',
                retryable: true
            });
        });

        it('should reject an unknown credential with 401 before reading the body', async () => {
            const res = new FakeResponse();

            await handlers.interpret(request({ input: 42 }, ['not-a-real-key']), asResponse(res));

            assert.strictEqual(res.statusCode, 401);
            assert.deepStrictEqual(res.body, {
                error_message: 'Credential not recognized',
                reason: 'UNRECOGNIZED_CREDENTIAL',
                retryable: false
            });
        });

        it('should throw a ValidationError for a body without instructions', async () => {
            const res = new FakeResponse();

            await assert.rejects(
                async () => handlers.interpret(request({ input: 'x' }), asResponse(res)),
                ValidationError
            );
        });
    });

    describe('POST /keys', () => {
        it('should let an administrator issue a developer key usable for /limits', async () => {
            const issued = new FakeResponse();
            await handlers.issueKey(request({ access_level: 1, label: 'test' }, ['admin-key']), asResponse(issued));

            assert.strictEqual(issued.statusCode, 201);
            const body = issued.body;
            assert.ok(body && typeof body === 'object' && 'key' in body && typeof body.key === 'string');

            const limits = new FakeResponse();
            await handlers.limits(request(undefined, [body.key]), asResponse(limits));

            assert.deepStrictEqual(limits.body, { access_level: 1, execution_limit: 1_000_000, memory_limit: 262_144 });
        });

        it('should refuse a developer caller with 403', async () => {
            const res = new FakeResponse();

            await handlers.issueKey(request({ access_level: 2, label: 'test' }, ['dev-key']), asResponse(res));

            assert.strictEqual(res.statusCode, 403);
            assert.strictEqual(store.insertCalls, 0);
        });

        it('should refuse a developer caller with 403 even when the label is blank', async () => {
            const res = new FakeResponse();

            await handlers.issueKey(request({ access_level: 1, label: '' }, ['dev-key']), asResponse(res));

            assert.strictEqual(res.statusCode, 403);
            assert.deepStrictEqual(res.body, {
                error_message: 'Insufficient access level for this operation',
                reason: 'NOT_AUTHORIZED',
                retryable: false
            });
        });

        it('should refuse a developer caller with 403 before checking the body shape', async () => {
            const res = new FakeResponse();

            await handlers.issueKey(request({ access_level: 'one' }, ['dev-key']), asResponse(res));

            assert.strictEqual(res.statusCode, 403);
        });

        it('should refuse an anonymous caller with 403 even when the label is blank', async () => {
            const res = new FakeResponse();

            await handlers.issueKey(request({ access_level: 1, label: '' }), asResponse(res));

            assert.strictEqual(res.statusCode, 403);
        });

        it('should reject an unknown credential with 401 whatever the body holds', async () => {
            const res = new FakeResponse();

            await handlers.issueKey(request({ label: 7 }, ['not-a-real-key']), asResponse(res));

            assert.strictEqual(res.statusCode, 401);
            assert.strictEqual(store.insertCalls, 0);
        });

        it('should answer INVALID_LABEL with 400 when an administrator sends a blank label', async () => {
            const res = new FakeResponse();

            await handlers.issueKey(request({ access_level: 2, label: '   ' }, ['admin-key']), asResponse(res));

            assert.strictEqual(res.statusCode, 400);
            assert.deepStrictEqual(res.body, {
                error_message: 'Credential label must be 1-128 characters',
                reason: 'INVALID_LABEL',
                retryable: false
            });
            assert.strictEqual(store.insertCalls, 0);
        });

        it('should refuse to mint an administrator key with 400', async () => {
            const res = new FakeResponse();

            await handlers.issueKey(request({ access_level: 0, label: 'test' }, ['admin-key']), asResponse(res));

            assert.strictEqual(res.statusCode, 400);
            assert.deepStrictEqual(res.body, {
                error_message: 'Requested access level cannot be issued',
                reason: 'INVALID_REQUESTED_TIER',
                retryable: false
            });
        });

        it('should map an unknown access level to 403 for non-administrators', async () => {
            const res = new FakeResponse();

            await handlers.issueKey(request({ access_level: 9, label: 'test' }), asResponse(res));

            assert.strictEqual(res.statusCode, 403);
        });

        it('should map an unknown access level to 400 for administrators', async () => {
            const res = new FakeResponse();

            await handlers.issueKey(request({ access_level: 9, label: 'test' }, ['admin-key']), asResponse(res));

            assert.strictEqual(res.statusCode, 400);
        });
    });

    describe('GET /limits and /status', () => {
        it('should report unauthenticated limits without a credential', async () => {
            const res = new FakeResponse();

            await handlers.limits(request(undefined), asResponse(res));

            assert.deepStrictEqual(res.body, { access_level: 3, execution_limit: 500, memory_limit: 32_000 });
        });

        it('should render counters as plain text', async () => {
            await handlers.interpret(request({ instructions: '+' }), asResponse(new FakeResponse()));
            const res = new FakeResponse();

            await handlers.status(request(undefined), asResponse(res));

            assert.strictEqual(res.contentType, 'text/plain');
            assert.strictEqual(
                res.body,
                'requests_served: 1\ninstructions_executed: 3\nengine_time_ns: 100\nbytes_returned: 56\nstatus_queries: 1\n'
            );
        });
    });
});

describe('handleError()', () => {
    const noop = () => undefined;

    it('should return validation issues with 400', () => {
        const res = new FakeResponse();

        handleError(new ValidationError('ctx', [{ path: 'instructions', message: 'Required' }]), request({}), asResponse(res), noop);

        assert.strictEqual(res.statusCode, 400);
        assert.deepStrictEqual(res.body, {
            error_message: 'Request body failed validation',
            issues: [{ path: 'instructions', message: 'Required' }]
        });
    });

    it('should keep the 4xx status of unreadable bodies', () => {
        const res = new FakeResponse();
        const parseError = Object.assign(new SyntaxError('Unexpected token'), { type: 'entity.parse.failed', statusCode: 400 });

        handleError(parseError, request(undefined), asResponse(res), noop);

        assert.strictEqual(res.statusCode, 400);
        assert.deepStrictEqual(res.body, { error_message: 'Request body could not be parsed' });
    });

    it('should sanitize engine failures and keep their status', () => {
        const res = new FakeResponse();

        handleError(new EngineInvocationError('Engine exited with code 1', 'EXIT'), request({}), asResponse(res), noop);

        assert.strictEqual(res.statusCode, 502);
        const body = res.body;
        assert.ok(body && typeof body === 'object' && 'error_message' in body && 'incident_id' in body);
        assert.strictEqual(body.error_message, 'An internal system error occurred.');
        assert.ok(!JSON.stringify(body).includes('code 1'));
    });

    it('should answer 500 for unexpected errors', () => {
        const res = new FakeResponse();

        handleError(new Error('password=hunter2'), request({}), asResponse(res), noop);

        assert.strictEqual(res.statusCode, 500);
        assert.ok(!JSON.stringify(res.body).includes('hunter2'));
    });
});
