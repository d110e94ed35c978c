import express from 'express';
import type { Express, NextFunction, Request, RequestHandler, Response } from 'express';
import crypto from 'crypto';
import { resolveAccess } from '../access/resolver.js';
import { describeRejection, RejectionReason } from '../access/rejections.js';
import { tierFromCode } from '../access/tier.js';
import type { CredentialStore } from '../credentials/credential.js';
import type { CredentialIssuanceService } from '../credentials/issuance.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import type { AdmissionGateway } from '../gateway/admissionGateway.js';
import { getRequestLogger, logger } from '../logging/logger.js';
import { createValidator, ValidationError } from '../validation/zod-middleware.js';
import { InterpretationRequestSchema, KeyIssuanceRequestSchema } from '../validation/schema.js';
import { presentedCredentials } from './credentialHeader.js';

const RETRY_AFTER_SECONDS = '1';

export interface GatewayAppDependencies {
    readonly store: CredentialStore;
    readonly gateway: AdmissionGateway;
    readonly issuance: CredentialIssuanceService;
    /** express.json size limit */
    readonly bodyLimit?: string;
}

export type GatewayRequest = Pick<Request, 'headersDistinct' | 'body'>;

type Handler = (req: GatewayRequest, res: Response) => Promise<void> | void;

const validateInterpretation = createValidator(InterpretationRequestSchema);
const validateKeyIssuance = createValidator(KeyIssuanceRequestSchema);

function requestIdOf(res: Response): string {
    const requestId: unknown = res.locals.requestId;
    return typeof requestId === 'string' ? requestId : 'unassigned';
}

export function sendRejection(res: Response, reason: RejectionReason): void {
    const descriptor = describeRejection(reason);
    if (descriptor.retryable) {
        res.setHeader('Retry-After', RETRY_AFTER_SECONDS);
    }
    res.status(descriptor.statusCode).json({
        error_message: descriptor.message,
        reason,
        retryable: descriptor.retryable
    });
}

/**
 * Route handlers, independent of the Express router so they can be driven directly.
 */
export function createGatewayHandlers(deps: GatewayAppDependencies) {
    const { store, gateway, issuance } = deps;

    const interpret: Handler = async (req, res) => {
        const access = await resolveAccess(presentedCredentials(req), store);
        if (!access.success) {
            sendRejection(res, access.reason);
            return;
        }
        const body = validateInterpretation(req.body, 'Gateway:Interpretation');

        const payload = await gateway.handle(
            { programText: body.instructions, input: Buffer.from(body.input, 'utf8') },
            access.tier
        );
        res.status(200).type('application/json').send(payload);
    };

    const issueKey: Handler = async (req, res) => {
        const access = await resolveAccess(presentedCredentials(req), store);
        if (!access.success) {
            sendRejection(res, access.reason);
            return;
        }
        if (access.tier !== 'ADMINISTRATOR') {
            getRequestLogger({ requestId: requestIdOf(res), tier: access.tier }).warn('Credential issuance denied');
            sendRejection(res, 'NOT_AUTHORIZED');
            return;
        }

        // Shape only; label rules belong to the issuance service.
        const body = validateKeyIssuance(req.body, 'Gateway:KeyIssuance');

        const requestedTier = tierFromCode(body.access_level);
        if (requestedTier === null) {
            sendRejection(res, 'INVALID_REQUESTED_TIER');
            return;
        }

        const result = await issuance.issue(requestedTier, body.label, access.tier);
        if (!result.success) {
            sendRejection(res, result.reason);
            return;
        }

        getRequestLogger({ requestId: requestIdOf(res), tier: access.tier })
            .info({ requestedTier }, 'Credential disclosed to caller');
        res.status(201).json({ key: result.credential });
    };

    const limits: Handler = async (req, res) => {
        const access = await resolveAccess(presentedCredentials(req), store);
        if (!access.success) {
            sendRejection(res, access.reason);
            return;
        }
        res.status(200).json(gateway.limitsFor(access.tier));
    };

    const status: Handler = (_req, res) => {
        res.status(200).type('text/plain').send(gateway.status());
    };

    const health: Handler = (_req, res) => {
        res.status(200).json({ status: 'ok' });
    };

    return { interpret, issueKey, limits, status, health };
}

function route(handler: Handler): RequestHandler {
    return (req, res, next) => {
        Promise.resolve(handler(req, res)).catch(next);
    };
}

function assignRequestId(req: Request, res: Response, next: NextFunction): void {
    const header = req.headersDistinct['x-request-id']?.[0];
    const requestId = header && header.length <= 128 ? header : crypto.randomUUID();
    res.locals.requestId = requestId;
    res.setHeader('x-request-id', requestId);
    next();
}

function isBodyParserError(error: unknown): error is { type: string; statusCode: number } {
    return typeof error === 'object' && error !== null
        && 'type' in error && typeof error.type === 'string'
        && 'statusCode' in error && typeof error.statusCode === 'number';
}

/**
 * Terminal error middleware. Client faults keep their 4xx status; anything
 * else is sanitized and reported with an incident id only.
 */
export function handleError(error: unknown, req: GatewayRequest, res: Response, _next: NextFunction): void {
    void _next;
    const requestId = requestIdOf(res);

    if (error instanceof ValidationError) {
        res.status(error.statusCode).json({ error_message: 'Request body failed validation', issues: error.issues });
        return;
    }

    if (isBodyParserError(error) && error.statusCode < 500) {
        getRequestLogger({ requestId }).warn({ type: error.type }, 'Rejected unreadable request body');
        res.status(error.statusCode).json({ error_message: 'Request body could not be parsed' });
        return;
    }

    const sanitized = ErrorSanitizer.sanitize(error, 'Gateway:RequestHandler');
    getRequestLogger({ requestId }).error({ incidentId: sanitized.incidentId }, 'Request failed');
    res.status(sanitized.statusCode).json({
        error_message: sanitized.publicMessage,
        incident_id: sanitized.incidentId
    });
}

export function createGatewayApp(deps: GatewayAppDependencies): Express {
    const app = express();
    const handlers = createGatewayHandlers(deps);

    app.disable('x-powered-by');
    app.use(assignRequestId);
    app.use(express.json({ limit: deps.bodyLimit ?? '256kb' }));

    app.post('/request_interpretation', route(handlers.interpret));
    app.post('/keys', route(handlers.issueKey));
    app.get('/limits', route(handlers.limits));
    app.get('/status', route(handlers.status));
    app.get('/health', route(handlers.health));

    app.use(handleError);

    logger.debug('Gateway routes mounted');
    return app;
}
