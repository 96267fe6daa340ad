import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { IncomingMessage } from 'node:http';
import { createHmac, timingSafeEqual, randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { JobNotFoundError, JobTimeoutError, ValidationError } from '../types/errors.js';
import { getConfigValue } from '../config/json-config.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

const rawBodies = new WeakMap<IncomingMessage, string>();

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stableStringify(value: unknown): string {
    if (value === null || typeof value !== 'object') {
        const serialized = JSON.stringify(value);
        return serialized ?? 'null';
    }
    if (Array.isArray(value)) {
        return `[${value.map((item) => stableStringify(item)).join(',')}]`;
    }
    const record = isRecord(value) ? value : {};
    const keys = Object.keys(record).sort((left, right) => left.localeCompare(right));
    const entries = keys.map((key) => `${JSON.stringify(key)}:${stableStringify(record[key])}`);
    return `{${entries.join(',')}}`;
}

function getSignaturePayloadCandidates(req: Request): string[] {
    const payloads = new Set<string>();
    const rawBody = rawBodies.get(req);
    payloads.add(rawBody ?? '');

    if (req.body !== undefined) {
        payloads.add(JSON.stringify(req.body));
        payloads.add(stableStringify(req.body));
    }
    return [...payloads];
}

/** `express.json({ verify })` hook that keeps the exact bytes for signature checks. */
export function setRawRequestBody(req: IncomingMessage, _res: unknown, buffer: Buffer): void {
    rawBodies.set(req, buffer.toString('utf8'));
}

/** Hex HMAC-SHA256 of `payload`, as expected after `sha256=` in `X-Signature`. */
export function signPayload(payload: string, secret: string): string {
    return createHmac('sha256', secret).update(payload).digest('hex');
}

// ── Response Helpers ────────────────────────────────────────────────────────

function correlationIdOf(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400, hints?: string[]): void {
    const body: ApiEnvelope = {
        ok: false,
        error: scrubSensitiveText(message),
        hints: hints?.map(scrubSensitiveText),
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Auth Middleware ──────────────────────────────────────────────────────────

/**
 * Validate the `X-Signature` header on incoming signed API requests.
 *
 * Expected format: `sha256=<hex digest of HMAC-SHA256(body, secret)>`
 *
 * If no secret is configured, all signed API requests are rejected.
 */
export function createSignatureGuard(resolveSecret: () => string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        const apiSecret = resolveSecret();

        if (!apiSecret) {
            void logThought('[API] Signed request rejected: API_SECRET not configured.');
            sendError(res, 'Signed API endpoints are unavailable (missing API_SECRET).', 503);
            return;
        }

        const signatureHeader = req.headers['x-signature'];
        if (typeof signatureHeader !== 'string' || !signatureHeader.startsWith('sha256=')) {
            void logThought('[API] Signed request rejected: missing or malformed X-Signature header.');
            sendError(res, 'Missing or malformed X-Signature header.', 401);
            return;
        }

        const providedHex = signatureHeader.slice('sha256='.length);
        if (!/^[a-f0-9]{64}$/i.test(providedHex)) {
            void logThought('[API] Signed request rejected: malformed signature digest.');
            sendError(res, 'Malformed signature digest.', 401);
            return;
        }
        const provided = Buffer.from(providedHex, 'hex');
        const signatureMatches = getSignaturePayloadCandidates(req).some((payload) => {
            const expected = Buffer.from(signPayload(payload, apiSecret), 'hex');
            return provided.length === expected.length && timingSafeEqual(provided, expected);
        });

        if (!signatureMatches) {
            void logThought('[API] Signed request rejected: signature mismatch.');
            sendError(res, 'Invalid signature.', 403);
            return;
        }

        next();
    };
}

export const requireSignature: RequestHandler = createSignatureGuard(() => getConfigValue('API_SECRET') ?? '');

// ── Error Mapping ───────────────────────────────────────────────────────────

/** Map a caught error to a status code, message and validation hints. */
export function mapError(err: unknown): { status: number; message: string; hints?: string[] } {
    if (err instanceof ValidationError) {
        return { status: 400, message: scrubSensitiveText(err.message), hints: err.hints };
    }
    if (err instanceof JobNotFoundError) {
        return { status: 404, message: err.message };
    }
    if (err instanceof JobTimeoutError) {
        return { status: 504, message: err.message };
    }
    if (err instanceof Error) {
        return { status: 500, message: scrubSensitiveText(err.message) };
    }
    return { status: 500, message: scrubSensitiveText(String(err)) };
}

/** Respond to a caught error with the mapped envelope. */
export function sendMappedError(res: Response, err: unknown): void {
    const { status, message, hints } = mapError(err);
    if (status >= 500) {
        void logThought(`[API] [${correlationIdOf(res) ?? 'n/a'}] ${message}`);
    }
    sendError(res, message, status, hints);
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    const method = req.method;
    const path = req.path;
    console.log(`[API] [${correlationId}] ${method} ${path}`);
    void logThought(`[API] [${correlationId}] ${method} ${path}`);
    next();
}
