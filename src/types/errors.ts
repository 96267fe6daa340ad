import type { JobErrorKind, JobFailure, JobResult } from './job.js';

/** Bad input rejected before any job is created. */
export class ValidationError extends Error {
    readonly hints: string[];

    constructor(operation: string, hints: string[]) {
        super(`${operation} rejected: ${hints.join(' ')}`);
        this.name = 'ValidationError';
        this.hints = hints;
    }
}

/** Network hiccup or flood wait; retried with backoff before the job fails. */
export class TransientProtocolError extends Error {
    readonly retryAfterMs: number | null;

    constructor(message: string, options: { cause?: unknown; retryAfterMs?: number } = {}) {
        super(message, { cause: options.cause });
        this.name = 'TransientProtocolError';
        this.retryAfterMs = options.retryAfterMs ?? null;
    }
}

/** Auth failure, ban or permanent rejection; never retried. */
export class FatalProtocolError extends Error {
    readonly code: string | null;

    constructor(message: string, options: { cause?: unknown; code?: string } = {}) {
        super(message, { cause: options.cause });
        this.name = 'FatalProtocolError';
        this.code = options.code ?? null;
    }
}

/** Raised at a checkpoint after cancellation was requested. Not a failure. */
export class JobCancelledError extends Error {
    readonly partial: JobResult | undefined;

    constructor(message = 'Job was cancelled.', partial?: JobResult) {
        super(message);
        this.name = 'JobCancelledError';
        this.partial = partial;
    }
}

/** A programming defect, e.g. a duplicate job id or an illegal state edge. */
export class InternalInvariantError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InternalInvariantError';
    }
}

/** `awaitResult` gave up waiting; the job itself keeps running. */
export class JobTimeoutError extends Error {
    readonly jobId: string;
    readonly timeoutMs: number;

    constructor(jobId: string, timeoutMs: number) {
        super(`Job ${jobId} did not finish within ${timeoutMs}ms.`);
        this.name = 'JobTimeoutError';
        this.jobId = jobId;
        this.timeoutMs = timeoutMs;
    }
}

export class JobNotFoundError extends Error {
    readonly jobId: string;

    constructor(jobId: string) {
        super(`Job ${jobId} not found.`);
        this.name = 'JobNotFoundError';
        this.jobId = jobId;
    }
}

const FATAL_MARKERS = [
    'auth_key',
    'unauthorized',
    'banned',
    'deactivated',
    'invalid',
    'privacy',
    'forbidden',
    'not found',
    'not_occupied',
    'password required',
];

/**
 * Map any thrown value to the job error taxonomy.
 * Unrecognized errors count as transient so retry stays bounded rather than skipped.
 */
export function classifyFailure(error: unknown): JobFailure {
    const message = error instanceof Error ? error.message : String(error);
    return { kind: classifyKind(error, message), message };
}

function classifyKind(error: unknown, message: string): JobErrorKind {
    if (error instanceof ValidationError) return 'validation';
    if (error instanceof JobCancelledError) return 'cancelled';
    if (error instanceof InternalInvariantError) return 'internal';
    if (error instanceof FatalProtocolError) return 'fatal';
    if (error instanceof TransientProtocolError) return 'transient';

    const lowered = message.toLowerCase();
    if (FATAL_MARKERS.some((marker) => lowered.includes(marker))) {
        return 'fatal';
    }
    return 'transient';
}

export function isRetryable(error: unknown): boolean {
    return classifyFailure(error).kind === 'transient';
}
