import { logThought } from './logger.js';
import { abortableSleep } from './abortable-sleep.js';
import { TransientProtocolError } from '../types/errors.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 15000 */
    maxDelayMs?: number;
    /** Label used in log messages for traceability. */
    label?: string;
    /** Return false to stop immediately on this error. Every error is retried when omitted. */
    shouldRetry?: (error: unknown) => boolean;
    /** Aborting rejects the pending backoff wait with `JobCancelledError`. */
    signal?: AbortSignal;
}

/** Result of a retried operation. */
export type RetryResult<T> =
    | { ok: true; value: T; attempts: number; totalDurationMs: number }
    | {
        ok: false;
        error: string;
        /** The last thrown value, kept so callers can rethrow it unchanged. */
        cause: unknown;
        attempts: number;
        totalDurationMs: number;
    };

/** The backoff knobs of `RetryOptions`, as configured per deployment. */
export type RetryPolicy = Pick<RetryOptions, 'maxAttempts' | 'baseDelayMs' | 'backoffFactor' | 'maxDelayMs'>;

const DEFAULTS: Required<Pick<RetryOptions, 'maxAttempts' | 'baseDelayMs' | 'backoffFactor' | 'maxDelayMs'>> = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 15_000,
};

/**
 * Execute an async function with bounded exponential backoff retry.
 *
 * - Retries up to `maxAttempts` times while `shouldRetry` accepts the error.
 * - Delay grows by `backoffFactor` after each attempt (capped at `maxDelayMs`);
 *   a flood wait announced by the server stretches it.
 * - All attempts are logged for postmortem traceability.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => client.sendMessage('@someone', 'hello'),
 *   { maxAttempts: 3, label: 'send-message', shouldRetry: isRetryable },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const label = options.label ?? 'unnamed';
    const shouldRetry = options.shouldRetry ?? (() => true);

    const start = Date.now();
    let lastError = '';
    let lastCause: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            const value = await fn();
            const totalDurationMs = Date.now() - start;

            if (attempt > 1) {
                void logThought(
                    `[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`,
                );
            }

            return { ok: true, value, attempts: attempt, totalDurationMs };
        } catch (err) {
            lastError = err instanceof Error ? err.message : String(err);
            lastCause = err;

            if (!shouldRetry(err)) {
                return {
                    ok: false,
                    error: lastError,
                    cause: err,
                    attempts: attempt,
                    totalDurationMs: Date.now() - start,
                };
            }

            if (attempt < maxAttempts) {
                const backoff = baseDelayMs * backoffFactor ** (attempt - 1);
                const requested = err instanceof TransientProtocolError ? (err.retryAfterMs ?? 0) : 0;
                const delay = Math.min(Math.max(backoff, requested), maxDelayMs);
                void logThought(
                    `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${lastError}. Retrying in ${delay}ms.`,
                );
                await abortableSleep(delay, options.signal);
            } else {
                void logThought(
                    `[Retry] ${label} exhausted all ${maxAttempts} attempts. Last error: ${lastError}.`,
                );
            }
        }
    }

    return {
        ok: false,
        error: lastError,
        cause: lastCause,
        attempts: maxAttempts,
        totalDurationMs: Date.now() - start,
    };
}
