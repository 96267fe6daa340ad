import { abortableSleep } from '../utils/abortable-sleep.js';

export interface RateLimitPolicy {
    /** Minimum spacing between two operations of one kind on one session. */
    minDelayMs: number;
    /** Upper bound of a single wait; never lower than `minDelayMs`. */
    maxDelayMs: number;
    /** Additive random delay in `[0, jitterMs]`. */
    jitterMs: number;
}

export interface RateLimiterOptions extends Partial<RateLimitPolicy> {
    now?: () => number;
    random?: () => number;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const DEFAULT_RATE_LIMIT_POLICY: Readonly<RateLimitPolicy> = {
    minDelayMs: 2_000,
    maxDelayMs: 10_000,
    jitterMs: 500,
};

type SlotTable = Map<string, number>;

/**
 * Spaces protocol-affecting operations per `session:operationKind` key.
 *
 * Each call reserves its slot synchronously before suspending, so concurrent
 * callers on the same key queue up behind each other instead of racing.
 * Only the awaiting work unit is suspended.
 */
export class RateLimiter {
    readonly #policy: Readonly<RateLimitPolicy>;
    readonly #slots: SlotTable;
    readonly #now: () => number;
    readonly #random: () => number;
    readonly #sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

    constructor(options: RateLimiterOptions = {}, slots: SlotTable = new Map()) {
        this.#policy = normalizePolicy({
            minDelayMs: options.minDelayMs ?? DEFAULT_RATE_LIMIT_POLICY.minDelayMs,
            maxDelayMs: options.maxDelayMs ?? DEFAULT_RATE_LIMIT_POLICY.maxDelayMs,
            jitterMs: options.jitterMs ?? DEFAULT_RATE_LIMIT_POLICY.jitterMs,
        });
        this.#slots = slots;
        this.#now = options.now ?? Date.now;
        this.#random = options.random ?? Math.random;
        this.#sleep = options.sleep ?? abortableSleep;
    }

    get policy(): Readonly<RateLimitPolicy> {
        return { ...this.#policy };
    }

    /** A limiter with overridden bounds that shares this limiter's slot table. */
    withPolicy(overrides: Partial<RateLimitPolicy>): RateLimiter {
        return new RateLimiter(
            {
                ...this.#policy,
                ...stripUndefined(overrides),
                now: this.#now,
                random: this.#random,
                sleep: this.#sleep,
            },
            this.#slots,
        );
    }

    /**
     * Wait until the caller may perform `operationKind` on `session`.
     * Resolves with the number of milliseconds waited; rejects with
     * `JobCancelledError` when `signal` aborts first.
     */
    async waitTurn(session: string, operationKind: string, signal?: AbortSignal): Promise<number> {
        const key = `${session}:${operationKind}`;
        const startedAt = this.#now();
        const previousSlot = this.#slots.get(key);

        const spacing = previousSlot === undefined
            ? 0
            : Math.max(0, previousSlot + this.#policy.minDelayMs - startedAt);
        const jitter = this.#random() * this.#policy.jitterMs;
        const delay = Math.min(spacing + jitter, Math.max(this.#policy.maxDelayMs, spacing));
        const slot = startedAt + delay;
        this.#slots.set(key, slot);

        try {
            await this.#sleep(delay, signal);
            const remaining = slot - this.#now();
            if (remaining > 0) {
                await this.#sleep(remaining, signal);
            }
        } catch (err) {
            if (this.#slots.get(key) === slot) {
                if (previousSlot === undefined) {
                    this.#slots.delete(key);
                } else {
                    this.#slots.set(key, previousSlot);
                }
            }
            throw err;
        }

        // A late timer moves the slot to when the caller actually resumed.
        const resumedAt = this.#now();
        if (resumedAt > slot && this.#slots.get(key) === slot) {
            this.#slots.set(key, resumedAt);
        }
        return resumedAt - startedAt;
    }

    /** Forget recorded slots for one session, or for all sessions. */
    reset(session?: string): void {
        if (session === undefined) {
            this.#slots.clear();
            return;
        }
        for (const key of [...this.#slots.keys()]) {
            if (key.startsWith(`${session}:`)) {
                this.#slots.delete(key);
            }
        }
    }
}

function normalizePolicy(policy: RateLimitPolicy): RateLimitPolicy {
    const minDelayMs = Math.max(0, policy.minDelayMs);
    return {
        minDelayMs,
        maxDelayMs: Math.max(minDelayMs, policy.maxDelayMs),
        jitterMs: Math.max(0, policy.jitterMs),
    };
}

function stripUndefined(overrides: Partial<RateLimitPolicy>): Partial<RateLimitPolicy> {
    const result: Partial<RateLimitPolicy> = {};
    if (overrides.minDelayMs !== undefined) result.minDelayMs = overrides.minDelayMs;
    if (overrides.maxDelayMs !== undefined) result.maxDelayMs = overrides.maxDelayMs;
    if (overrides.jitterMs !== undefined) result.jitterMs = overrides.jitterMs;
    return result;
}
