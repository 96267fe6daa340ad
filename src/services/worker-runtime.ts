import { KeyedMutex } from './keyed-mutex.js';
import type { TaskRegistry } from './task-registry.js';
import { isTerminal } from '../core/job-state.js';
import { classifyFailure, JobCancelledError } from '../types/errors.js';
import type { JobContext, JobFailure, JobResult, WorkUnit } from '../types/job.js';
import { logThought } from '../utils/logger.js';

const DEFAULT_DRAIN_GRACE_MS = 5_000;
const NOT_ACCEPTING_MESSAGE = 'Worker runtime is not accepting submissions.';

export interface SubmitOptions {
    sessionName: string | null;
    /** Mutation units hold the session lock for their whole run. */
    mutation: boolean;
}

export interface WorkerRuntimeOptions {
    /** Ceiling on units in flight (including mutations waiting for their session lock). */
    maxConcurrent?: number;
    drainGraceMs?: number;
}

export interface DrainReport {
    cancelledPending: number;
    settled: number;
    forced: number;
    durationMs: number;
}

interface Submission {
    jobId: string;
    work: WorkUnit;
    options: SubmitOptions;
    controller: AbortController;
}

interface ActiveUnit {
    submission: Submission;
    done: Promise<void>;
}

/**
 * The single owner of in-flight network work.
 *
 * Callers hand work over with `submit()`, which only appends to an inbox and
 * returns. The inbox is drained on the runtime's own macrotask turn, in
 * arrival order, and each unit then runs as an independent async task. A
 * fault inside one unit is caught at the unit boundary and recorded on its
 * job; the runtime itself never stops because of it.
 */
export class WorkerRuntime {
    readonly #registry: TaskRegistry;
    readonly #maxConcurrent: number;
    readonly #drainGraceMs: number;
    readonly #sessionLocks = new KeyedMutex();
    readonly #inbox: Submission[] = [];
    readonly #queue: Submission[] = [];
    readonly #active: Map<string, ActiveUnit> = new Map();
    #started = false;
    #draining = false;
    #flushScheduled = false;

    constructor(registry: TaskRegistry, options: WorkerRuntimeOptions = {}) {
        this.#registry = registry;
        const ceiling = options.maxConcurrent ?? Number.POSITIVE_INFINITY;
        this.#maxConcurrent = Number.isFinite(ceiling) ? Math.max(1, Math.floor(ceiling)) : Number.POSITIVE_INFINITY;
        this.#drainGraceMs = Math.max(0, options.drainGraceMs ?? DEFAULT_DRAIN_GRACE_MS);
    }

    get accepting(): boolean {
        return !this.#draining;
    }

    get activeCount(): number {
        return this.#active.size;
    }

    get queuedCount(): number {
        return this.#inbox.length + this.#queue.length;
    }

    start(): void {
        if (this.#started || this.#draining) return;
        this.#started = true;
        void logThought('[WorkerRuntime] Started.');
        this.#scheduleFlush();
    }

    /** Enqueue a unit for a registered job. Never blocks and never throws for a drained runtime. */
    submit(jobId: string, work: WorkUnit, options: SubmitOptions): void {
        if (this.#draining) {
            this.#finalize(jobId, 'cancelled', { error: { kind: 'cancelled', message: NOT_ACCEPTING_MESSAGE } });
            return;
        }

        this.#inbox.push({ jobId, work, options, controller: new AbortController() });
        this.#scheduleFlush();
    }

    /**
     * Request cooperative cancellation.
     * A pending job is cancelled at once and never runs; a running job moves to
     * `cancelling` and its unit's signal fires. Returns false when nothing changed.
     */
    cancel(jobId: string, reason = 'Cancelled by operator.'): boolean {
        const job = this.#registry.get(jobId);
        if (!job) return false;

        if (job.state === 'pending') {
            this.#removeQueued(jobId);
            this.#active.get(jobId)?.submission.controller.abort();
            this.#finalize(jobId, 'cancelled', { error: { kind: 'cancelled', message: reason } });
            return true;
        }

        if (job.state === 'running') {
            this.#registry.transition(jobId, 'cancelling');
            this.#active.get(jobId)?.submission.controller.abort();
            return true;
        }

        return false;
    }

    /**
     * Stop accepting work, cancel everything still queued, signal running
     * units, wait up to `graceMs` for them, then force-finalize stragglers.
     * Always resolves.
     */
    async drain(graceMs: number = this.#drainGraceMs): Promise<DrainReport> {
        const startedAt = Date.now();
        const report: DrainReport = { cancelledPending: 0, settled: 0, forced: 0, durationMs: 0 };
        this.#draining = true;

        try {
            for (const submission of [...this.#inbox, ...this.#queue]) {
                if (this.#cancelForDrain(submission.jobId)) report.cancelledPending++;
            }
            this.#inbox.length = 0;
            this.#queue.length = 0;

            const inFlight = [...this.#active.values()];
            // Launched units still waiting for their session lock.
            const lockWaiters = new Set<string>();
            for (const unit of inFlight) {
                const state = this.#registry.get(unit.submission.jobId)?.state;
                if (state === 'pending') {
                    if (this.#cancelForDrain(unit.submission.jobId)) {
                        report.cancelledPending++;
                        lockWaiters.add(unit.submission.jobId);
                    }
                } else {
                    this.cancel(unit.submission.jobId, 'Cancelled by shutdown.');
                }
            }

            let graceTimer: ReturnType<typeof setTimeout> | undefined;
            const grace = new Promise<void>((resolve) => {
                graceTimer = setTimeout(resolve, Math.max(0, graceMs));
            });
            await Promise.race([Promise.allSettled(inFlight.map((unit) => unit.done)), grace]);
            clearTimeout(graceTimer);

            for (const unit of inFlight) {
                const jobId = unit.submission.jobId;
                if (lockWaiters.has(jobId)) continue;
                if (!this.#active.has(jobId)) {
                    report.settled++;
                    continue;
                }
                this.#active.delete(jobId);
                this.#finalize(jobId, 'cancelled', {
                    error: { kind: 'cancelled', message: 'Force-finalized after the shutdown grace period.' },
                });
                report.forced++;
            }
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            console.error('[WorkerRuntime] Fault during drain (ignored):', message);
            void logThought(`[WorkerRuntime] Fault during drain (ignored): ${message}`);
        }

        report.durationMs = Date.now() - startedAt;
        void logThought(
            `[WorkerRuntime] Drained: ${report.cancelledPending} pending cancelled, ${report.settled} settled, ${report.forced} forced.`,
        );
        return report;
    }

    // ── Scheduling ───────────────────────────────────────────────────────────

    #scheduleFlush(): void {
        if (!this.#started || this.#flushScheduled) return;
        this.#flushScheduled = true;
        setImmediate(() => {
            this.#flushScheduled = false;
            this.#flush();
        });
    }

    #flush(): void {
        if (this.#draining) return;

        this.#queue.push(...this.#inbox.splice(0));
        while (this.#queue.length > 0 && this.#active.size < this.#maxConcurrent) {
            const submission = this.#queue.shift();
            if (!submission) break;
            if (this.#registry.get(submission.jobId)?.state !== 'pending') continue;
            this.#launch(submission);
        }
    }

    #launch(submission: Submission): void {
        const done = this.#run(submission)
            .catch((err: unknown) => {
                this.#reportCritical(`Unit for job '${submission.jobId}' escaped its boundary`, err);
            })
            .finally(() => {
                this.#active.delete(submission.jobId);
                this.#scheduleFlush();
            });
        this.#active.set(submission.jobId, { submission, done });
    }

    async #run(submission: Submission): Promise<void> {
        const { jobId, work, options, controller } = submission;
        const lockKey = options.mutation && options.sessionName ? options.sessionName : null;
        const release = lockKey ? await this.#sessionLocks.acquire(lockKey) : null;

        try {
            if (this.#registry.get(jobId)?.state !== 'pending') return;
            this.#registry.transition(jobId, 'running');

            const context: JobContext = {
                jobId,
                signal: controller.signal,
                checkpoint: () => {
                    if (controller.signal.aborted) {
                        throw new JobCancelledError();
                    }
                },
                reportProgress: (completed, total) => {
                    this.#registry.updateProgress(jobId, completed, total);
                },
            };

            try {
                const result = await work(context);
                if (this.#forceFinalized(jobId)) return;
                this.#settleSuccess(jobId, result);
            } catch (err) {
                if (this.#forceFinalized(jobId)) return;
                this.#settleFailure(jobId, err);
            }
        } finally {
            release?.();
        }
    }

    /** Drain already recorded this straggler as cancelled. */
    #forceFinalized(jobId: string): boolean {
        const state = this.#registry.get(jobId)?.state;
        if (state === undefined || !isTerminal(state)) return false;
        void logThought(`[WorkerRuntime] Job '${jobId}' finished after it was force-finalized; outcome dropped.`);
        return true;
    }

    #settleSuccess(jobId: string, result: JobResult): void {
        const state = this.#registry.get(jobId)?.state;
        if (state === 'cancelling') {
            this.#finalize(jobId, 'cancelled', {
                error: { kind: 'cancelled', message: 'Cancelled after the in-flight step completed.' },
                partialResult: result,
            });
            return;
        }
        this.#finalize(jobId, 'completed', { result });
    }

    #settleFailure(jobId: string, err: unknown): void {
        const failure = classifyFailure(err);
        const state = this.#registry.get(jobId)?.state;

        if (failure.kind === 'cancelled' || state === 'cancelling') {
            this.#finalize(jobId, 'cancelled', {
                error: { kind: 'cancelled', message: failure.message },
                partialResult: err instanceof JobCancelledError ? err.partial : undefined,
            });
            return;
        }

        if (failure.kind === 'internal') {
            this.#reportCritical(`Invariant violated inside job '${jobId}'`, err);
        } else {
            void logThought(`[WorkerRuntime] Job '${jobId}' failed (${failure.kind}): ${failure.message}`);
        }
        this.#finalize(jobId, 'failed', { error: failure });
    }

    #finalize(
        jobId: string,
        to: 'completed' | 'failed' | 'cancelled',
        patch: { result?: JobResult; error?: JobFailure; partialResult?: JobResult },
    ): void {
        try {
            this.#registry.transition(jobId, to, patch);
        } catch (err) {
            this.#reportCritical(`Could not record '${to}' for job '${jobId}'`, err);
        }
    }

    #cancelForDrain(jobId: string): boolean {
        if (this.#registry.get(jobId)?.state !== 'pending') return false;
        this.#active.get(jobId)?.submission.controller.abort();
        this.#finalize(jobId, 'cancelled', { error: { kind: 'cancelled', message: 'Cancelled by shutdown.' } });
        return true;
    }

    #removeQueued(jobId: string): void {
        for (const list of [this.#inbox, this.#queue]) {
            const index = list.findIndex((submission) => submission.jobId === jobId);
            if (index >= 0) list.splice(index, 1);
        }
    }

    #reportCritical(context: string, err: unknown): void {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[WorkerRuntime] [CRITICAL] ${context}: ${message}`);
        void logThought(`[WorkerRuntime] [CRITICAL] ${context}: ${message}`);
    }
}
