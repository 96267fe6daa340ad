import { randomUUID } from 'node:crypto';
import { isTerminal } from '../core/job-state.js';
import type { TaskRegistry } from './task-registry.js';
import type { WorkerRuntime } from './worker-runtime.js';
import { InternalInvariantError, JobNotFoundError, JobTimeoutError } from '../types/errors.js';
import {
    MUTATION_JOB_KINDS,
    type JobEventListener,
    type JobHandle,
    type JobKind,
    type JobResult,
    type JobSnapshot,
    type WorkUnit,
} from '../types/job.js';
import { logThought } from '../utils/logger.js';

const MAX_ID_ATTEMPTS = 3;
/** Longest delay `setTimeout` honours; larger values fire at once. */
const MAX_TIMER_MS = 2_147_483_647;

export interface DispatchOptions {
    label?: string;
    sessionName?: string | null;
    /** Defaults to whether `kind` mutates session state. */
    mutation?: boolean;
    total?: number | null;
}

export interface TaskBridgeOptions {
    idFactory?: () => string;
}

export type JobRef = JobHandle | string;

/**
 * The only channel between an interaction surface and the worker runtime.
 *
 * Everything here is synchronous except `awaitResult`, which suspends only
 * its own caller. Nothing mutable is handed out: handles and snapshots are
 * frozen copies.
 */
export class TaskBridge {
    readonly #registry: TaskRegistry;
    readonly #runtime: WorkerRuntime;
    readonly #idFactory: () => string;

    constructor(registry: TaskRegistry, runtime: WorkerRuntime, options: TaskBridgeOptions = {}) {
        this.#registry = registry;
        this.#runtime = runtime;
        this.#idFactory = options.idFactory ?? randomUUID;
    }

    /** Register a pending job, post its unit to the runtime and return at once. */
    dispatch<T extends JobResult>(kind: JobKind, work: WorkUnit<T>, options: DispatchOptions = {}): JobHandle {
        const sessionName = options.sessionName ?? null;
        const snapshot = this.#register(kind, options.label ?? kind, sessionName, options.total ?? null);

        this.#runtime.submit(snapshot.id, work, {
            sessionName,
            mutation: options.mutation ?? MUTATION_JOB_KINDS.has(kind),
        });

        return Object.freeze({ id: snapshot.id, kind });
    }

    poll(ref: JobRef): JobSnapshot | undefined {
        return this.#registry.get(idOf(ref));
    }

    /**
     * Wait for the job to reach a terminal state.
     * Rejects with `JobTimeoutError` after `timeoutMs`; the job keeps running.
     */
    awaitResult(ref: JobRef, timeoutMs: number): Promise<JobSnapshot> {
        const jobId = idOf(ref);
        const current = this.#registry.get(jobId);
        if (!current) {
            return Promise.reject(new JobNotFoundError(jobId));
        }
        if (isTerminal(current.state)) {
            return Promise.resolve(current);
        }

        return new Promise<JobSnapshot>((resolve, reject) => {
            const unsubscribe = this.#registry.onEvent((event) => {
                if (event.jobId !== jobId || !isTerminal(event.snapshot.state)) return;
                clearTimeout(timer);
                unsubscribe();
                resolve(event.snapshot);
            });
            const timer = setTimeout(() => {
                unsubscribe();
                reject(new JobTimeoutError(jobId, timeoutMs));
            }, Math.min(Math.max(0, timeoutMs), MAX_TIMER_MS));
        });
    }

    /** Cooperative cancellation; repeated calls are no-ops. */
    cancel(ref: JobRef): boolean {
        return this.#runtime.cancel(idOf(ref));
    }

    /** Observe every transition and progress update. Returns an unsubscribe function. */
    onEvent(listener: JobEventListener): () => void {
        return this.#registry.onEvent(listener);
    }

    #register(kind: JobKind, label: string, sessionName: string | null, total: number | null): JobSnapshot {
        let lastError: unknown;
        for (let attempt = 1; attempt <= MAX_ID_ATTEMPTS; attempt++) {
            try {
                return this.#registry.register({ id: this.#idFactory(), kind, label, sessionName, total });
            } catch (err) {
                if (!(err instanceof InternalInvariantError)) throw err;
                lastError = err;
                console.error(`[TaskBridge] [CRITICAL] ${err.message}`);
                void logThought(`[TaskBridge] [CRITICAL] ${err.message}`);
            }
        }
        throw lastError;
    }
}

function idOf(ref: JobRef): string {
    return typeof ref === 'string' ? ref : ref.id;
}
