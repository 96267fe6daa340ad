import { canTransition, isTerminal } from '../core/job-state.js';
import { InternalInvariantError } from '../types/errors.js';
import type {
    JobEvent,
    JobEventListener,
    JobEventType,
    JobFailure,
    JobFilter,
    JobKind,
    JobProgress,
    JobResult,
    JobSnapshot,
    JobState,
} from '../types/job.js';

export interface JobRegistration {
    id: string;
    kind: JobKind;
    label: string;
    sessionName: string | null;
    total?: number | null;
}

export interface TransitionPatch {
    result?: JobResult;
    error?: JobFailure;
    partialResult?: JobResult;
}

export interface RetentionPolicy {
    /** Terminal jobs kept at most; the oldest are evicted first. */
    maxTerminalJobs: number;
    /** Terminal jobs older than this (by end time) are evicted. */
    maxTerminalAgeMs: number;
}

export interface TaskRegistryOptions {
    retention?: Partial<RetentionPolicy>;
    now?: () => Date;
}

interface JobRecord {
    id: string;
    kind: JobKind;
    label: string;
    sessionName: string | null;
    state: JobState;
    progress: JobProgress;
    result?: JobResult;
    error?: JobFailure;
    partialResult?: JobResult;
    createdAt: string;
    startedAt: string | null;
    endedAt: string | null;
    updatedAt: string;
}

const DEFAULT_RETENTION: RetentionPolicy = {
    maxTerminalJobs: 500,
    maxTerminalAgeMs: 24 * 60 * 60 * 1000,
};

/**
 * In-memory index of every job by id.
 *
 * The registry is the single writer of job records. All reads hand out
 * deep-frozen copies, and every change is announced synchronously to the
 * registered listeners in the order it happened.
 */
export class TaskRegistry {
    readonly #records: Map<string, JobRecord> = new Map();
    readonly #issuedIds: Set<string> = new Set();
    readonly #listeners: Set<JobEventListener> = new Set();
    readonly #retention: RetentionPolicy;
    readonly #now: () => Date;
    #seq = 0;

    constructor(options: TaskRegistryOptions = {}) {
        this.#retention = {
            maxTerminalJobs: Math.max(0, options.retention?.maxTerminalJobs ?? DEFAULT_RETENTION.maxTerminalJobs),
            maxTerminalAgeMs: Math.max(0, options.retention?.maxTerminalAgeMs ?? DEFAULT_RETENTION.maxTerminalAgeMs),
        };
        this.#now = options.now ?? (() => new Date());
    }

    register(registration: JobRegistration): JobSnapshot {
        if (this.#issuedIds.has(registration.id)) {
            throw new InternalInvariantError(`[TaskRegistry] Job id '${registration.id}' was already issued.`);
        }

        const timestamp = this.#now().toISOString();
        const record: JobRecord = {
            id: registration.id,
            kind: registration.kind,
            label: registration.label,
            sessionName: registration.sessionName,
            state: 'pending',
            progress: { completed: 0, total: registration.total ?? null },
            createdAt: timestamp,
            startedAt: null,
            endedAt: null,
            updatedAt: timestamp,
        };

        this.#issuedIds.add(record.id);
        this.#records.set(record.id, record);
        return this.#emit('job:created', record, null);
    }

    has(id: string): boolean {
        return this.#records.has(id);
    }

    get(id: string): JobSnapshot | undefined {
        const record = this.#records.get(id);
        return record ? this.#snapshot(record) : undefined;
    }

    /** Snapshots in creation order, optionally filtered. */
    list(filter: JobFilter = {}): JobSnapshot[] {
        const snapshots: JobSnapshot[] = [];
        for (const record of this.#records.values()) {
            if (filter.kind && record.kind !== filter.kind) continue;
            if (filter.state && record.state !== filter.state) continue;
            if (filter.sessionName !== undefined && record.sessionName !== filter.sessionName) continue;
            snapshots.push(this.#snapshot(record));
        }
        return snapshots;
    }

    /**
     * Move a job along one edge of the state machine.
     *
     * Requests against a job that already reached a terminal state, or for
     * the state it is already in, are no-ops. Any other illegal edge is a
     * defect and raises `InternalInvariantError`.
     */
    transition(id: string, to: JobState, patch: TransitionPatch = {}): JobSnapshot {
        const record = this.#records.get(id);
        if (!record) {
            throw new InternalInvariantError(`[TaskRegistry] Transition to '${to}' requested for unknown job '${id}'.`);
        }

        if (isTerminal(record.state) || record.state === to) {
            return this.#snapshot(record);
        }

        if (!canTransition(record.state, to)) {
            throw new InternalInvariantError(
                `[TaskRegistry] Illegal job transition '${record.state}' -> '${to}' for job '${id}'.`,
            );
        }

        const previous = record.state;
        const timestamp = this.#now().toISOString();
        record.state = to;
        record.updatedAt = timestamp;

        if (to === 'running') {
            record.startedAt = timestamp;
        }
        if (to === 'completed') {
            record.result = patch.result;
        }
        if (to === 'failed' || to === 'cancelled') {
            record.error = patch.error;
        }
        if (to === 'cancelled' && patch.partialResult) {
            record.partialResult = patch.partialResult;
        }
        if (isTerminal(to)) {
            record.endedAt = timestamp;
        }

        return this.#emit('job:transition', record, previous);
    }

    /** Progress only moves forward; lower values and terminal jobs are ignored. */
    updateProgress(id: string, completed: number, total?: number | null): void {
        const record = this.#records.get(id);
        if (!record || isTerminal(record.state)) return;

        const nextTotal = total === undefined ? record.progress.total : total;
        if (completed <= record.progress.completed && nextTotal === record.progress.total) return;

        record.progress = {
            completed: Math.max(record.progress.completed, completed),
            total: nextTotal,
        };
        record.updatedAt = this.#now().toISOString();
        this.#emit('job:progress', record, record.state);
    }

    /** Remove a terminal job. Returns false for unknown or still-active jobs. */
    purge(id: string): boolean {
        const record = this.#records.get(id);
        if (!record || !isTerminal(record.state)) return false;

        this.#records.delete(id);
        this.#emit('job:purged', record, record.state);
        return true;
    }

    /** Purge every terminal job. Returns how many were removed. */
    cleanup(): number {
        let removed = 0;
        for (const record of [...this.#records.values()]) {
            if (isTerminal(record.state) && this.purge(record.id)) {
                removed++;
            }
        }
        return removed;
    }

    /** Evict terminal jobs that exceed the retention count or age. */
    enforceRetention(): number {
        const nowMs = this.#now().getTime();
        const terminal = [...this.#records.values()]
            .filter((record) => isTerminal(record.state))
            .sort((left, right) => (left.endedAt ?? '').localeCompare(right.endedAt ?? ''));

        let removed = 0;
        const overflow = terminal.length - this.#retention.maxTerminalJobs;
        terminal.forEach((record, index) => {
            const endedMs = record.endedAt ? Date.parse(record.endedAt) : nowMs;
            const tooOld = nowMs - endedMs > this.#retention.maxTerminalAgeMs;
            if ((index < overflow || tooOld) && this.purge(record.id)) {
                removed++;
            }
        });
        return removed;
    }

    counts(): Record<JobState, number> {
        const counts: Record<JobState, number> = {
            pending: 0,
            running: 0,
            cancelling: 0,
            cancelled: 0,
            completed: 0,
            failed: 0,
        };
        for (const record of this.#records.values()) {
            counts[record.state]++;
        }
        return counts;
    }

    /** Subscribe to job events. Returns an unsubscribe function. */
    onEvent(listener: JobEventListener): () => void {
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #snapshot(record: JobRecord): JobSnapshot {
        return deepFreeze(structuredClone(record));
    }

    #emit(type: JobEventType, record: JobRecord, previousState: JobState | null): JobSnapshot {
        const snapshot = this.#snapshot(record);
        const event: JobEvent = Object.freeze({
            type,
            jobId: record.id,
            seq: ++this.#seq,
            previousState,
            snapshot,
            timestamp: this.#now().toISOString(),
        });

        for (const listener of this.#listeners) {
            try {
                listener(event);
            } catch (listenerErr) {
                console.error('[TaskRegistry] Event listener threw an error:', listenerErr);
            }
        }
        return snapshot;
    }
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        for (const nested of Object.values(value)) {
            deepFreeze(nested);
        }
        Object.freeze(value);
    }
    return value;
}
