import { isTerminal } from '../core/job-state.js';
import { listJobHistoryRows, pruneJobHistory, saveJobHistoryRow, type JobHistoryRow } from './db.js';
import type { JobEvent, JobSnapshot } from '../types/job.js';
import { logThought } from '../utils/logger.js';

const DEFAULT_KEEP = 5_000;

export interface JobHistoryEntry {
    id: string;
    kind: string;
    label: string;
    sessionName: string | null;
    state: string;
    progress: { completed: number; total: number | null };
    error: { kind: string; message: string } | null;
    resultJson: string | null;
    createdAt: string;
    startedAt: string | null;
    endedAt: string | null;
}

/** Appends every job that reaches a terminal state to the `job_history` table. */
export class JobHistory {
    readonly #keep: number;

    constructor(keep: number = DEFAULT_KEEP) {
        this.#keep = Math.max(1, keep);
    }

    /** Registry/bridge listener; only terminal transitions are recorded. */
    readonly onJobEvent = (event: JobEvent): void => {
        if (event.type !== 'job:transition' || !isTerminal(event.snapshot.state)) return;
        this.record(event.snapshot);
    };

    record(snapshot: JobSnapshot): void {
        try {
            saveJobHistoryRow(toRow(snapshot));
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            console.error(`[JobHistory] Failed to record job '${snapshot.id}':`, message);
            void logThought(`[JobHistory] Failed to record job '${snapshot.id}': ${message}`);
        }
    }

    list(limit = 50, sessionName?: string): JobHistoryEntry[] {
        return listJobHistoryRows(Math.max(1, limit), sessionName).map(fromRow);
    }

    prune(): number {
        return pruneJobHistory(this.#keep);
    }
}

function toRow(snapshot: JobSnapshot): JobHistoryRow {
    const outcome = snapshot.result ?? snapshot.partialResult;
    return {
        id: snapshot.id,
        kind: snapshot.kind,
        label: snapshot.label,
        session_name: snapshot.sessionName,
        state: snapshot.state,
        progress_completed: snapshot.progress.completed,
        progress_total: snapshot.progress.total,
        result_json: outcome ? JSON.stringify(outcome) : null,
        error_kind: snapshot.error?.kind ?? null,
        error_message: snapshot.error?.message ?? null,
        created_at: snapshot.createdAt,
        started_at: snapshot.startedAt,
        ended_at: snapshot.endedAt,
    };
}

function fromRow(row: JobHistoryRow): JobHistoryEntry {
    return {
        id: row.id,
        kind: row.kind,
        label: row.label,
        sessionName: row.session_name,
        state: row.state,
        progress: { completed: row.progress_completed, total: row.progress_total },
        error: row.error_kind ? { kind: row.error_kind, message: row.error_message ?? '' } : null,
        resultJson: row.result_json,
        createdAt: row.created_at,
        startedAt: row.started_at,
        endedAt: row.ended_at,
    };
}
