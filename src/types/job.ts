import type { ProtocolDialog, ProtocolUser } from './protocol.js';
import type { SessionStatus } from './session.js';

export const JOB_KINDS = [
    'session-create',
    'session-authorize',
    'session-disconnect',
    'send-message',
    'bulk-send',
    'parse-users',
    'list-dialogs',
    'verify-phone',
    'invite',
    'auto-respond-toggle',
] as const;

/** Tag describing which facade operation produced a job. */
export type JobKind = (typeof JOB_KINDS)[number];

/** Kinds that change a session's connection state and must never overlap on one session. */
export const MUTATION_JOB_KINDS: ReadonlySet<JobKind> = new Set<JobKind>([
    'session-create',
    'session-authorize',
    'session-disconnect',
    'auto-respond-toggle',
]);

export const JOB_STATES = ['pending', 'running', 'cancelling', 'cancelled', 'completed', 'failed'] as const;

export type JobState = (typeof JOB_STATES)[number];

export type JobErrorKind = 'validation' | 'transient' | 'fatal' | 'cancelled' | 'internal';

export interface JobFailure {
    kind: JobErrorKind;
    message: string;
}

export interface JobProgress {
    completed: number;
    total: number | null;
}

// ── Results ──────────────────────────────────────────────────────────────────

export interface SessionStepResult {
    type: 'session';
    session: string;
    status: SessionStatus;
}

export interface DeliveryResult {
    type: 'delivery';
    target: string;
}

export interface BulkItemOutcome {
    target: string;
    ok: boolean;
    error?: JobFailure;
    /** Set by phone verification: whether the number belongs to an account. */
    registered?: boolean;
    finishedAt: string;
}

/** Per-item breakdown of a bulk operation. Never all-or-nothing. */
export interface BulkSummary {
    type: 'bulk';
    total: number;
    succeeded: number;
    failed: number;
    items: BulkItemOutcome[];
}

export interface ParticipantList {
    type: 'participants';
    chats: string[];
    users: ProtocolUser[];
    /** Chats that could not be read; the rest of the list is still returned. */
    failures: BulkItemOutcome[];
}

export interface DialogList {
    type: 'dialogs';
    dialogs: ProtocolDialog[];
}

export interface AutoRespondResult {
    type: 'auto-respond';
    session: string;
    enabled: boolean;
}

export type JobResult =
    | SessionStepResult
    | DeliveryResult
    | BulkSummary
    | ParticipantList
    | DialogList
    | AutoRespondResult;

// ── Snapshots & Events ───────────────────────────────────────────────────────

/** Immutable copy of a job handed across the bridge. */
export interface JobSnapshot {
    readonly id: string;
    readonly kind: JobKind;
    readonly label: string;
    readonly sessionName: string | null;
    readonly state: JobState;
    readonly progress: Readonly<JobProgress>;
    readonly result?: JobResult;
    readonly error?: JobFailure;
    /** Whatever a bulk job had gathered before it was cancelled. */
    readonly partialResult?: JobResult;
    readonly createdAt: string;
    readonly startedAt: string | null;
    readonly endedAt: string | null;
    readonly updatedAt: string;
}

/** Returned by every dispatch; carries nothing mutable. */
export interface JobHandle {
    readonly id: string;
    readonly kind: JobKind;
}

export interface JobFilter {
    kind?: JobKind;
    state?: JobState;
    sessionName?: string;
}

export type JobEventType = 'job:created' | 'job:transition' | 'job:progress' | 'job:purged';

export interface JobEvent {
    type: JobEventType;
    jobId: string;
    /** Monotonic per registry; strictly increasing within one job. */
    seq: number;
    previousState: JobState | null;
    snapshot: JobSnapshot;
    timestamp: string;
}

export type JobEventListener = (event: JobEvent) => void;

// ── Work units ───────────────────────────────────────────────────────────────

/** Handed to every work unit; the only way a unit observes cancellation. */
export interface JobContext {
    readonly jobId: string;
    readonly signal: AbortSignal;
    /** Throws `JobCancelledError` once cancellation was requested. */
    checkpoint(): void;
    reportProgress(completed: number, total?: number | null): void;
}

export type WorkUnit<T extends JobResult = JobResult> = (ctx: JobContext) => Promise<T>;
