import type { JobState } from './job.js';
import type { MaintenanceTaskSnapshot } from './scheduler.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    /** Present on validation failures: one hint per rejected field. */
    hints?: string[];
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    runtime: {
        accepting: boolean;
        active: number;
        queued: number;
    };
    jobs: Record<JobState, number>;
    sessions: {
        total: number;
        authenticated: number;
        errored: number;
    };
    autoResponders: number;
    maintenance: MaintenanceTaskSnapshot[];
}

// ── Requests ────────────────────────────────────────────────────────────────

export interface CreateSessionRequest {
    name: string;
    apiId: number;
    apiHash: string;
    phone: string;
}

export interface AuthorizeSessionRequest {
    code: string;
    password?: string;
}

export interface SendMessageRequest {
    session: string;
    target: string;
    text: string;
}

export interface BulkSendRequest {
    session: string;
    targets: string[];
    text: string;
    delay?: {
        minDelayMs?: number;
        maxDelayMs?: number;
        jitterMs?: number;
    };
}

export interface ParticipantsRequest {
    session: string;
    chats: string[];
    limit: number;
}

export interface VerifyPhonesRequest {
    session: string;
    numbers: string[];
}

export interface InviteRequest {
    session: string;
    chat: string;
    users: string[];
}

export interface AutoRespondRequest {
    session: string;
    enabled: boolean;
    template?: string;
}

export interface AwaitJobRequest {
    timeoutMs?: number;
}

// ── Responses ───────────────────────────────────────────────────────────────

/** Returned by every route that dispatches a job. */
export interface JobAcceptedData {
    jobId: string;
    kind: string;
}
