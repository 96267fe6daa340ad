import type { HealthData } from './api.js';
import type { JobEventType, JobKind, JobSnapshot, JobState } from './job.js';
import type { SessionSnapshot } from './session.js';

/** Close codes of the `/ws` job feed. */
export const WsCloseCode = {
    AuthFailed: 4001,
    AuthRequired: 4002,
    StaleConnection: 4004,
    ServerShutdown: 4005,
} as const;

export type WsCloseCode = (typeof WsCloseCode)[keyof typeof WsCloseCode];

export const WS_TOPICS = ['jobs', 'sessions', 'health'] as const;

export type WsTopic = (typeof WS_TOPICS)[number];

/**
 * Narrows the `jobs` and `sessions` topics for one client. An empty list
 * places no restriction on that dimension.
 */
export interface WsFeedFilter {
    jobIds: string[];
    sessions: string[];
    kinds: JobKind[];
}

// ── Client → server ──────────────────────────────────────────────────────────

export type WsClientMessage =
    | { type: 'auth'; token: string }
    | { type: 'subscribe'; topics: WsTopic[]; filter: WsFeedFilter }
    | { type: 'unsubscribe'; topics: WsTopic[] }
    | { type: 'ping' };

// ── Server → client ──────────────────────────────────────────────────────────

/** One registry event as it travels on the `jobs` topic. */
export interface WsJobPayload {
    event: JobEventType;
    jobId: string;
    /** Registry sequence number; lets a client discard stale updates of a job. */
    jobSeq: number;
    previousState: JobState | null;
    job: JobSnapshot;
}

export interface WsTopicPayloads {
    jobs: WsJobPayload;
    sessions: SessionSnapshot;
    health: HealthData;
}

export type WsEventMessage = {
    [K in WsTopic]: { type: 'event'; topic: K; seq: number; payload: WsTopicPayloads[K] };
}[WsTopic];

/** Current state of the subscribed topics, after the client's filter. */
export interface WsSnapshotMessage {
    type: 'snapshot';
    jobs?: JobSnapshot[];
    sessions?: SessionSnapshot[];
    health?: HealthData;
}

export type WsServerMessage =
    | { type: 'auth_ok'; clientId: string }
    | { type: 'subscribed'; topics: WsTopic[]; filter: WsFeedFilter }
    | { type: 'unsubscribed'; topics: WsTopic[] }
    | { type: 'pong' }
    | { type: 'error'; code: number; message: string }
    | WsSnapshotMessage
    | WsEventMessage;

export interface WsHubMetrics {
    clients: number;
    subscribers: Record<WsTopic, number>;
    connectionsTotal: number;
    authFailures: number;
    eventsSent: number;
    eventsDropped: number;
    staleEvicted: number;
}
