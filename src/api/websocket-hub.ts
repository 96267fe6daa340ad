import type { Server } from 'node:http';
import { randomUUID } from 'node:crypto';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { getConfigValue } from '../config/json-config.js';
import type { HealthData } from '../types/api.js';
import type { JobEvent, JobSnapshot } from '../types/job.js';
import type { SessionSnapshot } from '../types/session.js';
import {
    WsCloseCode,
    type WsEventMessage,
    type WsFeedFilter,
    type WsHubMetrics,
    type WsServerMessage,
    type WsSnapshotMessage,
    type WsTopic,
} from '../types/websocket.js';
import { logThought } from '../utils/logger.js';
import { emptyFilter, matchesJob, matchesSession, parseClientMessage, tokenMatches } from './ws-feed.js';

const DEFAULT_AUTH_TIMEOUT_MS = 5_000;
const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;
const DEFAULT_MAX_BUFFERED_BYTES = 256 * 1024;

/** Current state the hub reads when a client subscribes. */
export interface WsFeedSource {
    listJobs(): JobSnapshot[];
    listSessions(): SessionSnapshot[];
    health(): HealthData;
}

export interface WsHubConfig {
    authTimeoutMs?: number;
    heartbeatIntervalMs?: number;
    /** A client whose socket buffer exceeds this loses events until it catches up. */
    maxBufferedBytes?: number;
    /** Defaults to the configured API secret. */
    resolveSecret?: () => string;
}

interface FeedClient {
    readonly id: string;
    readonly socket: WebSocket;
    authenticated: boolean;
    topics: Set<WsTopic>;
    filter: WsFeedFilter;
    alive: boolean;
    authTimer: ReturnType<typeof setTimeout> | null;
}

/**
 * Live job feed on `/ws`.
 *
 * A client authenticates with the API secret, then subscribes to topics with
 * an optional filter by job id, session or job kind. It receives a filtered
 * snapshot at once and afterwards only the events its filter accepts.
 */
export class WsHub {
    readonly #authTimeoutMs: number;
    readonly #heartbeatIntervalMs: number;
    readonly #maxBufferedBytes: number;
    readonly #resolveSecret: () => string;
    readonly #clients: Map<string, FeedClient> = new Map();
    #source: WsFeedSource | null = null;
    #server: WebSocketServer | null = null;
    #heartbeat: ReturnType<typeof setInterval> | null = null;
    #seq = 0;
    #counters = { connectionsTotal: 0, authFailures: 0, eventsSent: 0, eventsDropped: 0, staleEvicted: 0 };

    constructor(config: WsHubConfig = {}) {
        this.#authTimeoutMs = config.authTimeoutMs ?? DEFAULT_AUTH_TIMEOUT_MS;
        this.#heartbeatIntervalMs = config.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
        this.#maxBufferedBytes = config.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
        this.#resolveSecret = config.resolveSecret ?? (() => getConfigValue('API_SECRET') ?? '');
    }

    setSource(source: WsFeedSource): void {
        this.#source = source;
    }

    attach(server: Server): void {
        this.#server = new WebSocketServer({ server, path: '/ws' });
        this.#server.on('connection', (socket) => this.#accept(socket));
        this.#heartbeat = setInterval(() => this.#sweepStale(), this.#heartbeatIntervalMs);
        void logThought('[WsHub] Job feed attached on /ws.');
    }

    stop(): void {
        if (this.#heartbeat) {
            clearInterval(this.#heartbeat);
            this.#heartbeat = null;
        }
        for (const client of [...this.#clients.values()]) {
            this.#close(client, WsCloseCode.ServerShutdown, 'Server shutting down.');
        }
        this.#server?.close();
        this.#server = null;
        void logThought('[WsHub] Job feed stopped.');
    }

    // ── Publishing ───────────────────────────────────────────────────────────

    publishJob(event: JobEvent): void {
        this.#broadcast(
            {
                type: 'event',
                topic: 'jobs',
                seq: ++this.#seq,
                payload: {
                    event: event.type,
                    jobId: event.jobId,
                    jobSeq: event.seq,
                    previousState: event.previousState,
                    job: event.snapshot,
                },
            },
            (client) => matchesJob(client.filter, event.snapshot),
        );
    }

    publishSession(session: SessionSnapshot): void {
        this.#broadcast(
            { type: 'event', topic: 'sessions', seq: ++this.#seq, payload: session },
            (client) => matchesSession(client.filter, session),
        );
    }

    publishHealth(health: HealthData): void {
        this.#broadcast({ type: 'event', topic: 'health', seq: ++this.#seq, payload: health }, () => true);
    }

    getMetrics(): WsHubMetrics {
        const subscribers: Record<WsTopic, number> = { jobs: 0, sessions: 0, health: 0 };
        for (const client of this.#clients.values()) {
            for (const topic of client.topics) subscribers[topic]++;
        }
        return { clients: this.#clients.size, subscribers, ...this.#counters };
    }

    // ── Client lifecycle ─────────────────────────────────────────────────────

    #accept(socket: WebSocket): void {
        const client: FeedClient = {
            id: randomUUID(),
            socket,
            authenticated: false,
            topics: new Set(),
            filter: emptyFilter(),
            alive: true,
            authTimer: null,
        };
        this.#clients.set(client.id, client);
        this.#counters.connectionsTotal++;

        client.authTimer = setTimeout(() => {
            this.#counters.authFailures++;
            this.#close(client, WsCloseCode.AuthRequired, 'Authentication required.');
        }, this.#authTimeoutMs);

        socket.on('pong', () => {
            client.alive = true;
        });
        socket.on('message', (data: RawData) => this.#receive(client, data.toString()));
        socket.on('close', () => this.#forget(client));
        socket.on('error', (err) => {
            console.error(`[WsHub] Socket error on ${client.id}:`, err.message);
            this.#forget(client);
        });
    }

    #receive(client: FeedClient, raw: string): void {
        const parsed = parseClientMessage(raw);
        if (!parsed.ok) {
            this.#send(client, { type: 'error', code: 400, message: parsed.error });
            return;
        }

        const message = parsed.message;
        if (message.type === 'auth') {
            this.#authenticate(client, message.token);
            return;
        }
        if (message.type === 'ping') {
            this.#send(client, { type: 'pong' });
            return;
        }
        if (!client.authenticated) {
            this.#send(client, { type: 'error', code: WsCloseCode.AuthRequired, message: 'Not authenticated.' });
            return;
        }

        if (message.type === 'subscribe') {
            for (const topic of message.topics) client.topics.add(topic);
            client.filter = message.filter;
            this.#send(client, { type: 'subscribed', topics: [...client.topics], filter: client.filter });
            this.#sendSnapshot(client, message.topics);
        } else {
            for (const topic of message.topics) client.topics.delete(topic);
            this.#send(client, { type: 'unsubscribed', topics: message.topics });
        }
    }

    #authenticate(client: FeedClient, token: string): void {
        if (!tokenMatches(token, this.#resolveSecret())) {
            this.#counters.authFailures++;
            void logThought(`[WsHub] Client ${client.id} failed authentication.`);
            this.#send(client, { type: 'error', code: WsCloseCode.AuthFailed, message: 'Authentication failed.' });
            this.#close(client, WsCloseCode.AuthFailed, 'Authentication failed.');
            return;
        }
        this.#clearAuthTimer(client);
        client.authenticated = true;
        this.#send(client, { type: 'auth_ok', clientId: client.id });
    }

    #sendSnapshot(client: FeedClient, topics: WsTopic[]): void {
        const source = this.#source;
        if (!source) return;

        const snapshot: WsSnapshotMessage = { type: 'snapshot' };
        if (topics.includes('jobs')) {
            snapshot.jobs = source.listJobs().filter((job) => matchesJob(client.filter, job));
        }
        if (topics.includes('sessions')) {
            snapshot.sessions = source.listSessions().filter((session) => matchesSession(client.filter, session));
        }
        if (topics.includes('health')) {
            snapshot.health = source.health();
        }
        this.#send(client, snapshot);
    }

    #sweepStale(): void {
        for (const client of [...this.#clients.values()]) {
            if (!client.alive) {
                this.#counters.staleEvicted++;
                this.#close(client, WsCloseCode.StaleConnection, 'Stale connection.');
                continue;
            }
            client.alive = false;
            client.socket.ping();
        }
    }

    // ── Transport ────────────────────────────────────────────────────────────

    #broadcast(message: WsEventMessage, accepts: (client: FeedClient) => boolean): void {
        let frame: string | null = null;
        for (const client of this.#clients.values()) {
            if (!client.authenticated || !client.topics.has(message.topic) || !accepts(client)) continue;
            if (client.socket.bufferedAmount > this.#maxBufferedBytes) {
                this.#counters.eventsDropped++;
                continue;
            }
            frame ??= encode(message);
            if (this.#write(client, frame)) this.#counters.eventsSent++;
        }
    }

    #send(client: FeedClient, message: WsServerMessage): void {
        this.#write(client, encode(message));
    }

    #write(client: FeedClient, frame: string): boolean {
        if (client.socket.readyState !== WebSocket.OPEN) return false;
        try {
            client.socket.send(frame);
            return true;
        } catch (err) {
            console.error(`[WsHub] Send to ${client.id} failed:`, err instanceof Error ? err.message : String(err));
            return false;
        }
    }

    #close(client: FeedClient, code: WsCloseCode, reason: string): void {
        this.#forget(client);
        client.socket.close(code, reason);
    }

    #forget(client: FeedClient): void {
        this.#clearAuthTimer(client);
        this.#clients.delete(client.id);
    }

    #clearAuthTimer(client: FeedClient): void {
        if (client.authTimer) {
            clearTimeout(client.authTimer);
            client.authTimer = null;
        }
    }
}

function encode(message: WsServerMessage): string {
    return JSON.stringify({ ...message, ts: new Date().toISOString() });
}
