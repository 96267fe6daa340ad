import { createHash, timingSafeEqual } from 'node:crypto';
import { JOB_KINDS, type JobKind, type JobSnapshot } from '../types/job.js';
import type { SessionSnapshot } from '../types/session.js';
import { WS_TOPICS, type WsClientMessage, type WsFeedFilter, type WsTopic } from '../types/websocket.js';
import { isRecord } from './request-body.js';

const TOPICS: ReadonlySet<string> = new Set<string>(WS_TOPICS);
const KINDS: ReadonlySet<string> = new Set<string>(JOB_KINDS);

export type ParsedClientMessage =
    | { ok: true; message: WsClientMessage }
    | { ok: false; error: string };

export function emptyFilter(): WsFeedFilter {
    return { jobIds: [], sessions: [], kinds: [] };
}

function isTopic(value: unknown): value is WsTopic {
    return typeof value === 'string' && TOPICS.has(value);
}

function isJobKind(value: unknown): value is JobKind {
    return typeof value === 'string' && KINDS.has(value);
}

/** Decode one client frame. Anything unusable comes back as an error text for the client. */
export function parseClientMessage(raw: string): ParsedClientMessage {
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch {
        return { ok: false, error: 'Invalid JSON.' };
    }
    if (!isRecord(data) || typeof data.type !== 'string') {
        return { ok: false, error: 'Message needs a string "type".' };
    }

    switch (data.type) {
        case 'auth':
            return { ok: true, message: { type: 'auth', token: typeof data.token === 'string' ? data.token : '' } };
        case 'ping':
            return { ok: true, message: { type: 'ping' } };
        case 'unsubscribe': {
            if (data.topics === undefined) {
                return { ok: true, message: { type: 'unsubscribe', topics: [...WS_TOPICS] } };
            }
            const topics = readTopics(data.topics);
            return typeof topics === 'string'
                ? { ok: false, error: topics }
                : { ok: true, message: { type: 'unsubscribe', topics } };
        }
        case 'subscribe': {
            const topics = readTopics(data.topics);
            if (typeof topics === 'string') return { ok: false, error: topics };
            const filter = readFilter(data);
            if (typeof filter === 'string') return { ok: false, error: filter };
            return { ok: true, message: { type: 'subscribe', topics, filter } };
        }
        default:
            return { ok: false, error: `Unknown message type: ${data.type}` };
    }
}

function readTopics(value: unknown): WsTopic[] | string {
    if (!Array.isArray(value) || value.length === 0) {
        return `"topics" must be a non-empty list of: ${WS_TOPICS.join(', ')}.`;
    }
    const unknown = value.filter((topic) => !isTopic(topic)).map(String);
    if (unknown.length > 0) {
        return `Unknown topics: ${unknown.join(', ')}. Valid topics: ${WS_TOPICS.join(', ')}.`;
    }
    return [...new Set(value.filter(isTopic))];
}

function readFilter(data: Record<string, unknown>): WsFeedFilter | string {
    const filter = emptyFilter();

    for (const key of ['jobIds', 'sessions'] as const) {
        const value = data[key];
        if (value === undefined) continue;
        if (!Array.isArray(value) || value.some((item) => typeof item !== 'string' || item.length === 0)) {
            return `"${key}" must be a list of non-empty strings.`;
        }
        filter[key] = value.map(String);
    }

    if (data.kinds !== undefined) {
        if (!Array.isArray(data.kinds)) return '"kinds" must be a list of job kinds.';
        const unknown = data.kinds.filter((kind) => !isJobKind(kind)).map(String);
        if (unknown.length > 0) return `Unknown job kinds: ${unknown.join(', ')}.`;
        filter.kinds = data.kinds.filter(isJobKind);
    }
    return filter;
}

export function matchesJob(filter: WsFeedFilter, job: JobSnapshot): boolean {
    if (filter.jobIds.length > 0 && !filter.jobIds.includes(job.id)) return false;
    if (filter.kinds.length > 0 && !filter.kinds.includes(job.kind)) return false;
    if (filter.sessions.length > 0) {
        return job.sessionName !== null && filter.sessions.includes(job.sessionName);
    }
    return true;
}

export function matchesSession(filter: WsFeedFilter, session: SessionSnapshot): boolean {
    return filter.sessions.length === 0 || filter.sessions.includes(session.name);
}

/** Constant-time token check; an empty secret never matches. */
export function tokenMatches(token: string, secret: string): boolean {
    if (!secret || !token) return false;
    const digest = (value: string): Buffer => createHash('sha256').update(value).digest();
    return timingSafeEqual(digest(token), digest(secret));
}
