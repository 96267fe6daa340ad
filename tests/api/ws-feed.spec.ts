import { describe, it, expect } from 'vitest';
import { emptyFilter, matchesJob, matchesSession, parseClientMessage, tokenMatches } from '../../src/api/ws-feed.js';
import { TaskRegistry } from '../../src/services/task-registry.js';
import type { SessionSnapshot } from '../../src/types/session.js';
import type { WsFeedFilter } from '../../src/types/websocket.js';

function session(name: string): SessionSnapshot {
    return {
        name,
        phone: '+15550001111',
        status: 'authenticated',
        autoRespond: false,
        lastError: null,
        updatedAt: '2026-01-01T00:00:00.000Z',
    };
}

describe('parseClientMessage', () => {
    it('decodes a subscription with a full filter', () => {
        const parsed = parseClientMessage(JSON.stringify({
            type: 'subscribe',
            topics: ['jobs', 'jobs', 'sessions'],
            jobIds: ['job-1'],
            sessions: ['main'],
            kinds: ['bulk-send', 'invite'],
        }));

        expect(parsed).toEqual({
            ok: true,
            message: {
                type: 'subscribe',
                topics: ['jobs', 'sessions'],
                filter: { jobIds: ['job-1'], sessions: ['main'], kinds: ['bulk-send', 'invite'] },
            },
        });
    });

    it('treats an unsubscribe without topics as leaving every topic', () => {
        expect(parseClientMessage('{"type":"unsubscribe"}')).toEqual({
            ok: true,
            message: { type: 'unsubscribe', topics: ['jobs', 'sessions', 'health'] },
        });
    });

    it('reads a missing auth token as empty', () => {
        expect(parseClientMessage('{"type":"auth"}')).toEqual({ ok: true, message: { type: 'auth', token: '' } });
    });

    it.each([
        ['not json', 'Invalid JSON.'],
        ['[1,2]', 'Message needs a string "type".'],
        ['{"type":7}', 'Message needs a string "type".'],
        ['{"type":"launch"}', 'Unknown message type: launch'],
        ['{"type":"subscribe"}', '"topics" must be a non-empty list of: jobs, sessions, health.'],
        ['{"type":"subscribe","topics":[]}', '"topics" must be a non-empty list of: jobs, sessions, health.'],
        ['{"type":"subscribe","topics":["jobs","weather"]}', 'Unknown topics: weather. Valid topics: jobs, sessions, health.'],
        ['{"type":"unsubscribe","topics":["tides"]}', 'Unknown topics: tides. Valid topics: jobs, sessions, health.'],
        ['{"type":"subscribe","topics":["jobs"],"jobIds":["a",""]}', '"jobIds" must be a list of non-empty strings.'],
        ['{"type":"subscribe","topics":["jobs"],"sessions":"main"}', '"sessions" must be a list of non-empty strings.'],
        ['{"type":"subscribe","topics":["jobs"],"kinds":"invite"}', '"kinds" must be a list of job kinds.'],
        ['{"type":"subscribe","topics":["jobs"],"kinds":["invite","teleport"]}', 'Unknown job kinds: teleport.'],
    ])('rejects %s', (raw, error) => {
        expect(parseClientMessage(raw)).toEqual({ ok: false, error });
    });
});

describe('feed filters', () => {
    const registry = new TaskRegistry();
    const mainSend = registry.register({ id: 'job-1', kind: 'send-message', label: 'Send', sessionName: 'main' });
    const unbound = registry.register({ id: 'job-2', kind: 'list-dialogs', label: 'Dialogs', sessionName: null });

    it('accepts everything with an empty filter', () => {
        expect(matchesJob(emptyFilter(), mainSend)).toBe(true);
        expect(matchesJob(emptyFilter(), unbound)).toBe(true);
        expect(matchesSession(emptyFilter(), session('backup'))).toBe(true);
    });

    it('requires every non-empty dimension to match', () => {
        const filter: WsFeedFilter = { jobIds: [], sessions: ['main'], kinds: ['send-message'] };

        expect(matchesJob(filter, mainSend)).toBe(true);
        expect(matchesJob({ ...filter, kinds: ['invite'] }, mainSend)).toBe(false);
        expect(matchesJob({ ...filter, jobIds: ['job-9'] }, mainSend)).toBe(false);
    });

    it('drops jobs without a session once sessions are filtered', () => {
        expect(matchesJob({ ...emptyFilter(), sessions: ['main'] }, unbound)).toBe(false);
        expect(matchesJob({ ...emptyFilter(), jobIds: ['job-2'] }, unbound)).toBe(true);
    });

    it('matches sessions by name', () => {
        const filter = { ...emptyFilter(), sessions: ['main'] };

        expect(matchesSession(filter, session('main'))).toBe(true);
        expect(matchesSession(filter, session('backup'))).toBe(false);
    });
});

describe('tokenMatches', () => {
    it('compares the token with the secret', () => {
        expect(tokenMatches('test-secret', 'test-secret')).toBe(true);
        expect(tokenMatches('test-secret-2', 'test-secret')).toBe(false);
    });

    it('never matches when the secret or token is empty', () => {
        expect(tokenMatches('', '')).toBe(false);
        expect(tokenMatches('test-secret', '')).toBe(false);
        expect(tokenMatches('', 'test-secret')).toBe(false);
    });
});
