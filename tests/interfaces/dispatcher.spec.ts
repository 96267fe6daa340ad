import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  FatalProtocolError,
  JobNotFoundError,
  JobTimeoutError,
  TransientProtocolError,
  ValidationError,
} from '../../src/types/errors.js';
import type { BulkSummary, JobSnapshot, ParticipantList } from '../../src/types/job.js';
import { getSessionRecord } from '../../src/services/db.js';
import { makeUser } from '../harness/fake-protocol-client.js';
import { createTestDesk, loginSession, type TestDesk } from '../harness/test-desk.js';
import { waitFor } from '../harness/wait.js';

let desk: TestDesk | null = null;

function open(...args: Parameters<typeof createTestDesk>): TestDesk {
  desk = createTestDesk(...args);
  return desk;
}

function bulkOf(snapshot: JobSnapshot): BulkSummary {
  const outcome = snapshot.result ?? snapshot.partialResult;
  if (outcome?.type !== 'bulk') throw new Error(`Expected a bulk result, got ${outcome?.type ?? 'nothing'}`);
  return outcome;
}

function participantsOf(snapshot: JobSnapshot): ParticipantList {
  if (snapshot.result?.type !== 'participants') throw new Error('Expected a participant list');
  return snapshot.result;
}

afterEach(async () => {
  await desk?.shutdown();
  desk = null;
  vi.restoreAllMocks();
});

describe('Dispatcher validation', () => {
  it('rejects an empty session name synchronously and creates no job', () => {
    const { dispatcher } = open();

    expect(() => dispatcher.createSession({ name: '', apiId: 12345, apiHash: 'test-hash', phone: '+15550001111' }))
      .toThrow(ValidationError);
    expect(dispatcher.listJobs()).toEqual([]);
    expect(dispatcher.listSessions()).toEqual([]);
  });

  it('collects every problem of a request into the hints', () => {
    const { dispatcher } = open();

    try {
      dispatcher.createSession({ name: ' ', apiId: 0, apiHash: '', phone: 'abc' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err instanceof ValidationError ? err.hints : []).toEqual([
        'Session name must be a non-empty string.',
        'API id must be a positive integer.',
        'API hash must be a non-empty string.',
        'Phone number must look like +15550001111 (5 to 15 digits).',
      ]);
    }
  });

  it('rejects operations on unknown sessions', () => {
    const { dispatcher } = open();

    expect(() => dispatcher.sendMessage('ghost', '@alice', 'hi')).toThrow("Session 'ghost' does not exist.");
    expect(dispatcher.listJobs()).toEqual([]);
  });

  it('rejects explicit lists above the bulk ceiling', async () => {
    const current = open();
    await loginSession(current);
    const { dispatcher } = current;
    const jobsBefore = dispatcher.listJobs().length;

    expect(() => dispatcher.bulkSend('main', ['a', 'b', 'c', 'd', 'e', 'f'], 'hi'))
      .toThrow('Targets may hold at most 5 entries (got 6).');
    expect(() => dispatcher.verifyPhone('main', ['12'])).toThrow(ValidationError);
    expect(() => dispatcher.getParticipants('main', '@chat', 0)).toThrow('Limit must be a positive integer.');
    expect(() => dispatcher.bulkSend('main', ['a'], 'hi', { minDelayMs: -1 })).toThrow(ValidationError);
    expect(dispatcher.listJobs()).toHaveLength(jobsBefore);
  });

  it('throws JobNotFoundError for an unknown job id', () => {
    const { dispatcher } = open();
    expect(() => dispatcher.getJobStatus('missing')).toThrow(JobNotFoundError);
  });
});

describe('Dispatcher sessions', () => {
  it('walks create, authorize and password to an authenticated session', async () => {
    const { dispatcher } = open({ requirePassword: true });

    const created = await dispatcher.awaitResult(
      dispatcher.createSession({ name: 'main', apiId: 12345, apiHash: 'test-hash', phone: '+15550001111' }),
    );
    const codeStep = await dispatcher.awaitResult(dispatcher.authorizeSession('main', '12345'));
    const passwordStep = await dispatcher.awaitResult(dispatcher.authorizeSession('main', '12345', 'test-password'));

    expect(created.result).toEqual({ type: 'session', session: 'main', status: 'awaiting-code' });
    expect(codeStep.state).toBe('completed');
    expect(codeStep.result).toEqual({ type: 'session', session: 'main', status: 'awaiting-password' });
    expect(passwordStep.result).toEqual({ type: 'session', session: 'main', status: 'authenticated' });
  });

  it('never runs two mutations on one session at the same time', async () => {
    const { dispatcher, clients } = open({ latencyMs: 10 });

    const created = dispatcher.createSession({ name: 'main', apiId: 12345, apiHash: 'test-hash', phone: '+15550001111' });
    const authorized = dispatcher.authorizeSession('main', '12345');
    await dispatcher.awaitResult(created);
    const outcome = await dispatcher.awaitResult(authorized);

    expect(outcome.state).toBe('completed');
    expect(clients.get('main')?.maxConcurrentMutations).toBe(1);
  });

  it('fails authorization with a fatal error for a wrong code and keeps the session waiting', async () => {
    const { dispatcher, clients } = open({ validCode: '11111' });
    await dispatcher.awaitResult(
      dispatcher.createSession({ name: 'main', apiId: 12345, apiHash: 'test-hash', phone: '+15550001111' }),
    );

    const outcome = await dispatcher.awaitResult(dispatcher.authorizeSession('main', '99999'));

    expect(outcome.state).toBe('failed');
    expect(outcome.error).toEqual({ kind: 'fatal', message: 'PHONE_CODE_INVALID' });
    expect(clients.get('main')?.calls.filter((call) => call === 'signIn:99999')).toHaveLength(1);
    expect(dispatcher.listSessions()[0].status).toBe('awaiting-code');
  });

  it('reconnects with the stored login after a disconnect', async () => {
    const current = open();
    await loginSession(current);

    await current.dispatcher.awaitResult(current.dispatcher.disconnectSession('main'));
    expect(current.dispatcher.listSessions()[0].status).toBe('disconnected');

    const reconnected = await current.dispatcher.awaitResult(current.dispatcher.reconnectSession('main'));
    expect(reconnected.result).toEqual({ type: 'session', session: 'main', status: 'authenticated' });
  });

  it('re-creates a session on a new phone number with a fresh login', async () => {
    const current = open();
    await loginSession(current);
    const previous = current.clients.get('main');

    const recreated = await current.dispatcher.awaitResult(
      current.dispatcher.createSession({ name: 'main', apiId: 12345, apiHash: 'test-hash', phone: '+15559998888' }),
    );
    const replacement = current.clients.get('main');

    expect(recreated.result).toEqual({ type: 'session', session: 'main', status: 'awaiting-code' });
    expect(previous?.connected).toBe(false);
    expect(replacement).not.toBe(previous);
    expect(replacement?.credentials).toMatchObject({ phone: '+15559998888', sessionString: undefined });
    expect(replacement?.calls).toContain('sendCodeRequest:+15559998888');
    expect(current.dispatcher.listSessions()[0]).toMatchObject({ phone: '+15559998888', status: 'awaiting-code' });
    expect(getSessionRecord('main')).toMatchObject({ phone: '+15559998888', session_string: null });
  });

  it('keeps the login when a session is re-created on the same phone number', async () => {
    const current = open();
    await loginSession(current);
    const previous = current.clients.get('main');

    const recreated = await current.dispatcher.awaitResult(
      current.dispatcher.createSession({ name: 'main', apiId: 12345, apiHash: 'test-hash', phone: '+15550001111' }),
    );

    expect(recreated.result).toEqual({ type: 'session', session: 'main', status: 'authenticated' });
    expect(current.clients.get('main')).toBe(previous);
    expect(previous?.calls).not.toContain('disconnect');
  });

  it('removes a session and its stored login', async () => {
    const current = open();
    await loginSession(current);

    const removed = await current.dispatcher.awaitResult(current.dispatcher.removeSession('main'));

    expect(removed.state).toBe('completed');
    expect(current.dispatcher.listSessions()).toEqual([]);
    expect(current.clients.get('main')?.connected).toBe(false);
  });
});

describe('Dispatcher messaging', () => {
  it('sends one message and reports progress', async () => {
    const current = open();
    await loginSession(current);

    const outcome = await current.dispatcher.awaitResult(current.dispatcher.sendMessage('main', '@alice', 'hello'));

    expect(outcome.state).toBe('completed');
    expect(outcome.result).toEqual({ type: 'delivery', target: '@alice' });
    expect(outcome.progress).toEqual({ completed: 1, total: 1 });
    expect(current.clients.get('main')?.sent.map((message) => message.text)).toEqual(['hello']);
  });

  it('fails a send on an unauthenticated session without retrying', async () => {
    const { dispatcher } = open();
    await dispatcher.awaitResult(
      dispatcher.createSession({ name: 'main', apiId: 12345, apiHash: 'test-hash', phone: '+15550001111' }),
    );

    const outcome = await dispatcher.awaitResult(dispatcher.sendMessage('main', '@alice', 'hello'));

    expect(outcome.state).toBe('failed');
    expect(outcome.error).toEqual({
      kind: 'fatal',
      message: "Session 'main' is not authenticated (status: awaiting-code).",
    });
  });

  it('records a failing bulk item and still delivers the rest', async () => {
    const current = open({ failures: { c: new FatalProtocolError('USER_PRIVACY_RESTRICTED') } });
    await loginSession(current);

    const outcome = await current.dispatcher.awaitResult(
      current.dispatcher.bulkSend('main', ['a', 'b', 'c', 'd'], 'promo'),
    );
    const summary = bulkOf(outcome);

    expect(outcome.state).toBe('completed');
    expect(summary).toMatchObject({ total: 4, succeeded: 3, failed: 1 });
    expect(summary.items.map((item) => item.ok)).toEqual([true, true, false, true]);
    expect(summary.items[2].error).toEqual({ kind: 'fatal', message: 'USER_PRIVACY_RESTRICTED' });
    expect(current.clients.get('main')?.calls.filter((call) => call === 'sendMessage:c')).toHaveLength(1);
  });

  it('retries transient failures before giving up on the item', async () => {
    const current = open({ failures: { b: new TransientProtocolError('connection reset') } });
    await loginSession(current);

    const outcome = await current.dispatcher.awaitResult(current.dispatcher.bulkSend('main', ['a', 'b'], 'promo'));
    const summary = bulkOf(outcome);

    expect(summary.items[1]).toMatchObject({ target: 'b', ok: false, error: { kind: 'transient', message: 'connection reset' } });
    expect(current.clients.get('main')?.calls.filter((call) => call === 'sendMessage:b')).toHaveLength(3);
  });

  it('waits for a fresh rate-limit slot before every retry', async () => {
    const current = open({ failures: { b: new TransientProtocolError('connection reset') } });
    await loginSession(current);
    const client = current.clients.get('main');
    if (!client) throw new Error('Expected a client for main');
    const send = client.sendMessage.bind(client);
    const attemptedAt: number[] = [];
    vi.spyOn(client, 'sendMessage').mockImplementation(async (target, text) => {
      attemptedAt.push(Date.now());
      return send(target, text);
    });

    const outcome = await current.dispatcher.awaitResult(
      current.dispatcher.bulkSend('main', ['b'], 'paced', { minDelayMs: 100, maxDelayMs: 100, jitterMs: 0 }),
    );

    expect(bulkOf(outcome).failed).toBe(1);
    expect(attemptedAt).toHaveLength(3);
    expect(attemptedAt[1] - attemptedAt[0]).toBeGreaterThanOrEqual(95);
    expect(attemptedAt[2] - attemptedAt[1]).toBeGreaterThanOrEqual(95);
  });

  it('spaces bulk items by the configured minimum delay', async () => {
    const current = open();
    await loginSession(current);

    const startedAt = Date.now();
    const outcome = await current.dispatcher.awaitResult(
      current.dispatcher.bulkSend('main', ['a', 'b', 'c'], 'paced', { minDelayMs: 200, maxDelayMs: 200, jitterMs: 0 }),
    );
    const sent = current.clients.get('main')?.sent ?? [];

    expect(bulkOf(outcome).succeeded).toBe(3);
    expect(sent).toHaveLength(3);
    expect(sent[2].at - startedAt).toBeGreaterThanOrEqual(400);
  });

  it('cancels a pending job before it ever runs', async () => {
    const current = open();
    await loginSession(current);

    const handle = current.dispatcher.sendMessage('main', '@alice', 'never');
    expect(current.dispatcher.cancelJob(handle)).toBe(true);
    const outcome = await current.dispatcher.awaitResult(handle);

    expect(outcome.state).toBe('cancelled');
    expect(current.clients.get('main')?.calls).not.toContain('sendMessage:@alice');
  });

  it('cancels a running bulk job and keeps what it delivered', async () => {
    const current = open();
    await loginSession(current);

    const handle = current.dispatcher.bulkSend('main', ['a', 'b', 'c', 'd'], 'slow', {
      minDelayMs: 300,
      maxDelayMs: 300,
      jitterMs: 0,
    });
    await waitFor(() => current.dispatcher.getJobStatus(handle).progress.completed >= 1);
    expect(current.dispatcher.cancelJob(handle)).toBe(true);
    const outcome = await current.dispatcher.awaitResult(handle);
    const partial = bulkOf(outcome);

    expect(outcome.state).toBe('cancelled');
    expect(outcome.result).toBeUndefined();
    expect(partial.items.map((item) => item.target)).toEqual(['a']);
    expect(current.clients.get('main')?.sent).toHaveLength(1);
  });

  it('times out awaitResult while the job keeps running', async () => {
    const current = open();
    await loginSession(current);

    const handle = current.dispatcher.bulkSend('main', ['a', 'b'], 'later', { minDelayMs: 100, maxDelayMs: 100, jitterMs: 0 });

    await expect(current.dispatcher.awaitResult(handle, 20)).rejects.toBeInstanceOf(JobTimeoutError);
    expect(current.dispatcher.getJobStatus(handle).state).toBe('running');
    await expect(current.dispatcher.awaitResult(handle)).resolves.toMatchObject({ state: 'completed' });
  });
});

describe('Dispatcher discovery', () => {
  it('clamps the participant limit to the bulk ceiling', async () => {
    const users = ['1', '2', '3', '4', '5', '6', '7'].map((id) => makeUser(id));
    const current = open({ participants: { '@chat': users } });
    await loginSession(current);

    const outcome = await current.dispatcher.awaitResult(current.dispatcher.getParticipants('main', '@chat', 100));

    expect(participantsOf(outcome).users.map((user) => user.id)).toEqual(['1', '2', '3', '4', '5']);
  });

  it('merges users of several chats and lists the chats that failed', async () => {
    const current = open({
      participants: {
        '@one': [makeUser('1', 'ann'), makeUser('2', 'ben')],
        '@two': [makeUser('2', 'ben'), makeUser('3', 'cy')],
      },
      chatFailures: { '@closed': new FatalProtocolError('CHANNEL_PRIVATE') },
    });
    await loginSession(current);

    const outcome = await current.dispatcher.awaitResult(
      current.dispatcher.parseUsers('main', ['@one', '@closed', '@two'], 50),
    );
    const list = participantsOf(outcome);

    expect(list.users.map((user) => user.username)).toEqual(['ann', 'ben', 'cy']);
    expect(list.failures).toHaveLength(1);
    expect(list.failures[0]).toMatchObject({ target: '@closed', ok: false, error: { kind: 'fatal', message: 'CHANNEL_PRIVATE' } });
    expect(outcome.progress).toEqual({ completed: 3, total: 3 });
  });

  it('lists dialogs', async () => {
    const dialog = { id: '10', title: 'Team', isUser: false, isGroup: true, isChannel: false, unreadCount: 2 };
    const current = open({ dialogs: [dialog] });
    await loginSession(current);

    const outcome = await current.dispatcher.awaitResult(current.dispatcher.listDialogs('main', 20));

    expect(outcome.result).toEqual({ type: 'dialogs', dialogs: [dialog] });
  });

  it('reports which phone numbers are registered', async () => {
    const current = open({ registeredPhones: ['+15550002222'] });
    await loginSession(current);

    const outcome = await current.dispatcher.awaitResult(
      current.dispatcher.verifyPhone('main', ['+15550002222', '+15550003333']),
    );

    expect(bulkOf(outcome).items.map((item) => [item.target, item.registered])).toEqual([
      ['+15550002222', true],
      ['+15550003333', false],
    ]);
  });

  it('invites users one by one', async () => {
    const current = open();
    await loginSession(current);

    const outcome = await current.dispatcher.awaitResult(current.dispatcher.inviteUsers('main', '@team', ['ann', 'ben']));

    expect(bulkOf(outcome)).toMatchObject({ total: 2, succeeded: 2, failed: 0 });
    expect(current.clients.get('main')?.invited).toEqual([
      { chat: '@team', user: 'ann' },
      { chat: '@team', user: 'ben' },
    ]);
  });
});

describe('Dispatcher auto-respond', () => {
  it('replies to private messages while enabled and stops when disabled', async () => {
    const current = open();
    await loginSession(current);
    const client = current.clients.get('main');

    await current.dispatcher.awaitResult(current.dispatcher.toggleAutoRespond('main', true, 'Away until Monday'));
    const privateReplies = await client?.deliver({ senderId: '42', chatId: '42', text: 'hi', isPrivate: true });
    const groupReplies = await client?.deliver({ senderId: '42', chatId: '-100', text: 'hi all', isPrivate: false });

    await current.dispatcher.awaitResult(current.dispatcher.toggleAutoRespond('main', false));
    const afterDisable = await client?.deliver({ senderId: '42', chatId: '42', text: 'still there?', isPrivate: true });

    expect(privateReplies).toEqual(['Away until Monday']);
    expect(groupReplies).toEqual([]);
    expect(afterDisable).toEqual([]);
    expect(current.dispatcher.listSessions()[0].autoRespond).toBe(false);
  });

  it('requires a template when enabling', async () => {
    const current = open();
    await loginSession(current);

    expect(() => current.dispatcher.toggleAutoRespond('main', true, '  ')).toThrow('Reply template must be a non-empty string.');
  });
});

describe('Dispatcher shutdown', () => {
  it('drains, disconnects sessions and refuses new work', async () => {
    const current = open();
    await loginSession(current);

    const first = current.shutdown();
    const second = current.shutdown();
    expect(first).toBe(second);
    await first;

    expect(current.clients.get('main')?.connected).toBe(false);
    const late = current.dispatcher.sendMessage('main', '@alice', 'too late');
    expect(current.dispatcher.getJobStatus(late)).toMatchObject({
      state: 'cancelled',
      error: { kind: 'cancelled', message: 'Worker runtime is not accepting submissions.' },
    });
  });
});
