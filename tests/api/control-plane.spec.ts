import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApiApp } from '../../src/api/router.js';
import { createSignatureGuard, signPayload } from '../../src/api/shared.js';
import { createTestDesk, loginSession, type TestDesk } from '../harness/test-desk.js';

const API_SECRET = 'test-secret';

const sign = (body?: unknown): string =>
  `sha256=${signPayload(body === undefined ? '' : JSON.stringify(body), API_SECRET)}`;

describe('control-plane routes', () => {
  let desk: TestDesk;
  let app: Express;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    desk = createTestDesk({ validCode: '12345', participants: { '@group': [] } });
    app = createApiApp({
      dispatcher: desk.dispatcher,
      history: desk.history,
      registry: desk.registry,
      runtime: desk.runtime,
      sessions: desk.sessions,
      autoResponder: desk.autoResponder,
      scheduler: desk.scheduler,
      signatureGuard: createSignatureGuard(() => API_SECRET),
    });
  });

  afterEach(async () => {
    await desk.shutdown();
    vi.restoreAllMocks();
  });

  // ── Signature ──────────────────────────────────────────────────────────────

  it('rejects a mutating request without a signature', async () => {
    const res = await request(app).post('/messages').send({ session: 'main', target: '@a', text: 'hi' });

    expect(res.status).toBe(401);
    expect(res.body).toMatchObject({ ok: false, error: 'Missing or malformed X-Signature header.' });
  });

  it('rejects a signature made with another secret', async () => {
    const body = { session: 'main', target: '@a', text: 'hi' };
    const res = await request(app)
      .post('/messages')
      .set('X-Signature', `sha256=${signPayload(JSON.stringify(body), 'other-secret')}`)
      .send(body);

    expect(res.status).toBe(403);
  });

  it('answers 503 on signed routes when no secret is configured', async () => {
    const unsigned = createApiApp({
      dispatcher: desk.dispatcher,
      history: desk.history,
      registry: desk.registry,
      runtime: desk.runtime,
      sessions: desk.sessions,
      autoResponder: desk.autoResponder,
      scheduler: desk.scheduler,
      signatureGuard: createSignatureGuard(() => ''),
    });

    const res = await request(unsigned).post('/dialogs').set('X-Signature', sign({})).send({});

    expect(res.status).toBe(503);
  });

  // ── Health & listing ───────────────────────────────────────────────────────

  it('reports health without a signature', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
    expect(res.body.data).toMatchObject({
      status: 'ok',
      runtime: { accepting: true, active: 0, queued: 0 },
      sessions: { total: 0, authenticated: 0, errored: 0 },
      autoResponders: 0,
    });
    expect(typeof res.body.correlationId).toBe('string');
  });

  it('rejects an unknown job state filter', async () => {
    const res = await request(app).get('/jobs?state=sleeping');

    expect(res.status).toBe(400);
    expect(res.body.error).toBe(
      'Unknown job state. Expected one of: pending, running, cancelling, cancelled, completed, failed.',
    );
  });

  it('answers 404 for unknown jobs and unknown routes', async () => {
    expect((await request(app).get('/jobs/missing')).body.error).toBe('Job missing not found.');
    expect((await request(app).get('/nowhere')).status).toBe(404);
  });

  // ── Sessions & operations ──────────────────────────────────────────────────

  it('runs the login flow over HTTP', async () => {
    const createBody = { name: 'main', apiId: 12345, apiHash: 'test-hash', phone: '+15550001111' };
    const created = await request(app).post('/sessions').set('X-Signature', sign(createBody)).send(createBody);

    expect(created.status).toBe(202);
    expect(created.body.data.kind).toBe('session-create');
    await desk.dispatcher.awaitResult(String(created.body.data.jobId));

    const codeBody = { code: '12345' };
    const authorized = await request(app)
      .post('/sessions/main/authorize')
      .set('X-Signature', sign(codeBody))
      .send(codeBody);
    const awaitBody = { timeoutMs: 1000 };
    const settled = await request(app)
      .post(`/jobs/${String(authorized.body.data.jobId)}/await`)
      .set('X-Signature', sign(awaitBody))
      .send(awaitBody);

    expect(settled.status).toBe(200);
    expect(settled.body.data).toMatchObject({
      state: 'completed',
      result: { type: 'session', session: 'main', status: 'authenticated' },
    });

    const sessions = await request(app).get('/sessions');
    expect(sessions.body.data.sessions).toMatchObject([{ name: 'main', status: 'authenticated' }]);
  });

  it('returns validation hints with a 400', async () => {
    await loginSession(desk);
    const body = { session: 'main', target: '', text: 'hi' };

    const res = await request(app).post('/messages').set('X-Signature', sign(body)).send(body);

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      ok: false,
      error: 'Send message rejected: Target must be a non-empty string.',
      hints: ['Target must be a non-empty string.'],
    });
  });

  it('rejects an auto-respond flag that is not a boolean', async () => {
    await loginSession(desk);
    const body = { session: 'main', enabled: 'true', template: 'Back soon.' };

    const res = await request(app).post('/auto-respond').set('X-Signature', sign(body)).send(body);

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      ok: false,
      error: 'Auto-respond toggle rejected: Enabled flag must be a boolean.',
      hints: ['Enabled flag must be a boolean.'],
    });
    expect(desk.dispatcher.listJobs({ kind: 'auto-respond-toggle' })).toEqual([]);
  });

  it('accepts a message and exposes the finished job', async () => {
    await loginSession(desk);
    const body = { session: 'main', target: '@alice', text: 'hello' };

    const accepted = await request(app).post('/messages').set('X-Signature', sign(body)).send(body);
    const jobId = String(accepted.body.data.jobId);
    await desk.dispatcher.awaitResult(jobId);

    const job = await request(app).get(`/jobs/${jobId}`);
    expect(job.body.data).toMatchObject({ state: 'completed', result: { type: 'delivery', target: '@alice' } });
    expect(desk.clients.get('main')?.sent.map((message) => message.text)).toEqual(['hello']);

    const purged = await request(app).delete(`/jobs/${jobId}`).set('X-Signature', sign());
    expect(purged.body.data).toEqual({ purged: true });
  });

  it('lists finished jobs from the history table', async () => {
    await loginSession(desk);
    const body = { session: 'main', chat: '@group', limit: 10 };
    const accepted = await request(app).post('/participants').set('X-Signature', sign(body)).send(body);
    await desk.dispatcher.awaitResult(String(accepted.body.data.jobId));

    const res = await request(app).get('/jobs/history?session=main');
    const kinds: unknown[] = res.body.data.entries.map((entry: { kind: unknown }) => entry.kind);

    expect(res.status).toBe(200);
    expect([...kinds].sort()).toEqual(['parse-users', 'session-authorize', 'session-create']);
  });

  it('removes a session over HTTP', async () => {
    await loginSession(desk);

    const accepted = await request(app).delete('/sessions/main').set('X-Signature', sign());
    expect(accepted.status).toBe(202);
    await desk.dispatcher.awaitResult(String(accepted.body.data.jobId));

    expect((await request(app).get('/sessions')).body.data.sessions).toEqual([]);
  });
});
