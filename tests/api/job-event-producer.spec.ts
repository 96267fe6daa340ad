import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { JobEventProducer } from '../../src/api/job-event-producer.js';
import { WsHub } from '../../src/api/websocket-hub.js';
import { createTestDesk, loginSession, type TestDesk } from '../harness/test-desk.js';

describe('JobEventProducer', () => {
  let desk: TestDesk;
  let hub: WsHub;
  let producer: JobEventProducer;

  beforeEach(() => {
    desk = createTestDesk();
    hub = new WsHub({ resolveSecret: () => 'test-secret' });
    producer = new JobEventProducer({ ...desk, hub }, { publishIntervalMs: 1_000_000 });
  });

  afterEach(async () => {
    producer.stop();
    await desk.shutdown();
    vi.restoreAllMocks();
  });

  it('forwards job events and session changes while started', async () => {
    const publishJob = vi.spyOn(hub, 'publishJob');
    const publishSession = vi.spyOn(hub, 'publishSession');
    producer.start();

    await loginSession(desk);

    expect(publishJob).toHaveBeenCalled();
    expect(publishJob.mock.calls.map(([event]) => event.snapshot.kind)).toContain('session-create');
    expect(publishSession.mock.calls.at(-1)?.[0]).toMatchObject({ name: 'main', status: 'authenticated' });
  });

  it('stops forwarding after stop', async () => {
    const publishJob = vi.spyOn(hub, 'publishJob');
    const publishSession = vi.spyOn(hub, 'publishSession');
    producer.start();
    producer.stop();

    await loginSession(desk);

    expect(publishJob).not.toHaveBeenCalled();
    expect(publishSession).not.toHaveBeenCalled();
  });

  it('hands the hub a source reading the live registry and sessions', async () => {
    const setSource = vi.spyOn(WsHub.prototype, 'setSource');
    new JobEventProducer({ ...desk, hub: new WsHub({ resolveSecret: () => 'test-secret' }) });
    await loginSession(desk);

    const source = setSource.mock.calls[0]?.[0];
    expect(source?.listSessions()).toMatchObject([{ name: 'main', status: 'authenticated' }]);
    expect(source?.listJobs().map((job) => job.kind)).toContain('session-create');
    expect(source?.health().sessions).toMatchObject({ total: 1, authenticated: 1 });
  });
});
