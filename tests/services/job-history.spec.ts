import { beforeEach, describe, expect, it } from 'vitest';
import { JobHistory } from '../../src/services/job-history.js';
import { TaskRegistry } from '../../src/services/task-registry.js';
import { db } from '../../src/services/db.js';

function setup(keep = 10) {
  let nowMs = Date.parse('2026-05-01T08:00:00.000Z');
  const registry = new TaskRegistry({ now: () => new Date(nowMs) });
  const history = new JobHistory(keep);
  registry.onEvent(history.onJobEvent);
  const advance = (ms: number) => {
    nowMs += ms;
  };
  return { registry, history, advance };
}

describe('JobHistory', () => {
  beforeEach(() => {
    db.exec('DELETE FROM job_history');
  });

  it('records jobs only once they reach a terminal state', () => {
    const { registry, history } = setup();
    registry.register({ id: 'a', kind: 'send-message', label: 'Send to @x', sessionName: 'main', total: 1 });
    registry.transition('a', 'running');
    expect(history.list()).toEqual([]);

    registry.updateProgress('a', 1);
    registry.transition('a', 'completed', { result: { type: 'delivery', target: '@x' } });

    expect(history.list()).toEqual([
      {
        id: 'a',
        kind: 'send-message',
        label: 'Send to @x',
        sessionName: 'main',
        state: 'completed',
        progress: { completed: 1, total: 1 },
        error: null,
        resultJson: '{"type":"delivery","target":"@x"}',
        createdAt: '2026-05-01T08:00:00.000Z',
        startedAt: '2026-05-01T08:00:00.000Z',
        endedAt: '2026-05-01T08:00:00.000Z',
      },
    ]);
  });

  it('keeps the error of failed jobs and the partial result of cancelled ones', () => {
    const { registry, history, advance } = setup();
    registry.register({ id: 'f', kind: 'invite', label: 'Invite', sessionName: 'main' });
    registry.transition('f', 'running');
    registry.transition('f', 'failed', { error: { kind: 'fatal', message: 'CHAT_ADMIN_REQUIRED' } });
    advance(1000);
    registry.register({ id: 'c', kind: 'bulk-send', label: 'Bulk', sessionName: 'main' });
    registry.transition('c', 'running');
    registry.transition('c', 'cancelled', {
      error: { kind: 'cancelled', message: 'Cancelled by operator.' },
      partialResult: { type: 'bulk', total: 3, succeeded: 1, failed: 0, items: [] },
    });

    const [cancelled, failed] = history.list();
    expect(failed.error).toEqual({ kind: 'fatal', message: 'CHAT_ADMIN_REQUIRED' });
    expect(cancelled.state).toBe('cancelled');
    expect(cancelled.resultJson).toBe('{"type":"bulk","total":3,"succeeded":1,"failed":0,"items":[]}');
  });

  it('filters by session and honours the limit', () => {
    const { registry, history, advance } = setup();
    for (const [id, session] of [['1', 'main'], ['2', 'other'], ['3', 'main']]) {
      registry.register({ id, kind: 'send-message', label: id, sessionName: session });
      registry.transition(id, 'cancelled');
      advance(1000);
    }

    expect(history.list(50, 'main').map((entry) => entry.id)).toEqual(['3', '1']);
    expect(history.list(1).map((entry) => entry.id)).toEqual(['3']);
  });

  it('prunes everything beyond the newest entries it keeps', () => {
    const { registry, history, advance } = setup(2);
    for (const id of ['1', '2', '3']) {
      registry.register({ id, kind: 'send-message', label: id, sessionName: null });
      registry.transition(id, 'cancelled');
      advance(1000);
    }

    expect(history.prune()).toBe(1);
    expect(history.list().map((entry) => entry.id)).toEqual(['3', '2']);
  });
});
