import { describe, expect, it, vi } from 'vitest';
import { TaskRegistry } from '../../src/services/task-registry.js';
import { InternalInvariantError } from '../../src/types/errors.js';
import type { JobEvent } from '../../src/types/job.js';

function register(registry: TaskRegistry, id: string, total: number | null = null) {
  return registry.register({ id, kind: 'bulk-send', label: `job ${id}`, sessionName: 'main', total });
}

describe('TaskRegistry', () => {
  it('registers jobs as pending with zero progress', () => {
    const registry = new TaskRegistry();
    const snapshot = register(registry, 'a', 3);

    expect(snapshot.state).toBe('pending');
    expect(snapshot.progress).toEqual({ completed: 0, total: 3 });
    expect(snapshot.startedAt).toBeNull();
    expect(registry.has('a')).toBe(true);
  });

  it('rejects an id that was issued before, even after a purge', () => {
    const registry = new TaskRegistry();
    register(registry, 'a');
    registry.transition('a', 'cancelled');
    registry.purge('a');

    expect(() => register(registry, 'a')).toThrow(InternalInvariantError);
  });

  it('hands out frozen copies that do not follow later changes', () => {
    const registry = new TaskRegistry();
    const before = register(registry, 'a');
    registry.transition('a', 'running');

    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before.progress)).toBe(true);
    expect(before.state).toBe('pending');
    expect(registry.get('a')?.state).toBe('running');
  });

  it('stamps start and end times along the way', () => {
    const times = ['2026-01-01T00:00:00.000Z', '2026-01-01T00:00:01.000Z', '2026-01-01T00:00:02.000Z'];
    let tick = 0;
    const registry = new TaskRegistry({ now: () => new Date(times[Math.min(tick++, times.length - 1)]) });

    register(registry, 'a');
    // register + its event consume the first two ticks
    const running = registry.transition('a', 'running');
    const done = registry.transition('a', 'completed', { result: { type: 'delivery', target: '@x' } });

    expect(running.startedAt).toBe('2026-01-01T00:00:02.000Z');
    expect(done.endedAt).toBe('2026-01-01T00:00:02.000Z');
    expect(done.result).toEqual({ type: 'delivery', target: '@x' });
  });

  it('treats transitions out of a terminal state as no-ops', () => {
    const registry = new TaskRegistry();
    register(registry, 'a');
    registry.transition('a', 'running');
    registry.transition('a', 'failed', { error: { kind: 'fatal', message: 'banned' } });

    const after = registry.transition('a', 'completed');
    expect(after.state).toBe('failed');
    expect(after.error).toEqual({ kind: 'fatal', message: 'banned' });
  });

  it('raises InternalInvariantError on an illegal edge', () => {
    const registry = new TaskRegistry();
    register(registry, 'a');

    expect(() => registry.transition('a', 'completed')).toThrow(InternalInvariantError);
    expect(() => registry.transition('missing', 'running')).toThrow(InternalInvariantError);
  });

  it('only moves progress forward', () => {
    const registry = new TaskRegistry();
    register(registry, 'a', 4);
    registry.transition('a', 'running');

    registry.updateProgress('a', 2);
    registry.updateProgress('a', 1);
    expect(registry.get('a')?.progress).toEqual({ completed: 2, total: 4 });
  });

  it('emits events with strictly increasing sequence numbers', () => {
    const registry = new TaskRegistry();
    const events: JobEvent[] = [];
    registry.onEvent((event) => events.push(event));

    register(registry, 'a', 1);
    registry.transition('a', 'running');
    registry.updateProgress('a', 1);
    registry.transition('a', 'completed', { result: { type: 'delivery', target: '@x' } });

    expect(events.map((event) => event.type)).toEqual(['job:created', 'job:transition', 'job:progress', 'job:transition']);
    expect(events.map((event) => event.seq)).toEqual([1, 2, 3, 4]);
    expect(events[3].previousState).toBe('running');
  });

  it('keeps notifying other listeners when one throws', () => {
    const registry = new TaskRegistry();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const seen: string[] = [];
    registry.onEvent(() => {
      throw new Error('listener bug');
    });
    registry.onEvent((event) => seen.push(event.type));

    register(registry, 'a');

    expect(seen).toEqual(['job:created']);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });

  it('filters listings by state, kind and session', () => {
    const registry = new TaskRegistry();
    register(registry, 'a');
    registry.register({ id: 'b', kind: 'invite', label: 'b', sessionName: 'other' });
    registry.transition('a', 'running');

    expect(registry.list({ state: 'running' }).map((job) => job.id)).toEqual(['a']);
    expect(registry.list({ kind: 'invite' }).map((job) => job.id)).toEqual(['b']);
    expect(registry.list({ sessionName: 'other' }).map((job) => job.id)).toEqual(['b']);
    expect(registry.counts()).toEqual({ pending: 1, running: 1, cancelling: 0, cancelled: 0, completed: 0, failed: 0 });
  });

  it('purges only terminal jobs', () => {
    const registry = new TaskRegistry();
    register(registry, 'a');
    register(registry, 'b');
    registry.transition('b', 'cancelled');

    expect(registry.purge('a')).toBe(false);
    expect(registry.cleanup()).toBe(1);
    expect(registry.list().map((job) => job.id)).toEqual(['a']);
  });

  it('evicts the oldest terminal jobs beyond the retention count', () => {
    let nowMs = Date.parse('2026-01-01T00:00:00.000Z');
    const registry = new TaskRegistry({
      retention: { maxTerminalJobs: 1, maxTerminalAgeMs: 60_000 },
      now: () => new Date(nowMs),
    });

    register(registry, 'old');
    registry.transition('old', 'cancelled');
    nowMs += 1000;
    register(registry, 'new');
    registry.transition('new', 'cancelled');
    register(registry, 'live');

    expect(registry.enforceRetention()).toBe(1);
    expect(registry.list().map((job) => job.id)).toEqual(['new', 'live']);

    nowMs += 120_000;
    expect(registry.enforceRetention()).toBe(1);
    expect(registry.list().map((job) => job.id)).toEqual(['live']);
  });
});
