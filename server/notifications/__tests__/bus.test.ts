import { describe, expect, it, vi } from 'vitest';
import { createNotificationBus } from '../bus';

const clock = (start: string) => {
  let current = Date.parse(start);
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
};

const sequentialIds = () => {
  let n = 0;
  return () => `n-${++n}`;
};

describe('createNotificationBus', () => {
  it('stamps and delivers published notifications', () => {
    const time = clock('2026-05-01T10:00:00.000Z');
    const bus = createNotificationBus({ historySize: 10, now: time.now, generateId: sequentialIds() });
    const listener = vi.fn();
    bus.subscribe(listener);

    const published = bus.publish('job_status', { jobId: 'abc' });

    expect(published).toEqual({
      id: 'n-1',
      type: 'job_status',
      data: { jobId: 'abc' },
      time: '2026-05-01T10:00:00.000Z',
    });
    expect(listener).toHaveBeenCalledWith(published);
  });

  it('stops delivering after unsubscribe', () => {
    const bus = createNotificationBus({ historySize: 10 });
    const listener = vi.fn();
    const unsubscribe = bus.subscribe(listener);

    unsubscribe();
    bus.publish('job_status', null);

    expect(listener).not.toHaveBeenCalled();
    expect(bus.subscriberCount()).toBe(0);
  });

  it('keeps only the newest entries and filters by time', () => {
    const time = clock('2026-05-01T10:00:00.000Z');
    const bus = createNotificationBus({ historySize: 2, now: time.now, generateId: sequentialIds() });

    bus.publish('a', 1);
    time.advance(1000);
    bus.publish('b', 2);
    time.advance(1000);
    bus.publish('c', 3);

    expect(bus.list().map((entry) => entry.type)).toEqual(['b', 'c']);
    expect(bus.list({ since: new Date('2026-05-01T10:00:01.000Z') }).map((entry) => entry.id)).toEqual(['n-3']);
  });

  it('reports a failing subscriber and still reaches the rest', () => {
    const onListenerError = vi.fn();
    const bus = createNotificationBus({ historySize: 5, onListenerError, generateId: sequentialIds() });
    const failure = new Error('subscriber failed');
    const healthy = vi.fn();
    bus.subscribe(() => {
      throw failure;
    });
    bus.subscribe(healthy);

    const published = bus.publish('job_status', {});

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(onListenerError).toHaveBeenCalledWith(failure, published);
  });
});
