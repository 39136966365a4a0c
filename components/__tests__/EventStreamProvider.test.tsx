// @vitest-environment jsdom
import React from 'react';
import { act, cleanup, render, renderHook, screen } from '@testing-library/react';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createEventStream, type EventSourceLike, type StreamHost } from '../../services/eventStream';
import { EventStreamProvider, useEventStream, useStreamEvent } from '../EventStreamProvider';
import NotificationFeed from '../NotificationFeed';
import App from '../../App';

const createHost = () => {
  const sources: FakeSource[] = [];

  class FakeSource implements EventSourceLike {
    onmessage: ((event: MessageEvent<string>) => void) | null = null;
    onerror: ((event: Event) => void) | null = null;
    readyState = 1;
    closed = false;

    constructor(readonly url: string) {
      sources.push(this);
    }

    close() {
      this.closed = true;
      this.readyState = 2;
    }

    emit(data: string) {
      this.onmessage?.(new MessageEvent<string>('message', { data }));
    }
  }

  // Frames are never delivered; the lease is not under test here.
  const host: StreamHost = {
    EventSource: FakeSource,
    requestAnimationFrame: () => 0,
    setTimeout: (callback, ms) => setTimeout(callback, ms),
    clearTimeout: (handle) => clearTimeout(handle),
  };
  return { host, sources };
};

describe('EventStreamProvider', () => {
  afterEach(() => {
    cleanup();
  });

  it('opens the stream on mount and closes it on unmount', () => {
    const { host, sources } = createHost();
    const stream = createEventStream({ host });

    const { unmount } = render(
      <EventStreamProvider stream={stream}>
        <span>child</span>
      </EventStreamProvider>,
    );
    expect(stream.isActive()).toBe(true);
    expect(sources).toHaveLength(1);

    unmount();
    expect(stream.isActive()).toBe(false);
    expect(sources[0].closed).toBe(true);
  });

  it('leaves the stream alone when autoOpen is off', () => {
    const { host, sources } = createHost();
    const stream = createEventStream({ host });

    render(
      <EventStreamProvider stream={stream} autoOpen={false}>
        <span>child</span>
      </EventStreamProvider>,
    );

    expect(stream.isActive()).toBe(false);
    expect(sources).toHaveLength(0);
  });

  it('throws from useEventStream outside a provider', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(() => renderHook(() => useEventStream())).toThrow(
      'useEventStream must be used within an EventStreamProvider',
    );
  });

  it('delivers typed notifications to useStreamEvent until unmount', () => {
    const { host, sources } = createHost();
    const stream = createEventStream({ host });
    const handler = vi.fn();
    const wrapper = ({ children }: { children: React.ReactNode }) => (
      <EventStreamProvider stream={stream}>{children}</EventStreamProvider>
    );

    const { unmount } = renderHook(() => useStreamEvent('job_status', handler), { wrapper });
    sources[0].emit('{"type":"job_status","jobId":"abc"}');
    sources[0].emit('{"type":"other"}');

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ type: 'job_status', jobId: 'abc' });

    unmount();
    stream.open();
    sources[1].emit('{"type":"job_status","jobId":"def"}');
    expect(handler).toHaveBeenCalledTimes(1);
    stream.close();
  });
});

describe('NotificationFeed', () => {
  afterEach(() => {
    cleanup();
  });

  it('shows the connection state and the newest notifications first', () => {
    const { host, sources } = createHost();
    const stream = createEventStream({ host });

    render(
      <EventStreamProvider stream={stream}>
        <NotificationFeed limit={2} />
      </EventStreamProvider>,
    );

    expect(screen.getByText('Live')).toBeTruthy();
    expect(screen.getByText('No notifications yet.')).toBeTruthy();

    act(() => {
      sources[0].emit('{"type":"job_created","jobId":"a"}');
      sources[0].emit('{"type":"job_status","jobId":"a"}');
      sources[0].emit('{"type":"job_finished","jobId":"a"}');
    });

    const items = screen.getAllByRole('listitem');
    expect(items).toHaveLength(2);
    expect(items[0].textContent).toBe('job_finished{"jobId":"a"}');
    expect(items[1].textContent).toBe('job_status{"jobId":"a"}');
  });

  it('shows offline after the stream closes', () => {
    const { host } = createHost();
    const stream = createEventStream({ host });

    render(
      <EventStreamProvider stream={stream}>
        <NotificationFeed />
      </EventStreamProvider>,
    );
    act(() => {
      stream.close();
    });

    expect(screen.getByText('Offline')).toBeTruthy();
  });
});

describe('App', () => {
  afterEach(() => {
    cleanup();
  });

  it('opens the stream it is given and renders the feed', () => {
    const { host, sources } = createHost();
    const stream = createEventStream({ host });

    render(<App stream={stream} />);

    expect(screen.getByRole('heading', { level: 1 }).textContent).toBe('Activity');
    expect(screen.getByText('Live')).toBeTruthy();
    expect(sources).toHaveLength(1);
  });
});
