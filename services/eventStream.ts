import { resolveStreamSettings, type StreamSettings, type StreamSettingsInput } from '../shared/config';
import { silentLogger, type Logger } from '../shared/logger';
import { parseNotification, type StreamNotification } from '../shared/notifications';
import { createLease, type Timers } from './lease';
import { createNotifier, type Listener } from './notifier';

/** EventSource.CLOSED */
const READY_STATE_CLOSED = 2;

/** The slice of `EventSource` the client relies on. */
export interface EventSourceLike {
  onmessage: ((event: MessageEvent<string>) => void) | null;
  onerror: ((event: Event) => void) | null;
  readonly readyState: number;
  close(): void;
}

export type EventSourceConstructor = new (url: string) => EventSourceLike;

export interface StreamHost extends Timers {
  EventSource?: EventSourceConstructor;
  requestAnimationFrame?: (callback: () => void) => unknown;
}

export type DisconnectReason = 'idle' | 'closed' | 'transport';

export type StreamEvents = {
  error: [event: MessageEvent<string>];
  'stream.connected': [url: string];
  'stream.disconnected': [reason: DisconnectReason];
  [key: `event.${string}`]: [notification: StreamNotification];
};

export type StreamEventKey = keyof StreamEvents & string;

export interface EventStream {
  open: () => void;
  close: () => void;
  isActive: () => boolean;
  isConnected: () => boolean;
  url: () => string;
  on: <K extends StreamEventKey>(key: K, listener: Listener<StreamEvents[K]>) => () => void;
  once: <K extends StreamEventKey>(key: K, listener: Listener<StreamEvents[K]>) => () => void;
  off: <K extends StreamEventKey>(key?: K, listener?: Listener<StreamEvents[K]>) => void;
}

export interface EventStreamOptions {
  settings?: StreamSettingsInput;
  logger?: Logger;
  host?: StreamHost;
}

export const resolveBrowserHost = (): StreamHost => {
  const timers: Timers = {
    setTimeout: (callback, ms) => setTimeout(callback, ms),
    clearTimeout: (handle) => clearTimeout(handle),
  };
  if (typeof window === 'undefined') {
    return timers;
  }
  return {
    ...timers,
    EventSource: typeof window.EventSource === 'function' ? window.EventSource : undefined,
    requestAnimationFrame:
      typeof window.requestAnimationFrame === 'function'
        ? (callback) => window.requestAnimationFrame(() => callback())
        : undefined,
  };
};

export const buildStreamUrl = (settings: StreamSettings): string => {
  let url = settings.apiRoot + settings.streamPath;
  if (settings.idleTimeoutSeconds !== null) {
    url += `?timeout=${settings.idleTimeoutSeconds}`;
  }
  return url;
};

/**
 * Single server-push channel for the notification endpoint.
 *
 * Messages are republished as `event.<type>`. While open, a heartbeat runs on
 * every animation frame and renews a close lease; when the page stops drawing
 * frames (background tab) the lease lapses and the connection is released.
 * The next frame after the page resumes reconnects.
 */
export const createEventStream = (options: EventStreamOptions = {}): EventStream => {
  const settings = resolveStreamSettings(options.settings);
  const logger = options.logger ?? silentLogger;
  const host = options.host ?? resolveBrowserHost();
  const endpoint = buildStreamUrl(settings);

  const notifier = createNotifier<StreamEvents>({
    onListenerError: (error, key) => logger.error('Notification listener failed', { key, error }),
  });

  let source: EventSourceLike | null = null;
  let heartbeatActive = false;
  // Bumped on every open/close so frames scheduled by an earlier activation die out.
  let activation = 0;
  let unsupportedLogged = false;

  const dropConnection = (reason: DisconnectReason) => {
    if (!source) return;
    const current = source;
    source = null;
    current.onmessage = null;
    current.onerror = null;
    current.close();
    logger.debug('Notification stream disconnected', { reason });
    notifier.trigger('stream.disconnected', reason);
  };

  const lease = createLease({
    ttlMs: settings.graceMs,
    timers: host,
    onExpire: () => dropConnection('idle'),
  });

  const handleMessage = (event: MessageEvent<string>) => {
    const parsed = parseNotification(event.data);
    if (!parsed.ok) {
      logger.error('Invalid JSON from notification stream', { data: event.data, error: parsed.error });
      notifier.trigger('error', event);
      return;
    }
    const key: `event.${string}` = `event.${parsed.value.type}`;
    notifier.trigger(key, parsed.value);
  };

  const connect = (Transport: EventSourceConstructor) => {
    const next = new Transport(endpoint);
    next.onmessage = handleMessage;
    next.onerror = () => {
      // EventSource retries on its own unless it gave up.
      if (source === next && next.readyState === READY_STATE_CLOSED) {
        lease.cancel();
        dropConnection('transport');
      }
    };
    source = next;
    logger.debug('Notification stream connected', { url: endpoint });
    notifier.trigger('stream.connected', endpoint);
  };

  const heartbeat = (
    generation: number,
    Transport: EventSourceConstructor,
    schedule: (callback: () => void) => unknown,
  ) => {
    if (!heartbeatActive || generation !== activation) {
      return;
    }
    schedule(() => heartbeat(generation, Transport, schedule));

    if (!source) {
      connect(Transport);
      // A `stream.connected` listener may have closed the stream.
      if (!heartbeatActive || generation !== activation) {
        return;
      }
    }
    lease.renew();
  };

  const open = () => {
    if (heartbeatActive) {
      return;
    }
    const Transport = host.EventSource;
    const schedule = host.requestAnimationFrame;
    if (!Transport || !schedule) {
      if (!unsupportedLogged) {
        unsupportedLogged = true;
        logger.error('EventSource is not supported on this platform.');
      }
      return;
    }
    heartbeatActive = true;
    activation += 1;
    if (!source) {
      connect(Transport);
    }
    heartbeat(activation, Transport, schedule);
  };

  const close = () => {
    heartbeatActive = false;
    activation += 1;
    lease.cancel();
    dropConnection('closed');
  };

  return {
    open,
    close,
    isActive: () => heartbeatActive,
    isConnected: () => source !== null,
    url: () => endpoint,
    on: (key, listener) => notifier.on(key, listener),
    once: (key, listener) => notifier.once(key, listener),
    off: (key, listener) => notifier.off(key, listener),
  };
};
