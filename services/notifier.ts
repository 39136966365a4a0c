export type EventMap = Record<string, unknown[]>;

// Method-derived type so listeners with narrower argument tuples can be stored together.
type StoredListener = { bivarianceHack(...args: unknown[]): void }['bivarianceHack'];

interface Subscription {
  key: string;
  listener: StoredListener;
  once: boolean;
  removed: boolean;
}

export type Listener<Args extends unknown[]> = (...args: Args) => void;

export interface Notifier<Events extends EventMap> {
  on: <K extends keyof Events & string>(key: K, listener: Listener<Events[K]>) => () => void;
  once: <K extends keyof Events & string>(key: K, listener: Listener<Events[K]>) => () => void;
  off: <K extends keyof Events & string>(key?: K, listener?: Listener<Events[K]>) => void;
  trigger: <K extends keyof Events & string>(key: K, ...args: Events[K]) => void;
  listenerCount: (key?: keyof Events & string) => number;
}

export interface NotifierOptions {
  onListenerError?: (error: unknown, key: string) => void;
}

/** `event.*` matches every key starting with `event.`; anything else matches exactly. */
export const keyMatches = (pattern: string, key: string): boolean => {
  if (pattern.endsWith('*')) {
    return key.startsWith(pattern.slice(0, -1));
  }
  return pattern === key;
};

export const createNotifier = <Events extends EventMap>(options: NotifierOptions = {}): Notifier<Events> => {
  let subscriptions: Subscription[] = [];

  const add = (key: string, listener: StoredListener, once: boolean) => {
    const sub: Subscription = { key, listener, once, removed: false };
    subscriptions.push(sub);
    return () => {
      sub.removed = true;
      subscriptions = subscriptions.filter((s) => s !== sub);
    };
  };

  const off = (key?: string, listener?: StoredListener) => {
    const keep: Subscription[] = [];
    for (const sub of subscriptions) {
      const keyHit = key === undefined || sub.key === key;
      const listenerHit = listener === undefined || sub.listener === listener;
      if (keyHit && listenerHit) {
        sub.removed = true;
      } else {
        keep.push(sub);
      }
    }
    subscriptions = keep;
  };

  const trigger = (key: string, args: unknown[]) => {
    const snapshot = subscriptions.slice();
    for (const sub of snapshot) {
      if (sub.removed || !keyMatches(sub.key, key)) {
        continue;
      }
      if (sub.once) {
        sub.removed = true;
        subscriptions = subscriptions.filter((s) => s !== sub);
      }
      try {
        sub.listener(...args);
      } catch (error) {
        options.onListenerError?.(error, key);
      }
    }
  };

  return {
    on: (key, listener) => add(key, listener, false),
    once: (key, listener) => add(key, listener, true),
    off: (key, listener) => off(key, listener),
    trigger: (key, ...args) => trigger(key, args),
    listenerCount: (key) =>
      key === undefined ? subscriptions.length : subscriptions.filter((sub) => sub.key === key).length,
  };
};
