export type TimerHandle = ReturnType<typeof setTimeout>;

export interface Timers {
  setTimeout: (callback: () => void, ms: number) => TimerHandle;
  clearTimeout: (handle: TimerHandle) => void;
}

export interface Lease {
  renew: () => void;
  cancel: () => void;
  readonly armed: boolean;
}

export interface LeaseOptions {
  ttlMs: number;
  onExpire: () => void;
  timers: Timers;
}

/**
 * Renew-or-expire deadline. Each `renew` pushes expiry `ttlMs` into the future;
 * if no renewal arrives in time `onExpire` runs once and the lease disarms.
 */
export const createLease = ({ ttlMs, onExpire, timers }: LeaseOptions): Lease => {
  let handle: TimerHandle | null = null;

  const cancel = () => {
    if (handle !== null) {
      timers.clearTimeout(handle);
      handle = null;
    }
  };

  return {
    renew: () => {
      cancel();
      handle = timers.setTimeout(() => {
        handle = null;
        onExpire();
      }, ttlMs);
    },
    cancel,
    get armed() {
      return handle !== null;
    },
  };
};
