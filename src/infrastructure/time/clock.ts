/**
 * Time source used by every stateful policy.
 *
 * Policies never call `Date.now()` directly so that windows, TTLs and reset
 * timeouts can be driven deterministically.
 */
export interface Clock {
  /** Current time in epoch milliseconds */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Suspends a logical call for `ms` milliseconds.
 *
 * Rejects with the signal's reason as soon as `signal` aborts; the pending
 * timer is cleared either way.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
