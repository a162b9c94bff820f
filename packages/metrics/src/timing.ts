export type Settled<T> = { settled: true; value: T } | { settled: false };

/** Resolve after `ms`, or as soon as the signal aborts. */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Wait at most `ms` for a promise. The promise keeps running when the wait gives up.
 * An unreferenced wait does not hold the process open on its own.
 */
export const settleWithin = <T>(promise: Promise<T>, ms: number, options: { unref?: boolean } = {}): Promise<Settled<T>> =>
  new Promise((resolve, reject) => {
    const timer = setTimeout(() => resolve({ settled: false }), ms);
    if (options.unref) {
      timer.unref();
    }
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve({ settled: true, value });
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
