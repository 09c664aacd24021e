import { AbortError } from '../types/error.js';

/**
 * Settles with `promise`, or rejects with `AbortError` as soon as `signal`
 * aborts. The underlying promise is left running; its outcome is observed so
 * a late rejection is never unhandled.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }

  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(new AbortError('Operation was aborted'));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(new AbortError('Operation was aborted'));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Resolves after `ms`, or early (without rejecting) when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
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
}
