import { AbortError } from '../types/error.js';
import type { BackendEvent } from '../types/event.js';

type Waiter = {
  readonly resolve: (event: BackendEvent | null) => void;
  readonly reject: (err: Error) => void;
};

export type EventQueue = {
  readonly push: (event: BackendEvent) => void;
  readonly end: () => void;
  readonly fail: (err: Error) => void;
  readonly next: (signal?: AbortSignal) => Promise<BackendEvent | null>;
};

/**
 * Unbounded single-consumer queue of backend events.
 * `next` resolves `null` once the queue has ended and drained.
 */
export function createEventQueue(): EventQueue {
  const buffer: BackendEvent[] = [];
  let waiter: Waiter | null = null;
  let done = false;
  let pendingError: Error | null = null;

  const takeWaiter = (): Waiter | null => {
    const w = waiter;
    waiter = null;
    return w;
  };

  return {
    push: (event: BackendEvent) => {
      if (done) {
        return;
      }
      const w = takeWaiter();
      if (w) {
        w.resolve(event);
      } else {
        buffer.push(event);
      }
    },

    end: () => {
      done = true;
      takeWaiter()?.resolve(null);
    },

    fail: (err: Error) => {
      const w = takeWaiter();
      if (w) {
        w.reject(err);
      } else {
        pendingError = err;
      }
    },

    next: async (signal?: AbortSignal): Promise<BackendEvent | null> => {
      const buffered = buffer.shift();
      if (buffered !== undefined) {
        return buffered;
      }

      if (pendingError) {
        const err = pendingError;
        pendingError = null;
        throw err;
      }

      if (done) {
        return null;
      }

      if (signal?.aborted) {
        throw new AbortError('Operation was aborted');
      }

      return new Promise<BackendEvent | null>((resolve, reject) => {
        const onAbort = () => {
          waiter = null;
          reject(new AbortError('Operation was aborted'));
        };
        signal?.addEventListener('abort', onAbort, { once: true });

        waiter = {
          resolve: (event) => {
            signal?.removeEventListener('abort', onAbort);
            resolve(event);
          },
          reject: (err) => {
            signal?.removeEventListener('abort', onAbort);
            reject(err);
          },
        };
      });
    },
  };
}
