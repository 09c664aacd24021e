import { AbortError } from '@conduit/backend';
import { ChannelError } from '../types/error.js';

export type Channel<T> = AsyncIterable<T> & {
  /**
   * Delivers `value`, suspending while the channel is full. Rejects with
   * `ChannelError` once the channel is closed or its receiver cancelled, and
   * with `AbortError` if `signal` aborts while suspended.
   */
  readonly send: (value: T, signal?: AbortSignal) => Promise<void>;
  /**
   * Resolves with the next value, or `done` once the channel is closed and
   * drained, cancelled, or `signal` aborts.
   */
  readonly receive: (signal?: AbortSignal) => Promise<IteratorResult<T, undefined>>;
  /** Sender side is finished; buffered values still drain. */
  readonly close: () => void;
  /** Receiver side is gone; buffered values are dropped and sends fail. */
  readonly cancel: () => void;
  readonly isClosed: () => boolean;
  readonly size: () => number;
};

type PendingSend<T> = {
  readonly value: T;
  readonly resolve: () => void;
  readonly reject: (err: Error) => void;
};

type PendingReceive<T> = (result: IteratorResult<T, undefined>) => void;

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Bounded multi-producer, single-consumer async channel.
 */
export function createChannel<T>(capacity: number): Channel<T> {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
  }

  // Boxed so that `undefined` is a valid payload.
  const buffer: Array<{ readonly value: T }> = [];
  const senders: PendingSend<T>[] = [];
  const receivers: PendingReceive<T>[] = [];
  let closed = false;
  let cancelled = false;

  // Moves suspended senders into freed buffer slots.
  const admitSenders = (): void => {
    while (buffer.length < capacity) {
      const sender = senders.shift();
      if (!sender) {
        return;
      }
      buffer.push({ value: sender.value });
      sender.resolve();
    }
  };

  const send = (value: T, signal?: AbortSignal): Promise<void> => {
    if (closed || cancelled) {
      return Promise.reject(new ChannelError());
    }

    const receiver = receivers.shift();
    if (receiver) {
      receiver({ done: false, value });
      return Promise.resolve();
    }

    if (buffer.length < capacity) {
      buffer.push({ value });
      return Promise.resolve();
    }

    if (signal?.aborted) {
      return Promise.reject(new AbortError('Send was aborted'));
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = senders.indexOf(pending);
        if (index !== -1) {
          senders.splice(index, 1);
        }
        reject(new AbortError('Send was aborted'));
      };

      const pending: PendingSend<T> = {
        value,
        resolve: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
        reject: (err) => {
          signal?.removeEventListener('abort', onAbort);
          reject(err);
        },
      };

      senders.push(pending);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  };

  const receive = (signal?: AbortSignal): Promise<IteratorResult<T, undefined>> => {
    const item = buffer.shift();
    if (item) {
      admitSenders();
      return Promise.resolve({ done: false, value: item.value });
    }

    if (closed || cancelled || signal?.aborted) {
      return Promise.resolve(DONE);
    }

    return new Promise<IteratorResult<T, undefined>>((resolve) => {
      const onAbort = () => {
        const index = receivers.indexOf(pending);
        if (index !== -1) {
          receivers.splice(index, 1);
        }
        resolve(DONE);
      };

      const pending: PendingReceive<T> = (result) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };

      receivers.push(pending);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  };

  const close = (): void => {
    if (closed) {
      return;
    }
    closed = true;
    // Suspended senders keep their place; their values still drain.
    for (const receiver of receivers.splice(0)) {
      receiver(DONE);
    }
  };

  const cancel = (): void => {
    if (cancelled) {
      return;
    }
    cancelled = true;
    buffer.length = 0;
    for (const sender of senders.splice(0)) {
      sender.reject(new ChannelError('Channel receiver was dropped'));
    }
    for (const receiver of receivers.splice(0)) {
      receiver(DONE);
    }
  };

  return {
    send,
    receive,
    close,
    cancel,
    isClosed: () => closed || cancelled,
    size: () => buffer.length + senders.length,
    [Symbol.asyncIterator]: (): AsyncIterator<T> => ({
      next: () => receive(),
      return: async (): Promise<IteratorResult<T, undefined>> => {
        cancel();
        return DONE;
      },
    }),
  };
}

/** Producer end handed to the engine for outputs and plans. */
export type Sender<T> = Pick<Channel<T>, 'send' | 'close' | 'isClosed'>;

/** Consumer end handed to the engine for inputs. */
export type Receiver<T> = Pick<Channel<T>, 'receive' | 'cancel'>;
