import type { BackendEvent } from './event.js';
import type { Operation } from './operation.js';

/**
 * One open conversation with a reasoning backend.
 *
 * `nextEvent` resolves `null` once the event stream has ended cleanly and
 * rejects with a `BackendError` when the next event cannot be obtained.
 * After a `shutdown` operation it must settle promptly.
 */
export type Backend = {
  readonly submit: (operation: Operation) => Promise<void>;
  readonly nextEvent: (signal?: AbortSignal) => Promise<BackendEvent | null>;
};

/** Opens a conversation; `signal` abandons a connection still being set up. */
export type BackendConnector = (signal?: AbortSignal) => Promise<Backend>;
