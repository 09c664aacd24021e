import { nanoid } from 'nanoid';
import type { Backend, BackendConnector } from '../types/backend.js';
import { StreamClosedError } from '../types/error.js';
import type { BackendEvent } from '../types/event.js';
import type { InputItem, Operation } from '../types/operation.js';
import { createEventQueue } from './event-queue.js';

/**
 * Produces the events answering one user input. Throwing makes the
 * corresponding `submit` fail.
 */
export type ScriptedResponder = (
  items: ReadonlyArray<InputItem>,
  turnIndex: number,
) => ReadonlyArray<BackendEvent> | Promise<ReadonlyArray<BackendEvent>>;

export type ScriptedBackendOptions = {
  readonly sessionEvents?: ReadonlyArray<BackendEvent>;
  readonly respond?: ScriptedResponder;
};

export type ScriptedBackend = Backend & {
  readonly conversationId: string;
  /** Every operation submitted so far, failed ones included. */
  readonly operations: () => ReadonlyArray<Operation>;
  /** Queues an event outside of any response. */
  readonly push: (event: BackendEvent) => void;
  /** Makes the pending or next `nextEvent` call reject. */
  readonly fail: (error: Error) => void;
  /** Ends the event stream without a `shutdown_complete` event. */
  readonly end: () => void;
};

/**
 * In-process backend driven by a responder function. Useful wherever a real
 * conversation service is not wanted: tests, demos, offline runs.
 */
export function createScriptedBackend(options: ScriptedBackendOptions = {}): ScriptedBackend {
  const conversationId = nanoid();
  const queue = createEventQueue();
  const operations: Operation[] = [];
  let turnIndex = 0;
  let shutDown = false;

  const sessionEvents: ReadonlyArray<BackendEvent> = options.sessionEvents ?? [
    { type: 'session_configured', sessionId: conversationId, model: 'scripted' },
  ];
  for (const event of sessionEvents) {
    queue.push(event);
  }

  const submit = async (operation: Operation): Promise<void> => {
    if (shutDown) {
      throw new StreamClosedError(`Conversation ${conversationId} has shut down`);
    }

    operations.push(operation);

    switch (operation.type) {
      case 'user_input': {
        const index = turnIndex;
        turnIndex++;
        const events = options.respond ? await options.respond(operation.items, index) : [];
        for (const event of events) {
          queue.push(event);
        }
        break;
      }

      case 'shutdown':
        shutDown = true;
        queue.push({ type: 'shutdown_complete' });
        queue.end();
        break;
    }
  };

  return {
    conversationId,
    submit,
    nextEvent: (signal?: AbortSignal) => queue.next(signal),
    operations: () => operations,
    push: queue.push,
    fail: queue.fail,
    end: queue.end,
  };
}

/**
 * Wraps an already created backend as a connector.
 */
export function scriptedConnector(backend: Backend): BackendConnector {
  return async () => backend;
}
