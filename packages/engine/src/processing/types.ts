import type { OutputMessage } from '../types/index.js';

/** Decides whether a message continues down the pipeline. */
export type MessageFilter = {
  readonly shouldKeep: (message: OutputMessage) => boolean;
};

/** Rewrites a message; must not drop it. */
export type MessageTransformer = {
  readonly transform: (message: OutputMessage) => OutputMessage;
};

/**
 * Stateful stage. `process` returns the message to pass on, possibly a
 * different one, or null to end the chain for this message. `flush`
 * returns whatever is still buffered when the stream ends.
 */
export type MessageAggregator = {
  readonly process: (message: OutputMessage) => OutputMessage | null;
  readonly flush: () => ReadonlyArray<OutputMessage>;
};
