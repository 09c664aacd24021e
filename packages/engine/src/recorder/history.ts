export type MessageRole = 'user' | 'assistant';

export type RecordedMessage = {
  readonly role: MessageRole;
  readonly content: string;
  /** Milliseconds since the Unix epoch. */
  readonly timestamp: number;
};

export const DEFAULT_HISTORY_SIZE = 1000;

export type MessageHistory = {
  readonly add: (message: RecordedMessage) => void;
  readonly all: () => ReadonlyArray<RecordedMessage>;
  readonly clear: () => void;
  readonly size: () => number;
};

/**
 * Conversation log holding at most `maxSize` messages; the oldest are
 * evicted first.
 */
export function createMessageHistory(maxSize: number = DEFAULT_HISTORY_SIZE): MessageHistory {
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new RangeError(`History size must be a positive integer, got ${maxSize}`);
  }

  const messages: RecordedMessage[] = [];

  return {
    add: (message) => {
      messages.push(message);
      if (messages.length > maxSize) {
        messages.splice(0, messages.length - maxSize);
      }
    },
    all: () => [...messages],
    clear: () => {
      messages.length = 0;
    },
    size: () => messages.length,
  };
}
