import type { OutputMessage } from '../types/index.js';
import { primaryText } from './text.js';
import type { MessageAggregator } from './types.js';

/** Turn id given to messages assembled from buffered deltas. */
export const AGGREGATED_TURN_ID = 0;

/**
 * Buffers `PRIMARY_DELTA` text. The next message of any other kind is
 * replaced by one `PRIMARY` carrying the buffered text; with an empty buffer
 * it passes through. Leftover text comes out on flush.
 */
export function createDeltaAggregator(): MessageAggregator {
  let buffer = '';

  const take = (): OutputMessage => {
    const text = buffer;
    buffer = '';
    return { turnId: AGGREGATED_TURN_ID, data: { kind: 'PRIMARY', text } };
  };

  return {
    process: (message) => {
      if (message.data.kind === 'PRIMARY_DELTA') {
        buffer += message.data.text;
        return null;
      }
      return buffer.length > 0 ? take() : message;
    },
    flush: () => (buffer.length > 0 ? [take()] : []),
  };
}

/**
 * Drops a primary or delta message whose text equals the last one passed.
 * Other messages pass and leave the remembered text alone.
 */
export function createDuplicateRemover(): MessageAggregator {
  let last: string | null = null;

  return {
    process: (message) => {
      const text = primaryText(message);
      if (text === null) {
        return message;
      }
      if (text === last) {
        return null;
      }
      last = text;
      return message;
    },
    flush: () => [],
  };
}
