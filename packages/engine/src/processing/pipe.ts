import type { OutputMessage } from '../types/index.js';
import type { MessageProcessor } from './processor.js';

/**
 * Runs every message of `source` through `processor` and flushes it once the
 * source ends.
 */
export async function* pipeOutput(
  source: AsyncIterable<OutputMessage>,
  processor: MessageProcessor,
): AsyncGenerator<OutputMessage> {
  for await (const message of source) {
    yield* processor.process(message);
  }
  yield* processor.flush();
}
