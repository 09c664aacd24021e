import { EventSourceParserStream } from 'eventsource-parser/stream';
import { NetworkError } from '../types/error.js';

export type SSEEvent = {
  readonly event: string;
  readonly data: string;
  readonly id?: string;
};

/**
 * Creates an async iterable of SSE events from a Response body.
 * Pipes the response body through EventSourceParserStream and yields parsed events.
 */
export async function* createSSEStream(
  response: globalThis.Response,
): AsyncGenerator<SSEEvent, void, undefined> {
  const body = response.body;
  if (!body) {
    throw new NetworkError('Response body is null or undefined');
  }

  const decodedStream = body
    .pipeThrough(new TextDecoderStream())
    .pipeThrough(new EventSourceParserStream());
  const reader = decodedStream.getReader();

  try {
    while (true) {
      const result = await reader.read().catch((err: unknown) => {
        throw new NetworkError(
          `Failed to read event stream: ${err instanceof Error ? err.message : 'Unknown error'}`,
          null,
          false,
          null,
          err instanceof Error ? err : undefined,
        );
      });

      if (result.done) {
        break;
      }

      const value = result.value;
      yield {
        event: value.event ?? '',
        data: value.data,
        ...(value.id && { id: value.id }),
      };
    }
  } finally {
    reader.releaseLock();
  }
}
