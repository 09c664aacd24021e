import { describe, it, expect } from 'vitest';
import { createSSEStream, type SSEEvent } from './sse.js';

/**
 * Creates a Response whose body streams the given SSE lines.
 */
function createMockResponse(sseLines: string[]): globalThis.Response {
  const encoded = new TextEncoder().encode(sseLines.join('\n'));

  const stream = new ReadableStream({
    start(controller) {
      controller.enqueue(encoded);
      controller.close();
    },
  });

  return new Response(stream, { status: 200 });
}

async function collect(response: globalThis.Response): Promise<SSEEvent[]> {
  const events: SSEEvent[] = [];
  for await (const event of createSSEStream(response)) {
    events.push(event);
  }
  return events;
}

describe('createSSEStream', () => {
  it('parses a single event', async () => {
    const events = await collect(createMockResponse(['event: message', 'data: hello', '', '']));

    expect(events).toEqual([{ event: 'message', data: 'hello' }]);
  });

  it('parses events in sequence and keeps ids', async () => {
    const events = await collect(
      createMockResponse(['id: 1', 'data: first', '', 'id: 2', 'data: second', '', '']),
    );

    expect(events).toEqual([
      { event: '', data: 'first', id: '1' },
      { event: '', data: 'second', id: '2' },
    ]);
  });

  it('joins multi-line data with newlines', async () => {
    const events = await collect(createMockResponse(['data: line one', 'data: line two', '', '']));

    expect(events[0]?.data).toBe('line one\nline two');
  });

  it('fails when the response has no body', async () => {
    const response = new Response(null, { status: 204 });

    await expect(collect(response)).rejects.toThrow('Response body is null or undefined');
  });
});
