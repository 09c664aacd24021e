import { z } from 'zod';
import type { Backend, BackendConnector } from '../types/backend.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy, type TimeoutConfig } from '../types/config.js';
import { BackendError, StreamClosedError } from '../types/error.js';
import type { BackendEvent } from '../types/event.js';
import type { Operation } from '../types/operation.js';
import { abortable } from '../utils/abort.js';
import { fetchJson, fetchResponse } from '../utils/http.js';
import { retry } from '../utils/retry.js';
import { createSSEStream, type SSEEvent } from '../utils/sse.js';
import { decodeWireEvent } from './wire.js';

export type RemoteBackendOptions = {
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly headers?: Record<string, string>;
  readonly timeout?: TimeoutConfig;
  readonly retryPolicy?: RetryPolicy;
};

const createdConversationSchema = z.object({ conversationId: z.string().min(1) });

/**
 * Connector for a conversation service reachable over HTTP.
 *
 *   POST {baseUrl}/conversations                       -> { conversationId }
 *   POST {baseUrl}/conversations/{id}/operations       <- Operation
 *   GET  {baseUrl}/conversations/{id}/events           -> text/event-stream
 */
export function createRemoteBackendConnector(options: RemoteBackendOptions): BackendConnector {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const headers: Record<string, string> = {
    ...(options.apiKey && { Authorization: `Bearer ${options.apiKey}` }),
    ...options.headers,
  };
  const policy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;

  return async (signal?: AbortSignal): Promise<Backend> => {
    const body = await retry(
      () =>
        fetchJson({
          url: `${baseUrl}/conversations`,
          method: 'POST',
          headers,
          body: {},
          timeout: options.timeout,
          signal,
        }),
      { policy, signal },
    );

    const parsed = createdConversationSchema.safeParse(body);
    if (!parsed.success) {
      throw new BackendError(`Unexpected response creating conversation: ${JSON.stringify(body)}`);
    }

    return createRemoteBackend({
      conversationUrl: `${baseUrl}/conversations/${encodeURIComponent(parsed.data.conversationId)}`,
      headers,
      timeout: options.timeout,
    });
  };
}

type RemoteBackendContext = {
  readonly conversationUrl: string;
  readonly headers: Record<string, string>;
  readonly timeout: TimeoutConfig | undefined;
};

function createRemoteBackend(context: RemoteBackendContext): Backend {
  const lifetime = new AbortController();
  let opening: Promise<AsyncIterator<SSEEvent>> | null = null;
  let pendingRead: Promise<IteratorResult<SSEEvent>> | null = null;
  let ended = false;
  let shutDown = false;

  const openEvents = (): Promise<AsyncIterator<SSEEvent>> => {
    opening ??= fetchResponse({
      url: `${context.conversationUrl}/events`,
      headers: { ...context.headers, Accept: 'text/event-stream' },
      timeout: context.timeout,
      signal: lifetime.signal,
    }).then((response) => createSSEStream(response)[Symbol.asyncIterator]());
    return opening;
  };

  const finish = (): null => {
    ended = true;
    lifetime.abort();
    return null;
  };

  const submit = async (operation: Operation): Promise<void> => {
    if (shutDown) {
      throw new StreamClosedError('Conversation has shut down');
    }
    if (operation.type === 'shutdown') {
      shutDown = true;
    }

    await fetchResponse({
      url: `${context.conversationUrl}/operations`,
      method: 'POST',
      headers: context.headers,
      body: operation,
      timeout: context.timeout,
    });
  };

  const nextEvent = async (signal?: AbortSignal): Promise<BackendEvent | null> => {
    while (!ended) {
      const iterator = await abortable(openEvents(), signal);

      // A read interrupted by `signal` stays pending and is picked up by the next call.
      pendingRead ??= iterator.next();
      const result = await abortable(pendingRead, signal);
      pendingRead = null;

      if (result.done) {
        return finish();
      }

      // Keep-alive comments and empty messages carry no event.
      if (result.value.data.length === 0) {
        continue;
      }

      const event = decodeWireEvent(result.value.data);
      if (event.type === 'shutdown_complete') {
        finish();
      }
      return event;
    }

    return null;
  };

  return { submit, nextEvent };
}
