import { AbortError, BackendError, NetworkError } from '../types/error.js';
import type { TimeoutConfig } from '../types/config.js';
import { mapHttpError } from './error-mapping.js';

export type FetchOptions = {
  readonly url: string;
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
  readonly timeout?: TimeoutConfig;
  readonly signal?: AbortSignal;
};

/**
 * Performs a request and returns the raw response once its status is known
 * to be 2xx. Non-2xx statuses are mapped to backend errors.
 *
 * The timeout covers the time until response headers arrive, not the body:
 * event streams stay open for the lifetime of a conversation.
 */
export async function fetchResponse(options: FetchOptions): Promise<globalThis.Response> {
  const {
    url,
    method = 'GET',
    headers: customHeaders = {},
    body: bodyData,
    timeout,
    signal: externalSignal,
  } = options;

  if (externalSignal?.aborted) {
    throw new AbortError('Signal was already aborted');
  }

  const timeoutController = new AbortController();
  const linkedSignal = linkSignals(externalSignal, timeoutController.signal);

  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  if (timeout?.requestMs) {
    timeoutId = setTimeout(() => {
      timeoutController.abort();
    }, timeout.requestMs);
  }

  try {
    const mergedHeaders: Record<string, string> = {
      'Content-Type': 'application/json',
      ...customHeaders,
    };

    const body = bodyData !== undefined ? JSON.stringify(bodyData) : undefined;

    let response: globalThis.Response;
    try {
      response = await fetch(url, {
        method,
        headers: mergedHeaders,
        body,
        signal: linkedSignal,
      });
    } catch (err) {
      if (err instanceof globalThis.Error && err.name === 'AbortError') {
        if (timeoutController.signal.aborted) {
          throw new NetworkError(`Request to ${url} timed out`, null, true);
        }
        throw new AbortError('Fetch was aborted');
      }
      const cause = err instanceof Error ? err : undefined;
      throw new NetworkError(`Request to ${url} failed: ${cause?.message ?? String(err)}`, null, true, null, cause);
    }

    if (!response.ok) {
      const text = await response.text();
      throw mapHttpError(response.status, text, response.headers);
    }

    return response;
  } finally {
    if (timeoutId !== null) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Performs a request and parses its JSON body.
 */
export async function fetchJson(options: FetchOptions): Promise<unknown> {
  const response = await fetchResponse(options);
  const text = await response.text();
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new BackendError(
      `Invalid JSON from ${options.url}`,
      err instanceof Error ? err : undefined,
    );
  }
}

/**
 * Links two abort signals so that either one being aborted triggers the result.
 */
function linkSignals(
  externalSignal: AbortSignal | undefined,
  targetSignal: AbortSignal,
): AbortSignal {
  if (!externalSignal) {
    return targetSignal;
  }

  if (externalSignal.aborted) {
    return externalSignal;
  }

  const controller = new AbortController();

  externalSignal.addEventListener('abort', () => controller.abort());
  targetSignal.addEventListener('abort', () => controller.abort());

  return controller.signal;
}
