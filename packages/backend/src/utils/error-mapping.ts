import { AuthenticationError, ConfigurationError, NetworkError, type BackendError } from '../types/error.js';

/**
 * Parses the Retry-After header. Returns milliseconds, or null if absent.
 * Accepts both a number of seconds and an HTTP date.
 */
export function parseRetryAfter(headers: Headers): number | null {
  const retryAfter = headers.get('Retry-After');
  if (!retryAfter) {
    return null;
  }

  if (/^\d+$/.test(retryAfter)) {
    return Number(retryAfter) * 1000;
  }

  const retryDate = new Date(retryAfter);
  if (!isNaN(retryDate.getTime())) {
    return Math.max(0, retryDate.getTime() - Date.now());
  }

  return null;
}

export function mapHttpError(statusCode: number, body: string, headers: Headers): BackendError {
  if (statusCode === 401 || statusCode === 403) {
    return new AuthenticationError(`Authentication failed: ${body}`, statusCode);
  }

  if (statusCode === 408 || statusCode === 429 || statusCode >= 500) {
    return new NetworkError(`HTTP ${statusCode}: ${body}`, statusCode, true, parseRetryAfter(headers));
  }

  if (statusCode >= 400) {
    return new ConfigurationError(`HTTP ${statusCode}: ${body}`);
  }

  return new NetworkError(`Unexpected HTTP status ${statusCode}: ${body}`, statusCode);
}
