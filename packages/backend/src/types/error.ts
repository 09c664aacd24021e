export class BackendError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

export class NetworkError extends BackendError {
  readonly statusCode: number | null;
  readonly retryable: boolean;
  readonly retryAfter: number | null;

  constructor(
    message: string,
    statusCode: number | null = null,
    retryable: boolean = false,
    retryAfter: number | null = null,
    cause?: Error,
  ) {
    super(message, cause);
    this.statusCode = statusCode;
    this.retryable = retryable;
    this.retryAfter = retryAfter;
  }
}

export class ModelError extends BackendError {}

export class ToolError extends BackendError {}

export class InterruptedError extends BackendError {}

export class AuthenticationError extends BackendError {
  readonly statusCode: number;

  constructor(message: string, statusCode: number, cause?: Error) {
    super(message, cause);
    this.statusCode = statusCode;
  }
}

export class ConfigurationError extends BackendError {}

/** The conversation has shut down; no further operations are accepted. */
export class StreamClosedError extends BackendError {}

export class AbortError extends BackendError {}
