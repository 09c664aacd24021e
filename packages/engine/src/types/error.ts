import {
  AuthenticationError,
  ConfigurationError as BackendConfigurationError,
  InterruptedError,
  ModelError,
  NetworkError,
  ToolError,
} from '@conduit/backend';

/**
 * Errors reported as data on the output stream.
 */
export type OutputError =
  | { readonly kind: 'turn_limit_exceeded' }
  | { readonly kind: 'interrupted' }
  | { readonly kind: 'network'; readonly message: string }
  | { readonly kind: 'tool'; readonly message: string }
  | { readonly kind: 'model'; readonly message: string }
  | { readonly kind: 'authentication'; readonly message: string }
  | { readonly kind: 'configuration'; readonly message: string }
  | { readonly kind: 'unknown'; readonly message: string };

export function formatOutputError(error: OutputError): string {
  switch (error.kind) {
    case 'turn_limit_exceeded':
      return 'Turn limit exceeded';
    case 'interrupted':
      return 'Agent was interrupted';
    case 'network':
      return `Network error: ${error.message}`;
    case 'tool':
      return `Tool error: ${error.message}`;
    case 'model':
      return `Model error: ${error.message}`;
    case 'authentication':
      return `Authentication error: ${error.message}`;
    case 'configuration':
      return `Configuration error: ${error.message}`;
    case 'unknown':
      return `Unknown error: ${error.message}`;
  }
}

/**
 * Classifies a failure raised by a backend call.
 */
export function toOutputError(err: unknown): OutputError {
  if (err instanceof InterruptedError) {
    return { kind: 'interrupted' };
  }
  if (err instanceof NetworkError) {
    return { kind: 'network', message: err.message };
  }
  if (err instanceof ToolError) {
    return { kind: 'tool', message: err.message };
  }
  if (err instanceof ModelError) {
    return { kind: 'model', message: err.message };
  }
  if (err instanceof AuthenticationError) {
    return { kind: 'authentication', message: err.message };
  }
  if (err instanceof BackendConfigurationError) {
    return { kind: 'configuration', message: err.message };
  }
  return { kind: 'unknown', message: err instanceof Error ? err.message : String(err) };
}

export class EngineError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

export class AlreadyRunningError extends EngineError {
  constructor() {
    super('Agent is already running');
  }
}

export class NotRunningError extends EngineError {
  constructor() {
    super('Agent is not running');
  }
}

/** The session reached `STOPPED` or `ERRORED`; it cannot run again. */
export class SessionEndedError extends EngineError {
  constructor(phase: string) {
    super(`Session has already ended (${phase})`);
  }
}

/** A caller-side channel was closed when a send was attempted. */
export class ChannelError extends EngineError {
  constructor(message: string = 'Channel is closed') {
    super(message);
  }
}

export class ConfigurationError extends EngineError {}

/** An `ERROR` output ended a request made through a convenience API. */
export class OutputEventError extends EngineError {
  readonly error: OutputError;

  constructor(error: OutputError) {
    super(formatOutputError(error));
    this.error = error;
  }
}

/** A saved session could not be read back. */
export class SessionRecordError extends EngineError {}
