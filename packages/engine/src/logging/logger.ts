import pino, { type Logger, type LoggerOptions } from 'pino';
import type { LogLevel } from '../config/config.js';

export type { Logger } from 'pino';

export type LoggerConfig = {
  readonly level?: LogLevel;
  /** Human-readable output through pino-pretty, for development. */
  readonly pretty?: boolean;
  /** Bindings included in every line. */
  readonly base?: Record<string, unknown>;
};

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: config.level ?? 'info',
    base: { service: 'conduit', ...config.base },
  };

  if (config.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return pino(options);
}

/**
 * Logger used when the caller supplies none: the engine stays quiet unless
 * asked to log.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
