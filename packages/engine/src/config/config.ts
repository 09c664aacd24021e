import { z } from 'zod';
import { ConfigurationError } from '../types/error.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const engineConfigSchema = z.object({
  model: z.string().min(1).default('default'),
  maxTurns: z.number().int().positive().default(100),
  pausePollIntervalMs: z.number().int().positive().default(100),
  channelCapacity: z.number().int().positive().default(100),
  logLevel: z.enum(LOG_LEVELS).default('silent'),
});

export type EngineConfig = z.output<typeof engineConfigSchema>;

export type EngineConfigInput = z.input<typeof engineConfigSchema>;

export function parseEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid engine configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

type EnvBinding = {
  readonly envVar: string;
  readonly key: keyof EngineConfigInput;
  readonly numeric: boolean;
};

export const ENGINE_ENV_BINDINGS: ReadonlyArray<EnvBinding> = [
  { envVar: 'CONDUIT_MODEL', key: 'model', numeric: false },
  { envVar: 'CONDUIT_MAX_TURNS', key: 'maxTurns', numeric: true },
  { envVar: 'CONDUIT_PAUSE_POLL_MS', key: 'pausePollIntervalMs', numeric: true },
  { envVar: 'CONDUIT_CHANNEL_CAPACITY', key: 'channelCapacity', numeric: true },
  { envVar: 'LOG_LEVEL', key: 'logLevel', numeric: false },
];

/**
 * Builds an engine configuration from environment variables; explicit
 * `overrides` win over the environment.
 */
export function loadEngineConfigFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
  overrides: EngineConfigInput = {},
): EngineConfig {
  const fromEnv: Record<string, unknown> = {};

  for (const binding of ENGINE_ENV_BINDINGS) {
    const value = env[binding.envVar];
    if (value === undefined || value.length === 0) {
      continue;
    }
    fromEnv[binding.key] = binding.numeric ? Number(value) : value;
  }

  const result = engineConfigSchema.safeParse({ ...fromEnv, ...overrides });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid engine configuration: ${issues.join('; ')}`);
  }
  return result.data;
}
