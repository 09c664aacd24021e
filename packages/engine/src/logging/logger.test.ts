import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger } from './logger.js';

describe('createLogger', () => {
  it('applies the level and base bindings', () => {
    const logger = createLogger({ level: 'debug', base: { component: 'test' } });

    expect(logger.level).toBe('debug');
    expect(logger.bindings()).toEqual({ service: 'conduit', component: 'test' });
  });

  it('defaults to info', () => {
    expect(createLogger().level).toBe('info');
  });
});

describe('silentLogger', () => {
  it('logs nothing', () => {
    const logger = silentLogger();

    expect(logger.level).toBe('silent');
    expect(logger.isLevelEnabled('fatal')).toBe(false);
  });
});
