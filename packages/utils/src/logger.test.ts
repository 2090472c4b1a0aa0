import { describe, expect, it } from 'vitest';
import { buildLoggerOptions, createLogger, logger } from './logger.js';

describe('buildLoggerOptions', () => {
  it('writes plain JSON outside development', () => {
    const options = buildLoggerOptions({ NODE_ENV: 'production', LOG_LEVEL: 'debug' });

    expect(options.level).toBe('debug');
    expect(options.base).toEqual({ service: 'transcoder', env: 'production' });
    expect(options.transport).toBeUndefined();
  });

  it('pretty-prints to stderr in development', () => {
    const options = buildLoggerOptions({});

    expect(options.level).toBe('info');
    expect(options.transport).toEqual({
      target: 'pino-pretty',
      options: { colorize: true, ignore: 'pid,hostname', destination: 2 },
    });
  });
});

describe('createLogger', () => {
  it('binds context onto a child of the shared logger', () => {
    const child = createLogger({ component: 'orchestrator' });

    expect(child.bindings()).toMatchObject({ component: 'orchestrator', service: 'transcoder' });
    expect(logger.level).toBe('silent');
  });
});
