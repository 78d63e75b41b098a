import { describe, it, expect } from 'vitest';
import { createLogger, errorFields, type Logger } from '../../../src/utils/logger';

describe('logger (pino-backed)', () => {
  it('creates a logger with all four methods', () => {
    const logger: Logger = createLogger('test');
    expect(typeof logger.info).toBe('function');
    expect(typeof logger.debug).toBe('function');
    expect(typeof logger.warn).toBe('function');
    expect(typeof logger.error).toBe('function');
  });

  it('does not throw when called with a string payload', () => {
    const logger = createLogger('test');
    expect(() => logger.info('simple message')).not.toThrow();
    expect(() => logger.warn('warning')).not.toThrow();
  });

  it('does not throw when called with an object payload', () => {
    const logger = createLogger('test');
    expect(() => logger.info({ route: '/api/v1/users' }, 'message')).not.toThrow();
    expect(() => logger.error({ err: new Error('boom') }, 'failed')).not.toThrow();
    expect(() => logger.debug({ count: 5 })).not.toThrow();
  });
});

describe('errorFields', () => {
  it('flattens errors into message and name', () => {
    expect(errorFields(new TypeError('bad input'))).toEqual({ error: 'bad input', errorName: 'TypeError' });
  });

  it('stringifies anything else', () => {
    expect(errorFields('plain')).toEqual({ error: 'plain' });
    expect(errorFields(undefined)).toEqual({ error: 'undefined' });
  });
});
