import { describe, it, expect } from 'vitest';
import { createSilentLogger, isLogLevel } from './logger.js';

describe('Logger', () => {
  it('should log through a silent logger without throwing', () => {
    const logger = createSilentLogger('test');

    expect(() => {
      logger.info('hello', { tick: 1 });
      logger.child({ component: 'ledger' }).warn('careful');
    }).not.toThrow();
  });

  it('should keep the service name on child loggers', () => {
    const logger = createSilentLogger('simulator');

    expect(logger.child({ session: 'a' }).getService()).toBe('simulator');
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
