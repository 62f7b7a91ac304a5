import { describe, it, expect } from 'vitest';
import { createLogger } from './logger.js';

describe('createLogger', () => {
  it('exposes every level plus child()', () => {
    const logger = createLogger({ name: 'logger-test', level: 'silent' });

    expect(typeof logger.debug).toBe('function');
    expect(typeof logger.fatal).toBe('function');
    expect(() => { logger.info('hello', { component: 'test' }); }).not.toThrow();
  });

  it('returns a wrapped child logger', () => {
    const child = createLogger({ level: 'silent' }).child({ worker: 'w-1' });

    expect(() => { child.warn('from child', { component: 'test' }); }).not.toThrow();
    expect(typeof child.child).toBe('function');
  });
});
