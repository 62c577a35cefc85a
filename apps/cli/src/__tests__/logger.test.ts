import { createLogger } from '../logger.js';

describe('createLogger', () => {
  it('uses the configured level', () => {
    expect(createLogger('debug').level).toBe('debug');
    expect(createLogger('error').isLevelEnabled('warn')).toBe(false);
  });

  it('accepts silent', () => {
    const logger = createLogger('silent');
    expect(logger.level).toBe('silent');
    expect(() => logger.warn('not written')).not.toThrow();
  });
});
