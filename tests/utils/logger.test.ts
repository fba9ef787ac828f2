/**
 * Logger Tests
 */

import { describe, it, expect } from 'vitest';
import { initLogger, getLogger } from '../../src/utils/logger.js';

describe('Logger', () => {
  describe('getLogger', () => {
    it('should return the same instance on multiple calls', () => {
      const logger1 = getLogger();
      const logger2 = getLogger();

      expect(logger1).toBe(logger2);
    });
  });

  describe('initLogger', () => {
    it('should initialize logger with config', () => {
      const logger = initLogger({
        level: 'debug',
        pretty: false,
      });

      expect(logger.level).toBe('debug');
    });

    it('should replace the shared logger', () => {
      const logger = initLogger({
        level: 'silent',
        pretty: false,
      });

      expect(getLogger()).toBe(logger);
      expect(getLogger().level).toBe('silent');
    });

    it('should write to a file destination', () => {
      const logger = initLogger({
        level: 'error',
        pretty: false,
        destination: '/dev/null',
      });

      expect(logger.level).toBe('error');
    });
  });
});
