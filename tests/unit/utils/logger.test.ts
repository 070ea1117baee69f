/**
 * Tests for the logger.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, logger } from '../../../src/utils/logger.js';

vi.mock('chalk', () => {
  const passthrough = (s: string) => s;
  return {
    default: {
      gray: passthrough,
      blue: passthrough,
      yellow: passthrough,
      red: passthrough,
      green: passthrough,
    },
  };
});

describe('Logger', () => {
  const consoleSpy = {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    logger.setLevel('info');
  });

  describe('log levels', () => {
    it('should log debug when level is debug', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('test message');

      expect(consoleSpy.log).toHaveBeenCalledWith('[DEBUG] test message');
    });

    it('should not log debug at the default level', () => {
      const log = new Logger();

      log.debug('test message');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should send warnings to stderr', () => {
      const log = new Logger();

      log.warn('careful');

      expect(consoleSpy.warn).toHaveBeenCalledWith('[WARN] careful');
    });

    it('should not log warn when level is error', () => {
      const log = new Logger();
      log.setLevel('error');

      log.warn('careful');

      expect(consoleSpy.warn).not.toHaveBeenCalled();
    });

    it('should log nothing when silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.error('broken');
      log.success('done');

      expect(consoleSpy.error).not.toHaveBeenCalled();
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });
  });

  describe('data', () => {
    it('should print structured data after the message', () => {
      const log = new Logger();

      log.info('patched', { inserted: ['import'] });

      expect(consoleSpy.log).toHaveBeenNthCalledWith(1, '[INFO] patched');
      expect(consoleSpy.log).toHaveBeenNthCalledWith(2, JSON.stringify({ inserted: ['import'] }, null, 2));
    });

    it('should print the stack of an error', () => {
      const log = new Logger();
      const error = new Error('boom');

      log.error('failed', error);

      expect(consoleSpy.error).toHaveBeenNthCalledWith(1, '[ERROR] failed');
      expect(consoleSpy.error).toHaveBeenNthCalledWith(2, error.stack);
    });
  });

  describe('success and fail', () => {
    it('should mark success and failure', () => {
      const log = new Logger();

      log.success('created');
      log.fail('not created');

      expect(consoleSpy.log).toHaveBeenNthCalledWith(1, '✓ created');
      expect(consoleSpy.log).toHaveBeenNthCalledWith(2, '✗ not created');
    });
  });

  describe('shared instance', () => {
    it('should apply the level set by the CLI', () => {
      logger.setLevel('debug');

      logger.debug('Project root: /tmp/app');

      expect(consoleSpy.log).toHaveBeenCalledWith('[DEBUG] Project root: /tmp/app');
    });
  });
});
