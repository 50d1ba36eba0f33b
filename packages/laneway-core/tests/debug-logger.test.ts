/**
 * Unit tests for DebugLogger
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { DebugLogger, getLogLevel, isLogLevel, setLogLevel } from '../src/debug-logger.js';

describe('DebugLogger', () => {
  afterEach(() => {
    setLogLevel(null);
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe('level resolution', () => {
    it('should default to ERROR', () => {
      vi.stubEnv('LANEWAY_LOG_LEVEL', '');
      expect(getLogLevel()).toBe('ERROR');
    });

    it('should read LANEWAY_LOG_LEVEL case-insensitively', () => {
      vi.stubEnv('LANEWAY_LOG_LEVEL', 'debug');
      expect(getLogLevel()).toBe('DEBUG');
    });

    it('should prefer the override over the environment', () => {
      vi.stubEnv('LANEWAY_LOG_LEVEL', 'debug');
      setLogLevel('warn');
      expect(getLogLevel()).toBe('WARN');
    });

    it('should ignore unknown override values', () => {
      vi.stubEnv('LANEWAY_LOG_LEVEL', 'info');
      setLogLevel('verbose');
      expect(getLogLevel()).toBe('INFO');
    });

    it('should recognize level names', () => {
      expect(isLogLevel('NONE')).toBe(true);
      expect(isLogLevel('none')).toBe(false);
    });
  });

  describe('output', () => {
    it('should tag messages with context and level', () => {
      setLogLevel('INFO');
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

      new DebugLogger('Queue').info('started', 3);

      expect(spy).toHaveBeenCalledTimes(1);
      const [prefix, message, count] = spy.mock.calls[0];
      expect(String(prefix)).toMatch(/^\[.+\] \[Queue\] \[INFO\]$/);
      expect(message).toBe('started');
      expect(count).toBe(3);
    });

    it('should drop messages below the active level', () => {
      setLogLevel('WARN');
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const logger = new DebugLogger('Test');

      logger.debug('hidden');
      logger.info('hidden');
      logger.warn('shown');

      expect(errorSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    it('should log nothing at NONE', () => {
      setLogLevel('NONE');
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      new DebugLogger().error('quiet');
      expect(spy).not.toHaveBeenCalled();
    });
  });
});
