import { describe, it, expect } from 'vitest';
import { createRedactRules, REDACTED } from '../../src/concerns/logger-redact.js';
import { isLogLevel, getLoggerOptionsFromEnv } from '../../src/concerns/logger.js';

describe('logger', () => {
  describe('createRedactRules', () => {
    it('should always mask the API credentials', () => {
      const rules = createRedactRules();
      expect(rules.censor).toBe(REDACTED);
      expect(rules.paths).toContain('password');
      expect(rules.paths).toContain('cloudsigma_password');
      expect(rules.paths).toContain('headers.Authorization');
    });

    it('should append extra paths without duplicates', () => {
      const rules = createRedactRules(['token', 'password']);
      expect(rules.paths.filter(path => path === 'password')).toHaveLength(1);
      expect(rules.paths[rules.paths.length - 1]).toBe('token');
    });
  });

  describe('isLogLevel', () => {
    it('should accept pino levels only', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('silent')).toBe(true);
      expect(isLogLevel('verbose')).toBe(false);
      expect(isLogLevel(3)).toBe(false);
    });
  });

  describe('getLoggerOptionsFromEnv', () => {
    it('should let the environment override the configured level and format', () => {
      const options = getLoggerOptionsFromEnv({ level: 'debug', format: 'pretty', name: 'x' });
      expect(options).toEqual({ level: 'silent', format: 'json', name: 'x' });
    });
  });
});
