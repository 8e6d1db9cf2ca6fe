/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { parseEnv, createConfig } from '@/infra/config/index.js';

const BASE_ENV = { DATABASE_URL: 'postgres://localhost/test' };

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when only DATABASE_URL is set', () => {
      const env = parseEnv(BASE_ENV);

      expect(env.NODE_ENV).toBe('development');
      expect(env.PORT).toBe(3000);
      expect(env.HOST).toBe('0.0.0.0');
      expect(env.LOG_LEVEL).toBe('info');
      expect(env.ACTIVITY_TIMEZONE).toBe('UTC');
      expect(env.MAX_CONFLICT_RETRIES).toBe(3);
    });

    it('requires DATABASE_URL', () => {
      expect(() => parseEnv({})).toThrow('Invalid environment configuration');
    });

    it('parses PORT as number', () => {
      const env = parseEnv({ ...BASE_ENV, PORT: '8080' });

      expect(env.PORT).toBe(8080);
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        expect(parseEnv({ ...BASE_ENV, LOG_LEVEL: level }).LOG_LEVEL).toBe(level);
      }
    });

    it('throws on invalid PORT (non-numeric)', () => {
      expect(() => parseEnv({ ...BASE_ENV, PORT: 'invalid' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('accepts IANA time zones and rejects unknown ones', () => {
      expect(parseEnv({ ...BASE_ENV, ACTIVITY_TIMEZONE: 'Europe/Bucharest' }).ACTIVITY_TIMEZONE).toBe(
        'Europe/Bucharest'
      );
      expect(() => parseEnv({ ...BASE_ENV, ACTIVITY_TIMEZONE: 'Mars/Olympus' })).toThrow(
        "unknown time zone 'Mars/Olympus'"
      );
    });

    it('bounds MAX_CONFLICT_RETRIES', () => {
      expect(parseEnv({ ...BASE_ENV, MAX_CONFLICT_RETRIES: '5' }).MAX_CONFLICT_RETRIES).toBe(5);
      expect(() => parseEnv({ ...BASE_ENV, MAX_CONFLICT_RETRIES: '0' })).toThrow(
        'Invalid environment configuration'
      );
    });
  });

  describe('createConfig', () => {
    it('creates server config with correct flags', () => {
      const devConfig = createConfig(parseEnv({ ...BASE_ENV, NODE_ENV: 'development' }));
      expect(devConfig.server.isDevelopment).toBe(true);
      expect(devConfig.logger.pretty).toBe(true);

      const prodConfig = createConfig(parseEnv({ ...BASE_ENV, NODE_ENV: 'production' }));
      expect(prodConfig.server.isProduction).toBe(true);
      expect(prodConfig.logger.pretty).toBe(false);
    });

    it('splits authorized parties', () => {
      const config = createConfig(
        parseEnv({ ...BASE_ENV, AUTH_AUTHORIZED_PARTIES: 'https://a.test,https://b.test' })
      );

      expect(config.auth.authorizedParties).toEqual(['https://a.test', 'https://b.test']);
    });

    it('carries gamification settings', () => {
      const config = createConfig(
        parseEnv({ ...BASE_ENV, ACTIVITY_TIMEZONE: 'America/New_York', MAX_CONFLICT_RETRIES: '4' })
      );

      expect(config.gamification).toEqual({
        activityTimeZone: 'America/New_York',
        maxConflictRetries: 4,
      });
    });
  });
});
