/**
 * Tests for Airtable configuration.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  AirtableConfigBuilder,
  SecretString,
  configWithToken,
  ConfigurationError,
  InvalidBaseUrlError,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_RATE_LIMIT_CONFIG,
  DEFAULT_USER_AGENT,
  PACKAGE_NAME,
  PACKAGE_VERSION,
  SERVER_NAME,
  SERVER_VERSION,
} from '../index.js';

describe('SecretString', () => {
  it('should hide value in toString()', () => {
    const secret = SecretString.from('test-secret');
    expect(secret.toString()).toBe('[REDACTED]');
    expect(`${secret}`).toBe('[REDACTED]');
  });

  it('should hide value in JSON', () => {
    const secret = SecretString.from('test-secret');
    expect(JSON.stringify({ token: secret })).toBe('{"token":"[REDACTED]"}');
  });

  it('should expose value with expose()', () => {
    expect(SecretString.from('test-secret').expose()).toBe('test-secret');
  });
});

describe('AirtableConfigBuilder', () => {
  describe('defaults', () => {
    it('should build config with a token and defaults', () => {
      const config = new AirtableConfigBuilder().withToken('test-token').build();

      expect(config.baseUrl).toBe(DEFAULT_BASE_URL);
      expect(config.requestTimeoutMs).toBe(DEFAULT_TIMEOUT_MS);
      expect(config.auth.type).toBe('pat');
      expect(config.auth.token.expose()).toBe('test-token');
      expect(config.retryConfig).toEqual(DEFAULT_RETRY_CONFIG);
      expect(config.rateLimitConfig).toEqual(DEFAULT_RATE_LIMIT_CONFIG);
    });

    it('should trim the token', () => {
      const config = new AirtableConfigBuilder().withToken('  test-token  ').build();
      expect(config.auth.token.expose()).toBe('test-token');
    });
  });

  describe('validation', () => {
    it('should throw ConfigurationError without auth', () => {
      expect(() => new AirtableConfigBuilder().build()).toThrow(ConfigurationError);
    });

    it('should throw ConfigurationError for a blank token', () => {
      expect(() => new AirtableConfigBuilder().withToken('   ')).toThrow(ConfigurationError);
    });

    it('should reject non-HTTP base URLs', () => {
      expect(() => new AirtableConfigBuilder().withBaseUrl('ftp://example.com')).toThrow(InvalidBaseUrlError);
      expect(() => new AirtableConfigBuilder().withBaseUrl('not a url')).toThrow(InvalidBaseUrlError);
    });

    it('should strip trailing slashes from the base URL', () => {
      const settings = new AirtableConfigBuilder().withBaseUrl('https://proxy.test/v0//').buildSettings();
      expect(settings.baseUrl).toBe('https://proxy.test/v0');
    });

    it('should reject non-positive timeouts', () => {
      expect(() => new AirtableConfigBuilder().withTimeout(0)).toThrow(ConfigurationError);
    });

    it('should reject negative retry counts', () => {
      expect(() => new AirtableConfigBuilder().withRetryConfig({ maxRetries: -1 })).toThrow(ConfigurationError);
    });

    it('should reject a zero rate limit', () => {
      expect(() => new AirtableConfigBuilder().withRateLimitConfig({ requestsPerSecond: 0 })).toThrow(
        ConfigurationError
      );
    });
  });

  describe('withSettings', () => {
    it('should merge partial sections over defaults', () => {
      const settings = new AirtableConfigBuilder()
        .withSettings({ retryConfig: { maxRetries: 1 }, circuitBreakerConfig: { enabled: false } })
        .buildSettings();

      expect(settings.retryConfig.maxRetries).toBe(1);
      expect(settings.retryConfig.initialBackoffMs).toBe(DEFAULT_RETRY_CONFIG.initialBackoffMs);
      expect(settings.circuitBreakerConfig.enabled).toBe(false);
      expect(settings.circuitBreakerConfig.failureThreshold).toBe(5);
    });
  });

  describe('fromEnv', () => {
    it('should read settings from the environment', () => {
      const builder = AirtableConfigBuilder.fromEnv({
        AIRTABLE_API_KEY: 'test-token',
        AIRTABLE_BASE_URL: 'https://proxy.test/v0/',
        AIRTABLE_TIMEOUT_MS: '1500',
        AIRTABLE_RATE_LIMIT_RPS: '2',
        AIRTABLE_MAX_RETRIES: '7',
      });
      const config = builder.build();

      expect(config.auth.token.expose()).toBe('test-token');
      expect(config.baseUrl).toBe('https://proxy.test/v0');
      expect(config.requestTimeoutMs).toBe(1500);
      expect(config.rateLimitConfig.requestsPerSecond).toBe(2);
      expect(config.retryConfig.maxRetries).toBe(7);
    });

    it('should ignore values that do not parse', () => {
      const settings = AirtableConfigBuilder.fromEnv({ AIRTABLE_TIMEOUT_MS: 'soon' }).buildSettings();
      expect(settings.requestTimeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    });

    it('should build settings without a token', () => {
      const builder = AirtableConfigBuilder.fromEnv({});
      expect(builder.buildSettings().baseUrl).toBe(DEFAULT_BASE_URL);
      expect(() => builder.build()).toThrow(ConfigurationError);
    });
  });
});

describe('configWithToken', () => {
  it('should attach a token to settings', () => {
    const settings = new AirtableConfigBuilder().buildSettings();
    const config = configWithToken(settings, 'test-token');

    expect(config.auth.token.expose()).toBe('test-token');
    expect(config.baseUrl).toBe(settings.baseUrl);
  });

  it('should reject a blank token', () => {
    const settings = new AirtableConfigBuilder().buildSettings();
    expect(() => configWithToken(settings, '')).toThrow(ConfigurationError);
  });
});

describe('package identity', () => {
  it('should match package.json', () => {
    const manifest = z
      .object({ name: z.string(), version: z.string() })
      .parse(JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8')));

    expect(PACKAGE_NAME).toBe(manifest.name);
    expect(PACKAGE_VERSION).toBe(manifest.version);
  });

  it('should derive the user agent and server identity from it', () => {
    expect(DEFAULT_USER_AGENT).toBe(`${PACKAGE_NAME}/${PACKAGE_VERSION}`);
    expect(SERVER_NAME).toBe(PACKAGE_NAME);
    expect(SERVER_VERSION).toBe(PACKAGE_VERSION);
  });
});
