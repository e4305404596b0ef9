/**
 * Airtable client configuration and builder.
 *
 * Provides configuration types, builder pattern, and defaults for the Airtable API client.
 */

import { ConfigurationError, InvalidBaseUrlError } from '../errors/index.js';

// ============================================================================
// SecretString
// ============================================================================

/**
 * SecretString wrapper to prevent accidental logging of sensitive values.
 * The value is only accessible via the expose() method.
 */
export class SecretString {
  private readonly value: string;

  private constructor(value: string) {
    this.value = value;
  }

  /**
   * Creates a SecretString from a plain string value.
   */
  static from(value: string): SecretString {
    return new SecretString(value);
  }

  /**
   * Exposes the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

// ============================================================================
// Authentication Types
// ============================================================================

/**
 * Personal Access Token authentication method.
 */
export interface PatAuthMethod {
  type: 'pat';
  /** Personal Access Token */
  token: SecretString;
}

/**
 * Authentication method types for Airtable API.
 */
export type AuthMethod = PatAuthMethod;

// ============================================================================
// Resilience Configuration
// ============================================================================

/**
 * Rate limit configuration.
 *
 * Airtable allows 5 requests per second per base on standard plans.
 */
export interface RateLimitConfig {
  /** Requests per second limit. Default: 5 */
  requestsPerSecond: number;
  /** Maximum pending requests in queue. Default: 100 */
  maxQueueSize: number;
  /** Maximum time to wait in queue (ms). Default: 30000 */
  queueTimeout: number;
  /** Whether to slow down after 429 responses. Default: true */
  adaptiveRateLimit: boolean;
}

/**
 * Retry configuration for failed requests.
 */
export interface RetryConfig {
  /** Maximum retry attempts. Default: 3 */
  maxRetries: number;
  /** Maximum retries for rate limit errors. Default: 5 */
  maxRateLimitRetries: number;
  /** Initial backoff delay (ms). Default: 1000 */
  initialBackoffMs: number;
  /** Maximum backoff delay (ms). Default: 60000 */
  maxBackoffMs: number;
  /** Backoff multiplier. Default: 2 */
  backoffMultiplier: number;
  /** Jitter factor (0-1). Default: 0.1 */
  jitterFactor: number;
}

/**
 * Circuit breaker configuration for fault tolerance.
 */
export interface CircuitBreakerConfig {
  /** Enable circuit breaker. Default: true */
  enabled: boolean;
  /** Failure threshold before opening circuit. Default: 5 */
  failureThreshold: number;
  /** Reset timeout (ms). Default: 30000 */
  resetTimeoutMs: number;
  /** Success threshold to close circuit. Default: 2 */
  successThreshold: number;
}

// ============================================================================
// Main Configuration Interface
// ============================================================================

/**
 * Airtable API client configuration.
 */
export interface AirtableConfig {
  /** Base API URL. Default: 'https://api.airtable.com/v0' */
  baseUrl: string;
  /** Authentication method */
  auth: AuthMethod;
  /** Request timeout in milliseconds. Default: 30000 */
  requestTimeoutMs: number;
  /** User agent string */
  userAgent: string;
  rateLimitConfig: RateLimitConfig;
  retryConfig: RetryConfig;
  circuitBreakerConfig: CircuitBreakerConfig;
}

/**
 * Everything in {@link AirtableConfig} except the credentials.
 *
 * The tool adapter holds settings and applies a token per call.
 */
export type ClientSettings = Omit<AirtableConfig, 'auth'>;

/**
 * Partial settings accepted from callers; missing sections use defaults.
 */
export interface ClientSettingsInput {
  baseUrl?: string;
  requestTimeoutMs?: number;
  userAgent?: string;
  rateLimitConfig?: Partial<RateLimitConfig>;
  retryConfig?: Partial<RetryConfig>;
  circuitBreakerConfig?: Partial<CircuitBreakerConfig>;
}

// ============================================================================
// Default Configurations
// ============================================================================

export const DEFAULT_BASE_URL = 'https://api.airtable.com/v0';

/**
 * Default request timeout in milliseconds (30 seconds).
 */
export const DEFAULT_TIMEOUT_MS = 30000;

/** Kept equal to the `name` and `version` in package.json */
export const PACKAGE_NAME = 'airtable-tools';
export const PACKAGE_VERSION = '0.1.0';

export const DEFAULT_USER_AGENT = `${PACKAGE_NAME}/${PACKAGE_VERSION}`;

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  requestsPerSecond: 5,
  maxQueueSize: 100,
  queueTimeout: 30000,
  adaptiveRateLimit: true,
};

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  maxRateLimitRetries: 5,
  initialBackoffMs: 1000,
  maxBackoffMs: 60000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  enabled: true,
  failureThreshold: 5,
  resetTimeoutMs: 30000,
  successThreshold: 2,
};

/**
 * Environment variable names read by {@link AirtableConfigBuilder.fromEnv}.
 */
export const ENV_VARS = {
  API_KEY: 'AIRTABLE_API_KEY',
  BASE_URL: 'AIRTABLE_BASE_URL',
  TIMEOUT_MS: 'AIRTABLE_TIMEOUT_MS',
  RATE_LIMIT_RPS: 'AIRTABLE_RATE_LIMIT_RPS',
  MAX_RETRIES: 'AIRTABLE_MAX_RETRIES',
  LOG_LEVEL: 'AIRTABLE_LOG_LEVEL',
} as const;

// ============================================================================
// Configuration Builder
// ============================================================================

/**
 * Builder for Airtable API client configuration.
 *
 * @example
 * ```typescript
 * const config = new AirtableConfigBuilder()
 *   .withToken('test-token')
 *   .withTimeout(60000)
 *   .build();
 *
 * // Settings only, the token is supplied later
 * const settings = AirtableConfigBuilder.fromEnv().buildSettings();
 * ```
 */
export class AirtableConfigBuilder {
  private baseUrl: string = DEFAULT_BASE_URL;
  private auth?: AuthMethod;
  private requestTimeoutMs: number = DEFAULT_TIMEOUT_MS;
  private userAgent: string = DEFAULT_USER_AGENT;
  private rateLimitConfig: RateLimitConfig = { ...DEFAULT_RATE_LIMIT_CONFIG };
  private retryConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG };
  private circuitBreakerConfig: CircuitBreakerConfig = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG };

  /**
   * Sets Personal Access Token authentication.
   * @throws ConfigurationError if the token is blank
   */
  withToken(token: string): this {
    if (!token || token.trim().length === 0) {
      throw new ConfigurationError('Personal Access Token cannot be empty');
    }
    this.auth = {
      type: 'pat',
      token: SecretString.from(token.trim()),
    };
    return this;
  }

  /**
   * Sets the base URL for the Airtable API. A trailing slash is removed.
   * @throws InvalidBaseUrlError if the URL cannot be parsed or is not HTTP(S)
   */
  withBaseUrl(url: string): this {
    if (!url || url.trim().length === 0) {
      throw new InvalidBaseUrlError(url);
    }
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new InvalidBaseUrlError(url);
    }
    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
      throw new InvalidBaseUrlError(url);
    }
    this.baseUrl = url.replace(/\/+$/, '');
    return this;
  }

  withTimeout(ms: number): this {
    if (!Number.isFinite(ms) || ms <= 0) {
      throw new ConfigurationError('Request timeout must be positive');
    }
    this.requestTimeoutMs = ms;
    return this;
  }

  /**
   * Merges retry settings over the current ones.
   */
  withRetryConfig(config: Partial<RetryConfig>): this {
    if (config.maxRetries !== undefined && config.maxRetries < 0) {
      throw new ConfigurationError('maxRetries cannot be negative');
    }
    this.retryConfig = { ...this.retryConfig, ...config };
    return this;
  }

  withCircuitBreakerConfig(config: Partial<CircuitBreakerConfig>): this {
    this.circuitBreakerConfig = { ...this.circuitBreakerConfig, ...config };
    return this;
  }

  withRateLimitConfig(config: Partial<RateLimitConfig>): this {
    if (config.requestsPerSecond !== undefined && config.requestsPerSecond <= 0) {
      throw new ConfigurationError('requestsPerSecond must be positive');
    }
    this.rateLimitConfig = { ...this.rateLimitConfig, ...config };
    return this;
  }

  withUserAgent(userAgent: string): this {
    this.userAgent = userAgent;
    return this;
  }

  /**
   * Applies a partial settings object, section by section.
   */
  withSettings(settings: ClientSettingsInput): this {
    if (settings.baseUrl !== undefined) this.withBaseUrl(settings.baseUrl);
    if (settings.requestTimeoutMs !== undefined) this.withTimeout(settings.requestTimeoutMs);
    if (settings.userAgent !== undefined) this.withUserAgent(settings.userAgent);
    if (settings.rateLimitConfig) this.withRateLimitConfig(settings.rateLimitConfig);
    if (settings.retryConfig) this.withRetryConfig(settings.retryConfig);
    if (settings.circuitBreakerConfig) this.withCircuitBreakerConfig(settings.circuitBreakerConfig);
    return this;
  }

  /**
   * Creates a builder from environment variables.
   *
   * - AIRTABLE_API_KEY: Personal Access Token (optional here; the tool
   *   adapter reads it through its credential provider instead)
   * - AIRTABLE_BASE_URL: Custom base URL
   * - AIRTABLE_TIMEOUT_MS: Request timeout in milliseconds
   * - AIRTABLE_RATE_LIMIT_RPS: Rate limit requests per second
   * - AIRTABLE_MAX_RETRIES: Maximum retry attempts
   *
   * Numeric values that do not parse are ignored.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): AirtableConfigBuilder {
    const builder = new AirtableConfigBuilder();

    const token = env[ENV_VARS.API_KEY];
    if (token && token.trim()) {
      builder.withToken(token);
    }

    const baseUrl = env[ENV_VARS.BASE_URL];
    if (baseUrl) {
      builder.withBaseUrl(baseUrl);
    }

    const timeoutMs = parseInteger(env[ENV_VARS.TIMEOUT_MS]);
    if (timeoutMs !== undefined) {
      builder.withTimeout(timeoutMs);
    }

    const rps = parseInteger(env[ENV_VARS.RATE_LIMIT_RPS]);
    if (rps !== undefined) {
      builder.withRateLimitConfig({ requestsPerSecond: rps });
    }

    const retries = parseInteger(env[ENV_VARS.MAX_RETRIES]);
    if (retries !== undefined) {
      builder.withRetryConfig({ maxRetries: retries });
    }

    return builder;
  }

  /**
   * Builds the settings without requiring authentication.
   */
  buildSettings(): ClientSettings {
    return {
      baseUrl: this.baseUrl,
      requestTimeoutMs: this.requestTimeoutMs,
      userAgent: this.userAgent,
      rateLimitConfig: { ...this.rateLimitConfig },
      retryConfig: { ...this.retryConfig },
      circuitBreakerConfig: { ...this.circuitBreakerConfig },
    };
  }

  /**
   * Builds the Airtable configuration.
   * @throws ConfigurationError if no token was set
   */
  build(): AirtableConfig {
    if (!this.auth) {
      throw new ConfigurationError('Authentication is required (use withToken())');
    }
    return { ...this.buildSettings(), auth: this.auth };
  }
}

/**
 * Combines settings with a token into a full client configuration.
 */
export function configWithToken(settings: ClientSettings, token: string): AirtableConfig {
  if (!token || token.trim().length === 0) {
    throw new ConfigurationError('Personal Access Token cannot be empty');
  }
  return {
    ...settings,
    auth: { type: 'pat', token: SecretString.from(token.trim()) },
  };
}

function parseInteger(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}
