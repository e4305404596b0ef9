/**
 * Resilience components for the Airtable client.
 *
 * Includes rate limiting, retry logic, and circuit breaker implementations.
 */

import {
  RateLimitConfig,
  RetryConfig,
  CircuitBreakerConfig,
  DEFAULT_RATE_LIMIT_CONFIG,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
} from '../config/index.js';
import {
  RateLimitedError,
  QueueTimeoutError,
  CircuitBreakerOpenError,
  isRetryableError,
  getRetryDelayMs,
  toError,
} from '../errors/index.js';

// ============================================================================
// Rate Limiter
// ============================================================================

interface QueuedAcquire {
  resolve: () => void;
  reject: (error: Error) => void;
  timeout: ReturnType<typeof setTimeout>;
}

/**
 * Token bucket rate limiter with adaptive slowdown after 429 responses.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillRate: number;
  private consecutiveRateLimits: number = 0;
  private currentRate: number;
  private readonly config: RateLimitConfig;
  private queue: QueuedAcquire[] = [];
  private refillTimer?: ReturnType<typeof setTimeout>;

  constructor(config: RateLimitConfig = DEFAULT_RATE_LIMIT_CONFIG) {
    this.config = config;
    this.maxTokens = config.requestsPerSecond;
    this.currentRate = config.requestsPerSecond;
    this.refillRate = config.requestsPerSecond;
    this.tokens = this.maxTokens;
    this.lastRefill = Date.now();
  }

  /**
   * Acquires a token, waiting if necessary.
   * @throws QueueTimeoutError if the queue is full or the wait exceeds the queue timeout
   */
  async acquire(): Promise<void> {
    this.refillTokens();

    if (this.tokens >= 1 && this.queue.length === 0) {
      this.tokens -= 1;
      return;
    }

    if (this.queue.length >= this.config.maxQueueSize) {
      throw new QueueTimeoutError(0);
    }

    return new Promise<void>((resolve, reject) => {
      const entry: QueuedAcquire = {
        resolve,
        reject,
        timeout: setTimeout(() => {
          const index = this.queue.indexOf(entry);
          if (index !== -1) {
            this.queue.splice(index, 1);
          }
          reject(new QueueTimeoutError(this.config.queueTimeout));
        }, this.config.queueTimeout),
      };
      this.queue.push(entry);
      this.scheduleTokenRefill();
    });
  }

  private refillTokens(): void {
    const now = Date.now();
    const elapsed = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.currentRate);
    this.lastRefill = now;
  }

  /**
   * Wakes queued callers as tokens become available.
   */
  private scheduleTokenRefill(): void {
    if (this.refillTimer) return;

    const timeToNextToken = (1 / this.currentRate) * 1000;
    this.refillTimer = setTimeout(() => {
      this.refillTimer = undefined;
      this.refillTokens();

      let next = this.queue[0];
      while (this.tokens >= 1 && next) {
        this.queue.shift();
        this.tokens -= 1;
        clearTimeout(next.timeout);
        next.resolve();
        next = this.queue[0];
      }

      if (this.queue.length > 0) {
        this.scheduleTokenRefill();
      }
    }, timeToNextToken);
  }

  /**
   * Halves the effective rate for each consecutive 429, when adaptive limiting is on.
   */
  handleRateLimitResponse(): void {
    this.consecutiveRateLimits += 1;

    if (this.config.adaptiveRateLimit) {
      const reductionFactor = Math.pow(0.5, this.consecutiveRateLimits);
      this.currentRate = Math.max(1, this.refillRate * reductionFactor);
    }
  }

  /**
   * Records a successful request, gradually recovering rate.
   */
  handleSuccess(): void {
    if (this.consecutiveRateLimits > 0 && this.config.adaptiveRateLimit) {
      this.consecutiveRateLimits = Math.max(0, this.consecutiveRateLimits - 1);
      this.currentRate = Math.min(this.refillRate, this.currentRate * 1.1);
    }
  }

  getStats(): {
    currentTokens: number;
    currentRate: number;
    maxRate: number;
    queueSize: number;
    consecutiveRateLimits: number;
  } {
    this.refillTokens();
    return {
      currentTokens: this.tokens,
      currentRate: this.currentRate,
      maxRate: this.refillRate,
      queueSize: this.queue.length,
      consecutiveRateLimits: this.consecutiveRateLimits,
    };
  }

  /**
   * Resets the rate limiter and rejects anything still queued.
   */
  reset(): void {
    this.tokens = this.maxTokens;
    this.lastRefill = Date.now();
    this.consecutiveRateLimits = 0;
    this.currentRate = this.refillRate;

    if (this.refillTimer) {
      clearTimeout(this.refillTimer);
      this.refillTimer = undefined;
    }
    for (const item of this.queue) {
      clearTimeout(item.timeout);
      item.reject(new Error('Rate limiter reset'));
    }
    this.queue = [];
  }
}

// ============================================================================
// Circuit Breaker
// ============================================================================

export type CircuitBreakerState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

/**
 * Circuit breaker for preventing cascading failures.
 */
export class CircuitBreaker {
  private state: CircuitBreakerState = 'CLOSED';
  private failures: number = 0;
  private successes: number = 0;
  private lastFailureTime: number = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG) {
    this.config = config;
  }

  /**
   * Checks if the circuit breaker allows a request.
   * @throws CircuitBreakerOpenError if the circuit is open
   */
  allowRequest(): void {
    if (!this.config.enabled || this.state !== 'OPEN') {
      return;
    }

    const timeSinceFailure = Date.now() - this.lastFailureTime;
    if (timeSinceFailure >= this.config.resetTimeoutMs) {
      this.state = 'HALF_OPEN';
      this.successes = 0;
      return;
    }

    throw new CircuitBreakerOpenError(this.config.resetTimeoutMs - timeSinceFailure);
  }

  recordSuccess(): void {
    if (!this.config.enabled) {
      return;
    }

    this.successes += 1;

    switch (this.state) {
      case 'CLOSED':
        this.failures = Math.max(0, this.failures - 1);
        break;
      case 'HALF_OPEN':
        if (this.successes >= this.config.successThreshold) {
          this.state = 'CLOSED';
          this.failures = 0;
        }
        break;
      case 'OPEN':
        break;
    }
  }

  recordFailure(): void {
    if (!this.config.enabled) {
      return;
    }

    this.failures += 1;
    this.lastFailureTime = Date.now();

    switch (this.state) {
      case 'CLOSED':
        if (this.failures >= this.config.failureThreshold) {
          this.state = 'OPEN';
        }
        break;
      case 'HALF_OPEN':
        // one failed probe reopens the circuit
        this.state = 'OPEN';
        this.successes = 0;
        break;
      case 'OPEN':
        break;
    }
  }

  getState(): CircuitBreakerState {
    return this.state;
  }

  getStats(): {
    state: CircuitBreakerState;
    failures: number;
    successes: number;
    lastFailureTime: number;
  } {
    return {
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      lastFailureTime: this.lastFailureTime,
    };
  }

  reset(): void {
    this.state = 'CLOSED';
    this.failures = 0;
    this.successes = 0;
    this.lastFailureTime = 0;
  }
}

// ============================================================================
// Retry Executor
// ============================================================================

/**
 * Retry hooks for monitoring and logging.
 */
export interface RetryHooks {
  /** Called before a retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Called when all retries are exhausted */
  onRetriesExhausted?: (error: Error, attempts: number) => void;
  /** Called on successful completion */
  onSuccess?: (attempts: number) => void;
}

/**
 * Retry executor with exponential backoff.
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly hooks: RetryHooks;

  constructor(config: RetryConfig = DEFAULT_RETRY_CONFIG, hooks: RetryHooks = {}) {
    this.config = config;
    this.hooks = hooks;
  }

  /**
   * Executes an operation, retrying retryable failures.
   *
   * Rate-limit failures get their own retry allowance
   * (`maxRateLimitRetries`) and honour the server's retry-after delay.
   * `canRetry` narrows which retryable failures are retried.
   */
  async execute<T>(
    operation: () => Promise<T>,
    canRetry: (error: unknown) => boolean = isRetryableError
  ): Promise<T> {
    let attempt = 0;

    for (;;) {
      try {
        const result = await operation();
        this.hooks.onSuccess?.(attempt + 1);
        return result;
      } catch (error) {
        attempt += 1;

        if (!isRetryableError(error) || !canRetry(error)) {
          throw error;
        }

        const maxRetries = error instanceof RateLimitedError
          ? this.config.maxRateLimitRetries
          : this.config.maxRetries;

        if (attempt > maxRetries) {
          this.hooks.onRetriesExhausted?.(toError(error), attempt);
          throw error;
        }

        const delayMs = this.calculateDelay(attempt, error);
        this.hooks.onRetry?.(attempt, toError(error), delayMs);
        await this.sleep(delayMs);
      }
    }
  }

  /**
   * Calculates the delay for a retry attempt.
   */
  calculateDelay(attempt: number, error: unknown): number {
    const retryAfterMs = getRetryDelayMs(error);
    if (retryAfterMs !== undefined) {
      return Math.min(retryAfterMs, this.config.maxBackoffMs);
    }

    const exponentialDelay =
      this.config.initialBackoffMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const jitter = 1 + (Math.random() - 0.5) * 2 * this.config.jitterFactor;

    return Math.min(exponentialDelay * jitter, this.config.maxBackoffMs);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

/**
 * Creates a retry executor with the given configuration.
 */
export function createRetryExecutor(
  config?: Partial<RetryConfig>,
  hooks?: RetryHooks
): RetryExecutor {
  return new RetryExecutor({ ...DEFAULT_RETRY_CONFIG, ...config }, hooks);
}

// ============================================================================
// Resilience Orchestrator
// ============================================================================

/**
 * Options for resilient execution.
 */
export interface ResilientExecuteOptions {
  skipRateLimit?: boolean;
  skipCircuitBreaker?: boolean;
  skipRetry?: boolean;
  /** Retry only 429 responses, which Airtable rejects before applying */
  retryRateLimitedOnly?: boolean;
}

/**
 * Orchestrates circuit breaking, rate limiting and retries.
 *
 * Every attempt (including retries) passes the circuit breaker and takes a
 * rate limit token. Only retryable failures count against the circuit; a
 * 404 or a validation error says nothing about the service's health.
 */
export class ResilienceOrchestrator {
  private readonly rateLimiter: RateLimiter;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly retryExecutor: RetryExecutor;

  constructor(
    rateLimitConfig?: RateLimitConfig,
    circuitBreakerConfig?: CircuitBreakerConfig,
    retryConfig?: RetryConfig,
    retryHooks?: RetryHooks
  ) {
    this.rateLimiter = new RateLimiter(rateLimitConfig);
    this.circuitBreaker = new CircuitBreaker(circuitBreakerConfig);
    this.retryExecutor = new RetryExecutor(retryConfig, retryHooks);
  }

  async execute<T>(
    operation: () => Promise<T>,
    options: ResilientExecuteOptions = {}
  ): Promise<T> {
    const attempt = async (): Promise<T> => {
      if (!options.skipCircuitBreaker) {
        this.circuitBreaker.allowRequest();
      }
      if (!options.skipRateLimit) {
        await this.rateLimiter.acquire();
      }

      try {
        const result = await operation();
        if (!options.skipCircuitBreaker) {
          this.circuitBreaker.recordSuccess();
        }
        if (!options.skipRateLimit) {
          this.rateLimiter.handleSuccess();
        }
        return result;
      } catch (error) {
        if (!options.skipCircuitBreaker && isRetryableError(error) && !(error instanceof RateLimitedError)) {
          this.circuitBreaker.recordFailure();
        }
        if (error instanceof RateLimitedError && !options.skipRateLimit) {
          this.rateLimiter.handleRateLimitResponse();
        }
        throw error;
      }
    };

    if (options.skipRetry) {
      return attempt();
    }
    if (options.retryRateLimitedOnly) {
      return this.retryExecutor.execute(attempt, error => error instanceof RateLimitedError);
    }
    return this.retryExecutor.execute(attempt);
  }

  getRateLimiter(): RateLimiter {
    return this.rateLimiter;
  }

  getCircuitBreaker(): CircuitBreaker {
    return this.circuitBreaker;
  }

  getStats(): {
    rateLimiter: ReturnType<RateLimiter['getStats']>;
    circuitBreaker: ReturnType<CircuitBreaker['getStats']>;
  } {
    return {
      rateLimiter: this.rateLimiter.getStats(),
      circuitBreaker: this.circuitBreaker.getStats(),
    };
  }

  reset(): void {
    this.rateLimiter.reset();
    this.circuitBreaker.reset();
  }
}
