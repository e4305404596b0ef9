/**
 * Airtable error types and handling.
 *
 * Error hierarchy with proper categorization for retryable vs non-retryable errors.
 * Maps HTTP status codes to appropriate error types.
 */

/**
 * Error codes for Airtable errors.
 */
export enum AirtableErrorCode {
  // Configuration errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INVALID_BASE_URL = 'INVALID_BASE_URL',

  // Authentication errors
  UNAUTHORIZED = 'UNAUTHORIZED',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  INSUFFICIENT_SCOPE = 'INSUFFICIENT_SCOPE',

  // Rate limiting
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  QUEUE_TIMEOUT = 'QUEUE_TIMEOUT',

  // Resource errors
  NOT_FOUND = 'NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  BATCH_SIZE_EXCEEDED = 'BATCH_SIZE_EXCEEDED',

  // Network/Server errors
  SERVER_ERROR = 'SERVER_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',

  // Circuit breaker
  CIRCUIT_BREAKER_OPEN = 'CIRCUIT_BREAKER_OPEN',
}

/**
 * Airtable API error response structure.
 *
 * Most endpoints answer with `{ error: { type, message } }`; some 404s
 * carry only a bare string such as `{ error: 'NOT_FOUND' }`.
 */
export interface AirtableApiErrorResponse {
  error: string | { type?: string; message?: string };
}

/**
 * Base Airtable error class.
 */
export class AirtableError extends Error {
  /** Error code */
  readonly code: AirtableErrorCode;
  /** HTTP status code (if applicable) */
  readonly statusCode?: number;
  /** Whether this error is retryable */
  readonly retryable: boolean;
  /** Retry-after duration in milliseconds */
  readonly retryAfter?: number;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: AirtableErrorCode;
    message: string;
    statusCode?: number;
    retryable?: boolean;
    retryAfter?: number;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super(options.message, { cause: options.cause });
    this.name = 'AirtableError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
    this.retryAfter = options.retryAfter;
    this.details = options.details;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      retryAfter: this.retryAfter,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors (Non-Retryable)
// ============================================================================

export class ConfigurationError extends AirtableError {
  constructor(message: string) {
    super({
      code: AirtableErrorCode.CONFIGURATION_ERROR,
      message: `Configuration error: ${message}`,
      retryable: false,
    });
    this.name = 'ConfigurationError';
  }
}

export class InvalidBaseUrlError extends AirtableError {
  constructor(baseUrl: string) {
    super({
      code: AirtableErrorCode.INVALID_BASE_URL,
      message: `Invalid base URL: ${baseUrl}`,
      retryable: false,
      details: { baseUrl },
    });
    this.name = 'InvalidBaseUrlError';
  }
}

// ============================================================================
// Authentication Errors (Non-Retryable)
// ============================================================================

export class AuthenticationError extends AirtableError {
  constructor(message: string = 'Authentication failed', statusCode?: number) {
    super({
      code: AirtableErrorCode.UNAUTHORIZED,
      message,
      statusCode,
      retryable: false,
    });
    this.name = 'AuthenticationError';
  }
}

export class TokenExpiredError extends AirtableError {
  constructor() {
    super({
      code: AirtableErrorCode.TOKEN_EXPIRED,
      message: 'Authentication token has expired',
      statusCode: 401,
      retryable: false,
    });
    this.name = 'TokenExpiredError';
  }
}

export class InsufficientScopeError extends AirtableError {
  constructor(message: string) {
    super({
      code: AirtableErrorCode.INSUFFICIENT_SCOPE,
      message: `Insufficient scope: ${message}`,
      statusCode: 403,
      retryable: false,
    });
    this.name = 'InsufficientScopeError';
  }
}

// ============================================================================
// Rate Limiting Errors
// ============================================================================

/**
 * Rate limit exceeded error (HTTP 429).
 */
export class RateLimitedError extends AirtableError {
  constructor(retryAfterMs: number) {
    super({
      code: AirtableErrorCode.RATE_LIMIT_EXCEEDED,
      message: `Rate limited, retry after ${retryAfterMs}ms`,
      statusCode: 429,
      retryable: true,
      retryAfter: retryAfterMs,
    });
    this.name = 'RateLimitedError';
  }
}

/**
 * Raised by the local rate limiter when a request waits too long for a slot.
 */
export class QueueTimeoutError extends AirtableError {
  constructor(timeoutMs: number) {
    super({
      code: AirtableErrorCode.QUEUE_TIMEOUT,
      message: `Request queued for too long (${timeoutMs}ms)`,
      retryable: false,
      details: { timeoutMs },
    });
    this.name = 'QueueTimeoutError';
  }
}

// ============================================================================
// Resource Errors (Non-Retryable)
// ============================================================================

export class NotFoundError extends AirtableError {
  constructor(resource: string) {
    super({
      code: AirtableErrorCode.NOT_FOUND,
      message: `Resource not found: ${resource}`,
      statusCode: 404,
      retryable: false,
      details: { resource },
    });
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AirtableError {
  constructor(message: string, field?: string, statusCode?: number) {
    super({
      code: AirtableErrorCode.VALIDATION_ERROR,
      message: field ? `Validation error for field '${field}': ${message}` : `Validation error: ${message}`,
      statusCode,
      retryable: false,
      details: field ? { field } : undefined,
    });
    this.name = 'ValidationError';
  }
}

export class BatchSizeExceededError extends AirtableError {
  constructor(max: number, actual: number) {
    super({
      code: AirtableErrorCode.BATCH_SIZE_EXCEEDED,
      message: `Batch size ${actual} exceeds maximum ${max}`,
      retryable: false,
      details: { max, actual },
    });
    this.name = 'BatchSizeExceededError';
  }
}

// ============================================================================
// Network/Server Errors (Retryable)
// ============================================================================

export class ServerError extends AirtableError {
  constructor(statusCode: number, message: string = 'Airtable server error') {
    super({
      code: AirtableErrorCode.SERVER_ERROR,
      message,
      statusCode,
      retryable: true,
    });
    this.name = 'ServerError';
  }
}

export class NetworkError extends AirtableError {
  constructor(message: string, cause?: Error) {
    super({
      code: AirtableErrorCode.NETWORK_ERROR,
      message: `Network error: ${message}`,
      retryable: true,
      cause,
    });
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends AirtableError {
  constructor(timeoutMs: number) {
    super({
      code: AirtableErrorCode.TIMEOUT,
      message: `Request timed out after ${timeoutMs}ms`,
      retryable: true,
      details: { timeoutMs },
    });
    this.name = 'TimeoutError';
  }
}

// ============================================================================
// Circuit Breaker Errors
// ============================================================================

export class CircuitBreakerOpenError extends AirtableError {
  constructor(resetInMs: number) {
    super({
      code: AirtableErrorCode.CIRCUIT_BREAKER_OPEN,
      message: `Circuit breaker is open, resets in ${resetInMs}ms`,
      retryable: false,
      details: { resetInMs },
    });
    this.name = 'CircuitBreakerOpenError';
  }
}

// ============================================================================
// Error Parsing Utilities
// ============================================================================

/**
 * Reads the `{ type, message }` pair out of an arbitrary error body.
 */
export function extractApiError(body: unknown): { type?: string; message?: string } {
  if (typeof body !== 'object' || body === null || !('error' in body)) {
    return {};
  }
  const error = body.error;
  if (typeof error === 'string') {
    return { type: error, message: error };
  }
  if (typeof error === 'object' && error !== null) {
    const type = 'type' in error && typeof error.type === 'string' ? error.type : undefined;
    const message = 'message' in error && typeof error.message === 'string' ? error.message : undefined;
    return { type, message: message ?? type };
  }
  return {};
}

/**
 * Parses an Airtable API error response into the appropriate error type.
 *
 * @param statusCode - HTTP status code
 * @param body - Decoded response body, if any
 * @param retryAfter - Retry-After header value in seconds
 */
export function parseAirtableApiError(
  statusCode: number,
  body?: unknown,
  retryAfter?: number
): AirtableError {
  const parsed = extractApiError(body);
  const errorType = parsed.type ?? 'UNKNOWN_ERROR';
  const errorMessage = parsed.message ?? `HTTP ${statusCode}`;
  const lowered = errorMessage.toLowerCase();

  switch (statusCode) {
    case 400:
    case 422: {
      if (lowered.includes('too many records') || errorType === 'TOO_MANY_RECORDS') {
        const numbers = errorMessage.match(/\d+/g);
        if (numbers && numbers.length >= 2 && numbers[0] !== undefined && numbers[1] !== undefined) {
          return new BatchSizeExceededError(parseInt(numbers[0], 10), parseInt(numbers[1], 10));
        }
      }
      return new ValidationError(errorMessage, undefined, statusCode);
    }

    case 401: {
      if (lowered.includes('expired')) {
        return new TokenExpiredError();
      }
      return new AuthenticationError(errorMessage, 401);
    }

    case 403: {
      if (lowered.includes('scope')) {
        return new InsufficientScopeError(errorMessage);
      }
      return new AuthenticationError(errorMessage, 403);
    }

    case 404:
      return new NotFoundError(errorMessage);

    case 429: {
      // Airtable asks clients to back off for 30 seconds
      const retryAfterMs = retryAfter !== undefined ? retryAfter * 1000 : 30000;
      return new RateLimitedError(retryAfterMs);
    }

    default: {
      if (statusCode >= 500) {
        return new ServerError(statusCode, errorMessage);
      }
      if (statusCode >= 400) {
        return new ValidationError(errorMessage, undefined, statusCode);
      }
      return new ServerError(statusCode, errorMessage);
    }
  }
}

export function isAirtableError(error: unknown): error is AirtableError {
  return error instanceof AirtableError;
}

/**
 * Checks if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
  if (isAirtableError(error)) {
    return error.retryable;
  }
  // fetch() rejects with a TypeError on connection failures
  if (error instanceof TypeError && error.message.includes('fetch')) {
    return true;
  }
  return false;
}

/**
 * Gets retry delay in milliseconds from error, if applicable.
 */
export function getRetryDelayMs(error: unknown): number | undefined {
  if (isAirtableError(error)) {
    return error.retryAfter;
  }
  return undefined;
}

/**
 * Coerces any thrown value into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Coarse category of a failure, as reported at the tool boundary.
 */
export type ErrorKind =
  | 'configuration'
  | 'authentication'
  | 'not_found'
  | 'validation'
  | 'rate_limit'
  | 'transport'
  | 'server'
  | 'unknown';

/**
 * Maps a thrown value to its {@link ErrorKind}.
 */
export function classifyError(error: unknown): ErrorKind {
  if (!isAirtableError(error)) {
    return 'unknown';
  }
  switch (error.code) {
    case AirtableErrorCode.CONFIGURATION_ERROR:
    case AirtableErrorCode.INVALID_BASE_URL:
      return 'configuration';
    case AirtableErrorCode.UNAUTHORIZED:
    case AirtableErrorCode.TOKEN_EXPIRED:
    case AirtableErrorCode.INSUFFICIENT_SCOPE:
      return 'authentication';
    case AirtableErrorCode.NOT_FOUND:
      return 'not_found';
    case AirtableErrorCode.VALIDATION_ERROR:
    case AirtableErrorCode.BATCH_SIZE_EXCEEDED:
      return 'validation';
    case AirtableErrorCode.RATE_LIMIT_EXCEEDED:
    case AirtableErrorCode.QUEUE_TIMEOUT:
      return 'rate_limit';
    case AirtableErrorCode.NETWORK_ERROR:
    case AirtableErrorCode.TIMEOUT:
    case AirtableErrorCode.CIRCUIT_BREAKER_OPEN:
      return 'transport';
    case AirtableErrorCode.SERVER_ERROR:
      return 'server';
  }
}
