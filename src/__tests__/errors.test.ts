/**
 * Tests for Airtable error types and response mapping.
 */

import {
  AirtableError,
  AirtableErrorCode,
  AuthenticationError,
  BatchSizeExceededError,
  CircuitBreakerOpenError,
  ConfigurationError,
  InsufficientScopeError,
  NetworkError,
  NotFoundError,
  QueueTimeoutError,
  RateLimitedError,
  ServerError,
  TimeoutError,
  TokenExpiredError,
  ValidationError,
  classifyError,
  extractApiError,
  getRetryDelayMs,
  isAirtableError,
  isRetryableError,
  parseAirtableApiError,
  toError,
} from '../index.js';

describe('error classes', () => {
  it('should carry code, name and retryability', () => {
    const error = new RateLimitedError(5000);

    expect(error).toBeInstanceOf(AirtableError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RateLimitedError');
    expect(error.code).toBe(AirtableErrorCode.RATE_LIMIT_EXCEEDED);
    expect(error.retryable).toBe(true);
    expect(error.retryAfter).toBe(5000);
  });

  it('should format messages', () => {
    expect(new NotFoundError('base appX').message).toBe('Resource not found: base appX');
    expect(new ValidationError('bad value', 'Status').message).toBe(
      "Validation error for field 'Status': bad value"
    );
    expect(new BatchSizeExceededError(10, 12).message).toBe('Batch size 12 exceeds maximum 10');
    expect(new ConfigurationError('missing').message).toBe('Configuration error: missing');
  });

  it('should serialize to JSON', () => {
    const json = new NotFoundError('record recX').toJSON();
    expect(json.name).toBe('NotFoundError');
    expect(json.code).toBe(AirtableErrorCode.NOT_FOUND);
    expect(json.statusCode).toBe(404);
    expect(json.retryable).toBe(false);
  });
});

describe('extractApiError', () => {
  it('should read object errors', () => {
    expect(extractApiError({ error: { type: 'INVALID_REQUEST', message: 'Bad' } })).toEqual({
      type: 'INVALID_REQUEST',
      message: 'Bad',
    });
  });

  it('should read string errors', () => {
    expect(extractApiError({ error: 'NOT_FOUND' })).toEqual({ type: 'NOT_FOUND', message: 'NOT_FOUND' });
  });

  it('should return nothing for other bodies', () => {
    expect(extractApiError('oops')).toEqual({});
    expect(extractApiError(undefined)).toEqual({});
  });
});

describe('parseAirtableApiError', () => {
  it('should map 422 to ValidationError', () => {
    const error = parseAirtableApiError(422, {
      error: { type: 'INVALID_VALUE_FOR_COLUMN', message: 'Field "Due" cannot accept "soon"' },
    });
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.statusCode).toBe(422);
  });

  it('should map too-many-records to BatchSizeExceededError', () => {
    const error = parseAirtableApiError(422, {
      error: { type: 'TOO_MANY_RECORDS', message: 'Too many records: maximum 10, got 15' },
    });
    expect(error).toBeInstanceOf(BatchSizeExceededError);
  });

  it('should map 401', () => {
    expect(parseAirtableApiError(401, { error: { type: 'AUTHENTICATION_REQUIRED', message: 'Nope' } })).toBeInstanceOf(
      AuthenticationError
    );
    expect(parseAirtableApiError(401, { error: { message: 'Token expired' } })).toBeInstanceOf(TokenExpiredError);
  });

  it('should map 403', () => {
    expect(parseAirtableApiError(403, { error: { message: 'Missing scope data.records:write' } })).toBeInstanceOf(
      InsufficientScopeError
    );
    expect(parseAirtableApiError(403, { error: 'NOT_AUTHORIZED' })).toBeInstanceOf(AuthenticationError);
  });

  it('should map 404 with the server message', () => {
    const error = parseAirtableApiError(404, { error: { type: 'MODEL_ID_NOT_FOUND', message: 'Record recX not found' } });
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('Resource not found: Record recX not found');
  });

  it('should map 429 using Retry-After seconds', () => {
    const error = parseAirtableApiError(429, undefined, 2);
    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error.retryAfter).toBe(2000);
  });

  it('should default 429 back-off to 30 seconds', () => {
    expect(parseAirtableApiError(429).retryAfter).toBe(30000);
  });

  it('should map 5xx to ServerError', () => {
    const error = parseAirtableApiError(503, { error: { message: 'Unavailable' } });
    expect(error).toBeInstanceOf(ServerError);
    expect(error.retryable).toBe(true);
  });

  it('should fall back to the status in the message', () => {
    expect(parseAirtableApiError(500).message).toContain('HTTP 500');
  });
});

describe('helpers', () => {
  it('isRetryableError', () => {
    expect(isRetryableError(new ServerError(500))).toBe(true);
    expect(isRetryableError(new NetworkError('reset'))).toBe(true);
    expect(isRetryableError(new NotFoundError('x'))).toBe(false);
    expect(isRetryableError(new TypeError('fetch failed'))).toBe(true);
    expect(isRetryableError(new Error('other'))).toBe(false);
  });

  it('getRetryDelayMs', () => {
    expect(getRetryDelayMs(new RateLimitedError(1234))).toBe(1234);
    expect(getRetryDelayMs(new Error('x'))).toBeUndefined();
  });

  it('isAirtableError', () => {
    expect(isAirtableError(new TimeoutError(10))).toBe(true);
    expect(isAirtableError(new Error('x'))).toBe(false);
  });

  it('toError', () => {
    const original = new Error('kept');
    expect(toError(original)).toBe(original);
    expect(toError('text').message).toBe('text');
  });
});

describe('classifyError', () => {
  it.each([
    [new ConfigurationError('x'), 'configuration'],
    [new AuthenticationError(), 'authentication'],
    [new TokenExpiredError(), 'authentication'],
    [new NotFoundError('x'), 'not_found'],
    [new ValidationError('x'), 'validation'],
    [new BatchSizeExceededError(10, 11), 'validation'],
    [new RateLimitedError(1), 'rate_limit'],
    [new QueueTimeoutError(1), 'rate_limit'],
    [new NetworkError('x'), 'transport'],
    [new TimeoutError(1), 'transport'],
    [new CircuitBreakerOpenError(1), 'transport'],
    [new ServerError(502), 'server'],
    [new Error('plain'), 'unknown'],
    ['thrown string', 'unknown'],
  ])('%s -> %s', (error, kind) => {
    expect(classifyError(error)).toBe(kind);
  });
});
