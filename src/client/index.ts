/**
 * Airtable client core.
 *
 * Provides HTTP execution with authentication, rate limiting, circuit breaking,
 * and retry orchestration, plus base- and table-scoped handles.
 */

import { AirtableConfig, AirtableConfigBuilder } from '../config/index.js';
import {
  AirtableError,
  parseAirtableApiError,
  isAirtableError,
  NetworkError,
  TimeoutError,
  toError,
} from '../errors/index.js';
import { AuthProvider, createAuthProvider } from '../auth/index.js';
import { ResilienceOrchestrator } from '../resilience/index.js';
import {
  Observability,
  createNoopObservability,
  MetricNames,
  Logger,
  MetricsCollector,
  Tracer,
} from '../observability/index.js';
import type {
  AirtableRecord,
  Base,
  DeletedRecord,
  Fields,
  GetRecordOptions,
  ListRecordsOptions,
  RecordUpdate,
  TableSchema,
  UpdateOptions,
  UpsertRecordInput,
  UpsertResult,
  WriteOptions,
} from '../types/index.js';
import { RecordServiceImpl } from '../services/record.js';
import { ListRecordsBuilder } from '../services/list.js';
import { BatchServiceImpl } from '../services/batch.js';
import { MetadataServiceImpl } from '../services/metadata.js';

// ============================================================================
// HTTP Request/Response Types
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

/**
 * Query parameters. Arrays are sent as repeated keys; undefined values are dropped.
 */
export type QueryParams = Record<string, string | number | boolean | string[] | undefined>;

/**
 * Request options.
 */
export interface RequestOptions {
  method: HttpMethod;
  /** Request path, relative to the configured base URL */
  path: string;
  query?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
  skipRetry?: boolean;
  /** Set for non-idempotent requests; only rate-limited attempts are retried */
  retryRateLimitedOnly?: boolean;
  skipRateLimit?: boolean;
}

/**
 * Response wrapper.
 */
export interface ApiResponse<T> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

// ============================================================================
// Airtable Client
// ============================================================================

/**
 * Airtable API client with resilience and observability.
 *
 * @example
 * ```typescript
 * const config = new AirtableConfigBuilder().withToken('test-token').build();
 * const client = new AirtableClient(config);
 *
 * const bases = await client.bases();
 * const tasks = client.table('appExample', 'Tasks');
 * const open = await tasks.all({ formula: "{Status}='Open'" });
 * ```
 */
export class AirtableClient {
  private readonly config: AirtableConfig;
  private readonly authProvider: AuthProvider;
  private readonly resilience: ResilienceOrchestrator;
  private readonly observability: Observability;
  private readonly metadata: MetadataServiceImpl;

  constructor(config: AirtableConfig, observability?: Observability) {
    this.config = config;
    this.observability = observability ?? createNoopObservability();
    this.authProvider = createAuthProvider(config.auth);
    this.resilience = new ResilienceOrchestrator(
      config.rateLimitConfig,
      config.circuitBreakerConfig,
      config.retryConfig,
      {
        onRetry: (attempt, error, delayMs) => {
          this.observability.logger.warn('Retrying request', {
            attempt,
            error: error.message,
            delayMs,
          });
        },
        onRetriesExhausted: (error, attempts) => {
          this.observability.logger.error('Retries exhausted', {
            error: error.message,
            attempts,
          });
        },
      }
    );
    this.metadata = new MetadataServiceImpl(this);
  }

  get logger(): Logger {
    return this.observability.logger;
  }

  get metrics(): MetricsCollector {
    return this.observability.metrics;
  }

  get tracer(): Tracer {
    return this.observability.tracer;
  }

  get configuration(): AirtableConfig {
    return this.config;
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  /**
   * Executes an HTTP request with resilience and observability.
   *
   * @throws {AirtableError} On API errors
   * @throws {NetworkError} On network errors
   * @throws {TimeoutError} On request timeout
   */
  async request<T>(options: RequestOptions): Promise<ApiResponse<T>> {
    const startTime = Date.now();

    return this.observability.tracer.withSpan(
      'airtable.request',
      async (span) => {
        span.setAttribute('http.method', options.method);
        span.setAttribute('http.path', options.path);

        try {
          const response = await this.resilience.execute(
            () => this.executeRequest<T>(options),
            {
              skipRateLimit: options.skipRateLimit,
              skipRetry: options.skipRetry,
              retryRateLimitedOnly: options.retryRateLimitedOnly,
            }
          );

          this.observability.metrics.increment(MetricNames.OPERATIONS_TOTAL, 1, {
            operation: options.method,
            status: 'success',
          });
          this.observability.metrics.timing(
            MetricNames.OPERATION_LATENCY,
            Date.now() - startTime,
            { operation: options.method }
          );

          span.setAttribute('http.status_code', response.status);
          span.setStatus('OK');

          return response;
        } catch (error) {
          this.observability.metrics.increment(MetricNames.ERRORS_TOTAL, 1, {
            operation: options.method,
            error_type: isAirtableError(error) ? error.code : 'unknown',
          });
          if (isAirtableError(error) && error.statusCode === 429) {
            this.observability.metrics.increment(MetricNames.RATE_LIMITS_HIT);
          }

          span.recordException(toError(error));
          throw error;
        }
      },
      { operation: `${options.method} ${options.path}` }
    );
  }

  /**
   * Executes a single HTTP attempt.
   */
  private async executeRequest<T>(options: RequestOptions): Promise<ApiResponse<T>> {
    const url = this.buildUrl(options.path, options.query);
    const authHeaders = await this.authProvider.getAuthHeaders();

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': this.config.userAgent,
      ...authHeaders,
      ...options.headers,
    };

    const init: RequestInit = { method: options.method, headers };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(options.body);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);
    init.signal = controller.signal;

    try {
      const response = await fetch(url, init);

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key.toLowerCase()] = value;
      });

      const text = await response.text();

      if (!response.ok) {
        const retryAfterHeader = responseHeaders['retry-after'];
        const retryAfter = retryAfterHeader ? parseInt(retryAfterHeader, 10) : undefined;
        throw parseAirtableApiError(
          response.status,
          parseJson(text),
          retryAfter !== undefined && !isNaN(retryAfter) ? retryAfter : undefined
        );
      }

      return {
        // Response bodies are trusted to match the endpoint's documented shape
        data: parseJson(text) as T,
        status: response.status,
        headers: responseHeaders,
      };
    } catch (error) {
      if (error instanceof AirtableError) {
        throw error;
      }
      if (isAbortError(error)) {
        throw new TimeoutError(this.config.requestTimeoutMs);
      }
      const cause = toError(error);
      throw new NetworkError(cause.message, cause);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Builds the full URL. The path is appended to the base URL, so a base URL
   * with a path prefix (such as `/v0`) keeps it.
   */
  buildUrl(path: string, query?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path}`);

    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined) continue;
        if (Array.isArray(value)) {
          for (const item of value) {
            url.searchParams.append(key, item);
          }
        } else {
          url.searchParams.set(key, String(value));
        }
      }
    }

    return url.toString();
  }

  // ============================================================================
  // Convenience Methods
  // ============================================================================

  async get<T>(path: string, query?: QueryParams): Promise<T> {
    const response = await this.request<T>({ method: 'GET', path, query });
    return response.data;
  }

  /**
   * POST creates records, so a failure after the write may have been applied
   * is not retried. 429 responses still are.
   */
  async post<T>(path: string, body?: unknown): Promise<T> {
    const response = await this.request<T>({ method: 'POST', path, body, retryRateLimitedOnly: true });
    return response.data;
  }

  async put<T>(path: string, body?: unknown): Promise<T> {
    const response = await this.request<T>({ method: 'PUT', path, body });
    return response.data;
  }

  async patch<T>(path: string, body?: unknown): Promise<T> {
    const response = await this.request<T>({ method: 'PATCH', path, body });
    return response.data;
  }

  async delete<T>(path: string, query?: QueryParams): Promise<T> {
    const response = await this.request<T>({ method: 'DELETE', path, query });
    return response.data;
  }

  // ============================================================================
  // Handles
  // ============================================================================

  /**
   * Lists every base the token can access.
   */
  async bases(): Promise<Base[]> {
    return this.metadata.listBases();
  }

  /**
   * Creates a handle for base-scoped operations. No request is made.
   */
  base(baseId: string): BaseHandle {
    return new BaseHandle(this, baseId);
  }

  /**
   * Creates a handle for table-scoped operations. No request is made.
   *
   * @example
   * ```typescript
   * const record = await client.table('appExample', 'Tasks').get('recExample');
   * ```
   */
  table(baseId: string, tableIdOrName: string): TableHandle {
    return new TableHandle(this, baseId, tableIdOrName);
  }

  // ============================================================================
  // Resilience Access
  // ============================================================================

  getResilienceStats(): ReturnType<ResilienceOrchestrator['getStats']> {
    return this.resilience.getStats();
  }

  /**
   * Resets rate limiter and circuit breaker state.
   */
  resetResilience(): void {
    this.resilience.reset();
  }
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    // non-JSON bodies (proxies, HTML error pages) are surfaced as raw text
    return text;
  }
}

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

// ============================================================================
// Base Handle
// ============================================================================

/**
 * Handle for base-scoped operations.
 */
export class BaseHandle {
  private readonly client: AirtableClient;
  readonly id: string;

  constructor(client: AirtableClient, baseId: string) {
    this.client = client;
    this.id = baseId;
  }

  /**
   * Creates a handle for one table, by ID or name.
   */
  table(tableIdOrName: string): TableHandle {
    return new TableHandle(this.client, this.id, tableIdOrName);
  }

  /**
   * Lists all tables in the base with their schemas.
   */
  async tables(): Promise<TableSchema[]> {
    return new MetadataServiceImpl(this.client).listTables(this.id);
  }
}

// ============================================================================
// Table Handle
// ============================================================================

/**
 * Handle for table-scoped operations.
 *
 * Batch methods accept any number of records and send them 10 per request.
 */
export class TableHandle {
  private readonly client: AirtableClient;
  readonly baseId: string;
  readonly tableIdOrName: string;
  private readonly records: RecordServiceImpl;
  private readonly batch: BatchServiceImpl;

  constructor(client: AirtableClient, baseId: string, tableIdOrName: string) {
    this.client = client;
    this.baseId = baseId;
    this.tableIdOrName = tableIdOrName;
    this.records = new RecordServiceImpl(client, baseId, tableIdOrName);
    this.batch = new BatchServiceImpl(client, baseId, tableIdOrName);
  }

  /**
   * Starts a list query for this table.
   */
  list(): ListRecordsBuilder {
    return new ListRecordsBuilder(this.client, this.baseId, this.tableIdOrName);
  }

  /**
   * Fetches every record matching the options.
   */
  async all(options: ListRecordsOptions = {}): Promise<AirtableRecord[]> {
    return this.list().withOptions(options).all();
  }

  /**
   * Returns the first record matching the options, if any.
   */
  async first(options: ListRecordsOptions = {}): Promise<AirtableRecord | undefined> {
    return this.list().withOptions(options).first();
  }

  async get(recordId: string, options?: GetRecordOptions): Promise<AirtableRecord> {
    return this.records.get(recordId, options);
  }

  async create(fields: Fields, options?: WriteOptions): Promise<AirtableRecord> {
    return this.records.create(fields, options);
  }

  async update(recordId: string, fields: Fields, options?: UpdateOptions): Promise<AirtableRecord> {
    return this.records.update(recordId, fields, options);
  }

  async delete(recordId: string): Promise<DeletedRecord> {
    return this.records.delete(recordId);
  }

  async batchCreate(records: Fields[], options?: WriteOptions): Promise<AirtableRecord[]> {
    return this.batch.createRecordsChunked(records, options);
  }

  async batchUpdate(records: RecordUpdate[], options?: UpdateOptions): Promise<AirtableRecord[]> {
    return this.batch.updateRecordsChunked(records, options);
  }

  async batchDelete(recordIds: string[]): Promise<DeletedRecord[]> {
    return this.batch.deleteRecordsChunked(recordIds);
  }

  async batchUpsert(
    records: UpsertRecordInput[],
    keyFields: string[],
    options?: UpdateOptions
  ): Promise<UpsertResult> {
    return this.batch.upsertRecords(records, keyFields, options);
  }

  /**
   * Fetches this table's schema.
   */
  async schema(): Promise<TableSchema> {
    return new MetadataServiceImpl(this.client).getTable(this.baseId, this.tableIdOrName);
  }
}

// ============================================================================
// Client Factory
// ============================================================================

export function createAirtableClient(config: AirtableConfig, observability?: Observability): AirtableClient {
  return new AirtableClient(config, observability);
}

/**
 * Creates an Airtable client from environment variables (see
 * {@link AirtableConfigBuilder.fromEnv}). AIRTABLE_API_KEY must be set.
 */
export function createAirtableClientFromEnv(observability?: Observability): AirtableClient {
  return new AirtableClient(AirtableConfigBuilder.fromEnv().build(), observability);
}
