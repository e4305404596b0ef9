/**
 * Logging, metrics and tracing for the Airtable client and tools.
 *
 * Everything is behind small interfaces. The defaults do nothing, the
 * in-memory variants back the tests, and {@link ConsoleLogger} writes JSON
 * lines for the stdio server.
 */

import { toError } from '../errors/index.js';

export type LogContext = Record<string, unknown>;
export type MetricLabels = Record<string, string>;
export type SpanAttributeValue = string | number | boolean;

// ============================================================================
// Logging
// ============================================================================

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * Parses a level name such as `"warn"` (case-insensitive).
 * Unknown or missing names fall back to `fallback`.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return fallback;
  }
}

/**
 * Routes the four level methods into one `write`.
 */
export abstract class LevelLogger implements Logger {
  protected abstract write(level: LogLevel, message: string, context?: LogContext): void;

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write(LogLevel.ERROR, message, context);
  }
}

/**
 * `stderr` sends every level to standard error, leaving standard output to
 * the MCP stdio stream.
 */
export type LogDestination = 'console' | 'stderr';

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Merged into every entry */
  context?: LogContext;
  /** Keys whose values are replaced by `[REDACTED]`, at any depth (case-insensitive) */
  redactKeys?: string[];
  destination?: LogDestination;
}

const DEFAULT_REDACT_KEYS = ['token', 'apiKey', 'api_key', 'API_KEY', 'authorization', 'secret', 'password'];

/**
 * Writes one JSON object per line.
 */
export class ConsoleLogger extends LevelLogger {
  private readonly level: LogLevel;
  private readonly context: LogContext;
  private readonly redactKeys: ReadonlySet<string>;
  private readonly destination: LogDestination;

  constructor(options: ConsoleLoggerOptions = {}) {
    super();
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context ?? {};
    this.redactKeys = new Set((options.redactKeys ?? DEFAULT_REDACT_KEYS).map(k => k.toLowerCase()));
    this.destination = options.destination ?? 'console';
  }

  protected write(level: LogLevel, message: string, context?: LogContext): void {
    if (level < this.level) return;

    const merged = this.redact({ ...this.context, ...context });
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
    });

    if (this.destination === 'stderr') {
      process.stderr.write(`${line}\n`);
    } else if (level === LogLevel.ERROR) {
      console.error(line);
    } else if (level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private redact(context: LogContext): LogContext {
    return Object.fromEntries(
      Object.entries(context).map(([key, value]) => {
        if (this.redactKeys.has(key.toLowerCase())) {
          return [key, '[REDACTED]'];
        }
        return [key, isPlainObject(value) ? this.redact(value) : value];
      })
    );
  }
}

function isPlainObject(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export class InMemoryLogger extends LevelLogger {
  private readonly entries: LogEntry[] = [];
  private readonly context: LogContext;

  constructor(context: LogContext = {}) {
    super();
    this.context = context;
  }

  protected write(level: LogLevel, message: string, context?: LogContext): void {
    this.entries.push({ level, message, timestamp: new Date(), context: { ...this.context, ...context } });
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter(entry => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// ============================================================================
// Metrics
// ============================================================================

export const MetricNames = {
  // HTTP requests
  OPERATIONS_TOTAL: 'airtable_operations_total',
  OPERATION_LATENCY: 'airtable_operation_latency_ms',
  ERRORS_TOTAL: 'airtable_errors_total',
  RATE_LIMITS_HIT: 'airtable_rate_limits_hit_total',

  // Records
  RECORDS_CREATED: 'airtable_records_created_total',
  RECORDS_UPDATED: 'airtable_records_updated_total',
  RECORDS_DELETED: 'airtable_records_deleted_total',
  BATCHES_PROCESSED: 'airtable_batches_processed_total',

  // Tool calls
  TOOL_CALLS_TOTAL: 'airtable_tool_calls_total',
  TOOL_FAILURES_TOTAL: 'airtable_tool_failures_total',
} as const;

export interface MetricEntry {
  name: string;
  value: number;
  timestamp: Date;
  labels?: MetricLabels;
}

export interface MetricsCollector {
  /** Adds `value` (default 1) to a counter */
  increment(name: string, value?: number, labels?: MetricLabels): void;
  gauge(name: string, value: number, labels?: MetricLabels): void;
  timing(name: string, durationMs: number, labels?: MetricLabels): void;
}

export class NoopMetricsCollector implements MetricsCollector {
  increment(): void {}
  gauge(): void {}
  timing(): void {}
}

/**
 * `name{a=1,b=2}` with labels sorted, or the bare name without labels.
 */
function seriesKey(name: string, labels?: MetricLabels): string {
  const pairs = Object.entries(labels ?? {});
  if (pairs.length === 0) return name;
  pairs.sort(([a], [b]) => a.localeCompare(b));
  return `${name}{${pairs.map(([k, v]) => `${k}=${v}`).join(',')}}`;
}

export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly entries: MetricEntry[] = [];
  private readonly counters = new Map<string, number>();
  private readonly gauges = new Map<string, number>();

  increment(name: string, value: number = 1, labels?: MetricLabels): void {
    const key = seriesKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
    this.record(name, value, labels);
  }

  gauge(name: string, value: number, labels?: MetricLabels): void {
    this.gauges.set(seriesKey(name, labels), value);
    this.record(name, value, labels);
  }

  timing(name: string, durationMs: number, labels?: MetricLabels): void {
    this.record(name, durationMs, labels);
  }

  getMetrics(): MetricEntry[] {
    return [...this.entries];
  }

  getCounter(name: string, labels?: MetricLabels): number {
    return this.counters.get(seriesKey(name, labels)) ?? 0;
  }

  /**
   * Sums a counter over every label combination.
   */
  getCounterTotal(name: string): number {
    let total = 0;
    for (const [key, value] of this.counters) {
      if (key === name || key.startsWith(`${name}{`)) total += value;
    }
    return total;
  }

  getGauge(name: string, labels?: MetricLabels): number | undefined {
    return this.gauges.get(seriesKey(name, labels));
  }

  clear(): void {
    this.entries.length = 0;
    this.counters.clear();
    this.gauges.clear();
  }

  private record(name: string, value: number, labels?: MetricLabels): void {
    this.entries.push({ name, value, labels, timestamp: new Date() });
  }
}

// ============================================================================
// Tracing
// ============================================================================

export type SpanStatus = 'OK' | 'ERROR';

export interface SpanContext {
  setAttribute(key: string, value: SpanAttributeValue): void;
  setStatus(status: SpanStatus): void;
  recordException(error: Error): void;
}

export interface Tracer {
  /**
   * Runs `fn` inside a span named `name`. A rejection marks the span as
   * failed and is rethrown.
   */
  withSpan<T>(name: string, fn: (span: SpanContext) => Promise<T>, attributes?: LogContext): Promise<T>;
}

const NOOP_SPAN: SpanContext = {
  setAttribute: () => {},
  setStatus: () => {},
  recordException: () => {},
};

export class NoopTracer implements Tracer {
  async withSpan<T>(_name: string, fn: (span: SpanContext) => Promise<T>): Promise<T> {
    return fn(NOOP_SPAN);
  }
}

export class InMemorySpanContext implements SpanContext {
  readonly name: string;
  readonly attributes: Record<string, SpanAttributeValue> = {};
  readonly startTime = new Date();
  endTime?: Date;
  status: SpanStatus = 'OK';
  exception?: Error;

  constructor(name: string, attributes: LogContext = {}) {
    this.name = name;
    for (const [key, value] of Object.entries(attributes)) {
      // non-scalar attributes are dropped
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        this.attributes[key] = value;
      }
    }
  }

  setAttribute(key: string, value: SpanAttributeValue): void {
    this.attributes[key] = value;
  }

  setStatus(status: SpanStatus): void {
    this.status = status;
  }

  recordException(error: Error): void {
    this.exception = error;
    this.status = 'ERROR';
  }

  end(): void {
    this.endTime = new Date();
  }

  getDurationMs(): number | undefined {
    return this.endTime && this.endTime.getTime() - this.startTime.getTime();
  }
}

export class InMemoryTracer implements Tracer {
  private readonly spans: InMemorySpanContext[] = [];

  async withSpan<T>(name: string, fn: (span: SpanContext) => Promise<T>, attributes?: LogContext): Promise<T> {
    const span = new InMemorySpanContext(name, attributes);
    this.spans.push(span);
    try {
      return await fn(span);
    } catch (error) {
      span.recordException(toError(error));
      throw error;
    } finally {
      span.end();
    }
  }

  getSpans(): InMemorySpanContext[] {
    return [...this.spans];
  }

  getSpansByName(name: string): InMemorySpanContext[] {
    return this.spans.filter(span => span.name === name);
  }

  clear(): void {
    this.spans.length = 0;
  }
}

// ============================================================================
// Container
// ============================================================================

export interface Observability {
  logger: Logger;
  metrics: MetricsCollector;
  tracer: Tracer;
}

export function createNoopObservability(): Observability {
  return {
    logger: new NoopLogger(),
    metrics: new NoopMetricsCollector(),
    tracer: new NoopTracer(),
  };
}

export function createInMemoryObservability(): Observability & {
  logger: InMemoryLogger;
  metrics: InMemoryMetricsCollector;
  tracer: InMemoryTracer;
} {
  return {
    logger: new InMemoryLogger(),
    metrics: new InMemoryMetricsCollector(),
    tracer: new InMemoryTracer(),
  };
}

/**
 * A {@link ConsoleLogger} with no-op metrics and tracing.
 */
export function createConsoleObservability(options: ConsoleLoggerOptions = {}): Observability {
  return {
    logger: new ConsoleLogger(options),
    metrics: new NoopMetricsCollector(),
    tracer: new NoopTracer(),
  };
}
