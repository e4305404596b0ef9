/**
 * Airtable Tools
 *
 * Airtable bases, tables and records as eleven callable tools for agent
 * hosts, on top of a typed Airtable client.
 *
 * Features:
 * - Tool adapter returning tagged results instead of throwing
 * - MCP server registration and a stdio entry point
 * - Structured filter formulas
 * - Batch operations with automatic chunking
 * - Rate limiting, circuit breaker and retry with exponential backoff
 * - Pluggable logging, metrics and tracing
 *
 * @example
 * ```typescript
 * import { AirtableTools, EnvironmentCredentialProvider, eq } from 'airtable-tools';
 *
 * const tools = new AirtableTools({ credentials: new EnvironmentCredentialProvider() });
 *
 * const open = await tools.listRecords('appXXXXXXXXXXXXXX', 'Tasks', {
 *   formula: eq('Status', 'Open'),
 *   sort: ['-Priority'],
 * });
 * if (!open.ok) {
 *   console.error(open.error.message);
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Tools
// ============================================================================

export {
  AirtableTools,
  AIRTABLE_TOOLS,
  findTool,
  success,
  failure,
  toToolError,
} from './tools/index.js';

export type {
  AirtableToolsOptions,
  ListRecordsToolOptions,
  ToolResult,
  ToolError,
  ToolErrorKind,
  ToolDefinition,
  ToolAnnotations,
} from './tools/index.js';

// ============================================================================
// Server
// ============================================================================

export {
  createAirtableMcpServer,
  toCallToolResult,
  SERVER_NAME,
  SERVER_VERSION,
} from './server/index.js';

export type { AirtableMcpServerOptions } from './server/index.js';

// ============================================================================
// Credentials
// ============================================================================

export {
  EnvironmentCredentialProvider,
  StaticCredentialProvider,
  resolveApiKey,
  API_KEY_NAMES,
} from './credentials/index.js';

export type { CredentialProvider, Credentials } from './credentials/index.js';

// ============================================================================
// Formulas
// ============================================================================

export {
  field,
  value,
  raw,
  eq,
  ne,
  gt,
  gte,
  lt,
  lte,
  and,
  or,
  not,
  match,
  isFormulaNode,
  formulaToString,
  toFormulaString,
  formulaNodeSchema,
} from './formulas/index.js';

export type {
  FormulaNode,
  FormulaValue,
  FormulaOperand,
  FormulaArgument,
  ComparisonOperator,
} from './formulas/index.js';

// ============================================================================
// Client
// ============================================================================

export {
  AirtableClient,
  BaseHandle,
  TableHandle,
  createAirtableClient,
  createAirtableClientFromEnv,
} from './client/index.js';

export type {
  HttpMethod,
  QueryParams,
  RequestOptions,
  ApiResponse,
} from './client/index.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  AirtableConfigBuilder,
  SecretString,
  configWithToken,
  ENV_VARS,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  PACKAGE_NAME,
  PACKAGE_VERSION,
  DEFAULT_RATE_LIMIT_CONFIG,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
} from './config/index.js';

export type {
  AirtableConfig,
  ClientSettings,
  ClientSettingsInput,
  AuthMethod,
  PatAuthMethod,
  RateLimitConfig,
  RetryConfig,
  CircuitBreakerConfig,
} from './config/index.js';

// ============================================================================
// Types
// ============================================================================

export {
  MAX_BATCH_SIZE,
  MIN_PAGE_SIZE,
  MAX_PAGE_SIZE,
  validateBatchSize,
  validatePageSize,
  toSortField,
} from './types/index.js';

export type {
  BaseId,
  TableIdOrName,
  RecordId,
  FieldId,
  ViewId,
  Fields,
  AirtableRecord,
  DeletedRecord,
  RecordUpdate,
  UpsertRecordInput,
  UpsertResult,
  SortDirection,
  SortField,
  SortSpec,
  CellFormat,
  ListRecordsResponse,
  GetRecordOptions,
  ListRecordsOptions,
  WriteOptions,
  UpdateOptions,
  PermissionLevel,
  Base,
  ListBasesResponse,
  FieldSchema,
  ViewSchema,
  TableSchema,
} from './types/index.js';

// ============================================================================
// Services
// ============================================================================

export {
  RecordServiceImpl,
  createRecordService,
  readQuery,
  writeBody,
  ListServiceImpl,
  ListRecordsBuilder,
  createListService,
  BatchServiceImpl,
  createBatchService,
  chunk,
  MetadataServiceImpl,
  createMetadataService,
  tablePath,
  recordPath,
  metaTablesPath,
  META_BASES_PATH,
} from './services/index.js';

export type {
  RecordService,
  ListService,
  BatchService,
  MetadataService,
} from './services/index.js';

// ============================================================================
// Authentication
// ============================================================================

export { PatAuthProvider, createAuthProvider } from './auth/index.js';

export type { AuthProvider, AuthHeaders } from './auth/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  AirtableError,
  AirtableErrorCode,
  ConfigurationError,
  InvalidBaseUrlError,
  AuthenticationError,
  TokenExpiredError,
  InsufficientScopeError,
  RateLimitedError,
  QueueTimeoutError,
  NotFoundError,
  ValidationError,
  BatchSizeExceededError,
  ServerError,
  NetworkError,
  TimeoutError,
  CircuitBreakerOpenError,
  parseAirtableApiError,
  extractApiError,
  isAirtableError,
  isRetryableError,
  getRetryDelayMs,
  classifyError,
  toError,
} from './errors/index.js';

export type { AirtableApiErrorResponse, ErrorKind } from './errors/index.js';

// ============================================================================
// Resilience
// ============================================================================

export {
  RateLimiter,
  CircuitBreaker,
  RetryExecutor,
  ResilienceOrchestrator,
  createRetryExecutor,
} from './resilience/index.js';

export type {
  CircuitBreakerState,
  RetryHooks,
  ResilientExecuteOptions,
} from './resilience/index.js';

// ============================================================================
// Observability
// ============================================================================

export {
  LogLevel,
  parseLogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  MetricNames,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
  NoopTracer,
  InMemoryTracer,
  InMemorySpanContext,
  createNoopObservability,
  createInMemoryObservability,
  createConsoleObservability,
} from './observability/index.js';

export type {
  Logger,
  LogContext,
  ConsoleLoggerOptions,
  MetricLabels,
  SpanAttributeValue,
  LogEntry,
  LogDestination,
  MetricsCollector,
  MetricEntry,
  Tracer,
  SpanContext,
  SpanStatus,
  Observability,
} from './observability/index.js';
