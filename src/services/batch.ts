/**
 * Batch operations service.
 *
 * Provides batch create, update, delete, and upsert operations with automatic
 * chunking. Airtable limits batch operations to 10 records per request; the
 * chunked variants split larger inputs and send the chunks one after another,
 * so results come back in input order.
 */

import type { AirtableClient } from '../client/index.js';
import type {
  AirtableRecord,
  DeletedRecord,
  Fields,
  RecordUpdate,
  UpdateOptions,
  UpsertRecordInput,
  UpsertResult,
  WriteOptions,
} from '../types/index.js';
import { validateBatchSize, MAX_BATCH_SIZE } from '../types/index.js';
import { ValidationError, toError } from '../errors/index.js';
import { MetricNames, type SpanContext } from '../observability/index.js';
import { writeBody } from './record.js';
import { tablePath } from './paths.js';

// ============================================================================
// Batch Service Interface
// ============================================================================

export interface BatchService {
  /**
   * Creates up to 10 records in one request.
   * @throws BatchSizeExceededError if more than 10 records
   */
  createRecords(records: Fields[], options?: WriteOptions): Promise<AirtableRecord[]>;

  /**
   * Creates any number of records, 10 per request.
   */
  createRecordsChunked(records: Fields[], options?: WriteOptions): Promise<AirtableRecord[]>;

  /**
   * Updates up to 10 records in one request.
   * @throws BatchSizeExceededError if more than 10 records
   */
  updateRecords(records: RecordUpdate[], options?: UpdateOptions): Promise<AirtableRecord[]>;

  updateRecordsChunked(records: RecordUpdate[], options?: UpdateOptions): Promise<AirtableRecord[]>;

  /**
   * Deletes up to 10 records in one request.
   * @throws BatchSizeExceededError if more than 10 records
   */
  deleteRecords(recordIds: string[]): Promise<DeletedRecord[]>;

  deleteRecordsChunked(recordIds: string[]): Promise<DeletedRecord[]>;

  /**
   * Upserts records, matching existing ones on `fieldsToMergeOn`.
   * Chunk results are merged into one {@link UpsertResult}.
   */
  upsertRecords(
    records: UpsertRecordInput[],
    fieldsToMergeOn: string[],
    options?: UpdateOptions
  ): Promise<UpsertResult>;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Splits an array into chunks of specified size.
 *
 * @example
 * ```typescript
 * chunk([1, 2, 3, 4, 5], 2); // [[1, 2], [3, 4], [5]]
 * ```
 */
export function chunk<T>(array: T[], size: number): T[][] {
  if (size <= 0) {
    throw new ValidationError('Chunk size must be positive');
  }

  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }
  return chunks;
}

// ============================================================================
// Batch Service Implementation
// ============================================================================

export class BatchServiceImpl implements BatchService {
  private readonly client: AirtableClient;
  private readonly baseId: string;
  private readonly tableIdOrName: string;

  private static readonly BATCH_SIZE = MAX_BATCH_SIZE;

  constructor(client: AirtableClient, baseId: string, tableIdOrName: string) {
    this.client = client;
    this.baseId = baseId;
    this.tableIdOrName = tableIdOrName;
  }

  private get path(): string {
    return tablePath(this.baseId, this.tableIdOrName);
  }

  async createRecords(records: Fields[], options: WriteOptions = {}): Promise<AirtableRecord[]> {
    return this.runBatch('create', records.length, async () => {
      const response = await this.client.post<{ records: AirtableRecord[] }>(
        this.path,
        writeBody({ records: records.map(fields => ({ fields })) }, options)
      );
      this.client.metrics.increment(MetricNames.RECORDS_CREATED, response.records.length);
      return response.records;
    });
  }

  async createRecordsChunked(records: Fields[], options: WriteOptions = {}): Promise<AirtableRecord[]> {
    return this.runChunked('create', records, part => this.createRecords(part, options));
  }

  async updateRecords(records: RecordUpdate[], options: UpdateOptions = {}): Promise<AirtableRecord[]> {
    return this.runBatch('update', records.length, async () => {
      const body = writeBody({ records: records.map(r => ({ id: r.id, fields: r.fields })) }, options);
      const response = options.replace
        ? await this.client.put<{ records: AirtableRecord[] }>(this.path, body)
        : await this.client.patch<{ records: AirtableRecord[] }>(this.path, body);
      this.client.metrics.increment(MetricNames.RECORDS_UPDATED, response.records.length);
      return response.records;
    });
  }

  async updateRecordsChunked(records: RecordUpdate[], options: UpdateOptions = {}): Promise<AirtableRecord[]> {
    return this.runChunked('update', records, part => this.updateRecords(part, options));
  }

  async deleteRecords(recordIds: string[]): Promise<DeletedRecord[]> {
    return this.runBatch('delete', recordIds.length, async () => {
      // records[]=recA&records[]=recB
      const response = await this.client.delete<{ records: DeletedRecord[] }>(this.path, {
        'records[]': recordIds,
      });
      this.client.metrics.increment(MetricNames.RECORDS_DELETED, response.records.length);
      return response.records;
    });
  }

  async deleteRecordsChunked(recordIds: string[]): Promise<DeletedRecord[]> {
    return this.runChunked('delete', recordIds, part => this.deleteRecords(part));
  }

  async upsertRecords(
    records: UpsertRecordInput[],
    fieldsToMergeOn: string[],
    options: UpdateOptions = {}
  ): Promise<UpsertResult> {
    if (fieldsToMergeOn.length === 0) {
      throw new ValidationError('Must specify at least one field to merge on', 'fieldsToMergeOn');
    }

    const merged: UpsertResult = { createdRecords: [], updatedRecords: [], records: [] };
    const parts = chunk(records, BatchServiceImpl.BATCH_SIZE);

    for (const part of parts) {
      const result = await this.runBatch('upsert', part.length, async () => {
        const body = writeBody(
          {
            performUpsert: { fieldsToMergeOn },
            records: part.map(r => (r.id !== undefined ? { id: r.id, fields: r.fields } : { fields: r.fields })),
          },
          options
        );
        const response = options.replace
          ? await this.client.put<UpsertResult>(this.path, body)
          : await this.client.patch<UpsertResult>(this.path, body);
        this.client.metrics.increment(MetricNames.RECORDS_CREATED, response.createdRecords.length);
        this.client.metrics.increment(MetricNames.RECORDS_UPDATED, response.updatedRecords.length);
        return response;
      });

      merged.createdRecords.push(...result.createdRecords);
      merged.updatedRecords.push(...result.updatedRecords);
      merged.records.push(...result.records);
    }

    this.client.logger.info('Upserted records', {
      baseId: this.baseId,
      table: this.tableIdOrName,
      created: merged.createdRecords.length,
      updated: merged.updatedRecords.length,
      chunks: parts.length,
    });

    return merged;
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  /**
   * Runs one batch request inside a span, with size check, metrics and logging.
   */
  private async runBatch<T>(
    operation: string,
    count: number,
    send: () => Promise<T>
  ): Promise<T> {
    return this.client.tracer.withSpan(
      `airtable.batch.${operation}`,
      async (span: SpanContext) => {
        const startTime = Date.now();
        span.setAttribute('baseId', this.baseId);
        span.setAttribute('table', this.tableIdOrName);
        span.setAttribute('recordCount', count);

        validateBatchSize(count);

        try {
          const result = await send();
          const duration = Date.now() - startTime;

          this.client.metrics.increment(MetricNames.BATCHES_PROCESSED);
          this.client.metrics.timing(MetricNames.OPERATION_LATENCY, duration, {
            operation: `batch_${operation}`,
          });
          this.client.logger.debug('Batch request completed', {
            operation,
            baseId: this.baseId,
            table: this.tableIdOrName,
            count,
            durationMs: duration,
          });

          span.setStatus('OK');
          return result;
        } catch (error) {
          span.recordException(toError(error));
          this.client.logger.error('Batch request failed', {
            operation,
            baseId: this.baseId,
            table: this.tableIdOrName,
            count,
            error: toError(error).message,
          });
          throw error;
        }
      }
    );
  }

  /**
   * Sends `items` in chunks of 10, sequentially, concatenating results.
   * An empty input makes no request.
   */
  private async runChunked<I, O>(
    operation: string,
    items: I[],
    send: (part: I[]) => Promise<O[]>
  ): Promise<O[]> {
    const parts = chunk(items, BatchServiceImpl.BATCH_SIZE);
    const results: O[] = [];

    for (const [i, part] of parts.entries()) {
      results.push(...(await send(part)));

      this.client.logger.debug('Processed chunk', {
        operation,
        chunkIndex: i + 1,
        totalChunks: parts.length,
      });
    }

    if (parts.length > 0) {
      this.client.logger.info('Batch operation completed', {
        operation,
        baseId: this.baseId,
        table: this.tableIdOrName,
        totalCount: results.length,
        chunks: parts.length,
      });
    }

    return results;
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Creates a new batch service instance.
 *
 * @example
 * ```typescript
 * const batch = createBatchService(client, 'appExample', 'Tasks');
 * const created = await batch.createRecordsChunked([{ Name: 'Alice' }, { Name: 'Bob' }]);
 * ```
 */
export function createBatchService(
  client: AirtableClient,
  baseId: string,
  tableIdOrName: string
): BatchService {
  return new BatchServiceImpl(client, baseId, tableIdOrName);
}
