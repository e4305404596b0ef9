/**
 * Record service: single-record CRUD against one table.
 */

import type { AirtableClient, QueryParams } from '../client/index.js';
import type {
  AirtableRecord,
  DeletedRecord,
  Fields,
  GetRecordOptions,
  UpdateOptions,
  WriteOptions,
} from '../types/index.js';
import { MetricNames } from '../observability/index.js';
import { recordPath, tablePath } from './paths.js';

// ============================================================================
// Record Service Interface
// ============================================================================

/**
 * Record service interface for CRUD operations on Airtable records.
 */
export interface RecordService {
  /**
   * Creates a new record in the table.
   *
   * @example
   * ```typescript
   * const record = await recordService.create({ Name: 'Ada', Status: 'Active' });
   * console.log(record.id);
   * ```
   */
  create(fields: Fields, options?: WriteOptions): Promise<AirtableRecord>;

  /**
   * Retrieves a record by ID.
   *
   * @throws {NotFoundError} If the record does not exist
   */
  get(recordId: string, options?: GetRecordOptions): Promise<AirtableRecord>;

  /**
   * Updates a record. Given fields are merged (PATCH) unless `options.replace`
   * is set, in which case every other field is cleared (PUT).
   *
   * @throws {NotFoundError} If the record does not exist
   */
  update(recordId: string, fields: Fields, options?: UpdateOptions): Promise<AirtableRecord>;

  /**
   * Deletes a record.
   *
   * @throws {NotFoundError} If the record does not exist
   */
  delete(recordId: string): Promise<DeletedRecord>;
}

// ============================================================================
// Record Service Implementation
// ============================================================================

export class RecordServiceImpl implements RecordService {
  private readonly client: AirtableClient;
  private readonly baseId: string;
  private readonly tableIdOrName: string;

  constructor(client: AirtableClient, baseId: string, tableIdOrName: string) {
    this.client = client;
    this.baseId = baseId;
    this.tableIdOrName = tableIdOrName;
  }

  async create(fields: Fields, options: WriteOptions = {}): Promise<AirtableRecord> {
    return this.client.tracer.withSpan(
      'airtable.record.create',
      async (span) => {
        span.setAttribute('base', this.baseId);
        span.setAttribute('table', this.tableIdOrName);

        const record = await this.client.post<AirtableRecord>(
          tablePath(this.baseId, this.tableIdOrName),
          writeBody({ fields }, options)
        );

        this.client.logger.info('Record created', {
          base: this.baseId,
          table: this.tableIdOrName,
          recordId: record.id,
        });
        this.client.metrics.increment(MetricNames.RECORDS_CREATED, 1, {
          base: this.baseId,
          table: this.tableIdOrName,
        });

        return record;
      },
      { operation: 'createRecord' }
    );
  }

  async get(recordId: string, options: GetRecordOptions = {}): Promise<AirtableRecord> {
    return this.client.tracer.withSpan(
      'airtable.record.get',
      async (span) => {
        span.setAttribute('base', this.baseId);
        span.setAttribute('table', this.tableIdOrName);
        span.setAttribute('record', recordId);

        const record = await this.client.get<AirtableRecord>(
          recordPath(this.baseId, this.tableIdOrName, recordId),
          readQuery(options)
        );

        this.client.logger.debug('Record retrieved', {
          base: this.baseId,
          table: this.tableIdOrName,
          recordId,
        });

        return record;
      },
      { operation: 'getRecord' }
    );
  }

  async update(recordId: string, fields: Fields, options: UpdateOptions = {}): Promise<AirtableRecord> {
    const operation = options.replace ? 'replace' : 'update';
    return this.client.tracer.withSpan(
      `airtable.record.${operation}`,
      async (span) => {
        span.setAttribute('base', this.baseId);
        span.setAttribute('table', this.tableIdOrName);
        span.setAttribute('record', recordId);

        const path = recordPath(this.baseId, this.tableIdOrName, recordId);
        const body = writeBody({ fields }, options);
        const record = options.replace
          ? await this.client.put<AirtableRecord>(path, body)
          : await this.client.patch<AirtableRecord>(path, body);

        this.client.logger.info(options.replace ? 'Record replaced' : 'Record updated', {
          base: this.baseId,
          table: this.tableIdOrName,
          recordId,
        });
        this.client.metrics.increment(MetricNames.RECORDS_UPDATED, 1, {
          base: this.baseId,
          table: this.tableIdOrName,
          operation,
        });

        return record;
      },
      { operation: `${operation}Record` }
    );
  }

  async delete(recordId: string): Promise<DeletedRecord> {
    return this.client.tracer.withSpan(
      'airtable.record.delete',
      async (span) => {
        span.setAttribute('base', this.baseId);
        span.setAttribute('table', this.tableIdOrName);
        span.setAttribute('record', recordId);

        const result = await this.client.delete<DeletedRecord>(
          recordPath(this.baseId, this.tableIdOrName, recordId)
        );

        this.client.logger.info('Record deleted', {
          base: this.baseId,
          table: this.tableIdOrName,
          recordId,
        });
        this.client.metrics.increment(MetricNames.RECORDS_DELETED, 1, {
          base: this.baseId,
          table: this.tableIdOrName,
        });

        return result;
      },
      { operation: 'deleteRecord' }
    );
  }
}

// ============================================================================
// Request Helpers
// ============================================================================

/**
 * Query parameters for reads.
 */
export function readQuery(options: GetRecordOptions): QueryParams {
  return {
    cellFormat: options.cellFormat,
    timeZone: options.timeZone,
    userLocale: options.userLocale,
    returnFieldsByFieldId: options.returnFieldsByFieldId,
  };
}

/**
 * Adds the write flags to a request body. Unset flags are omitted.
 */
export function writeBody(body: Record<string, unknown>, options: WriteOptions): Record<string, unknown> {
  const result: Record<string, unknown> = { ...body };
  if (options.typecast !== undefined) {
    result.typecast = options.typecast;
  }
  if (options.returnFieldsByFieldId !== undefined) {
    result.returnFieldsByFieldId = options.returnFieldsByFieldId;
  }
  return result;
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Creates a record service instance.
 *
 * @example
 * ```typescript
 * const records = createRecordService(client, 'appExample', 'Tasks');
 * await records.update('recExample', { Status: 'Done' });
 * ```
 */
export function createRecordService(
  client: AirtableClient,
  baseId: string,
  tableIdOrName: string
): RecordService {
  return new RecordServiceImpl(client, baseId, tableIdOrName);
}
