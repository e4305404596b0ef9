/**
 * List and pagination service.
 *
 * Provides a fluent builder for querying records with support for:
 * - Filtering with Airtable formulas
 * - Sorting by multiple fields
 * - Field selection
 * - View filtering
 * - Offset pagination and streaming
 *
 * @module services/list
 */

import type { AirtableClient, QueryParams } from '../client/index.js';
import type {
  AirtableRecord,
  CellFormat,
  ListRecordsOptions,
  ListRecordsResponse,
  SortDirection,
  SortField,
  SortSpec,
} from '../types/index.js';
import { toSortField, validatePageSize } from '../types/index.js';
import { MetricNames } from '../observability/index.js';
import { tablePath } from './paths.js';

// ============================================================================
// List Records Builder
// ============================================================================

/**
 * Fluent builder for constructing list record queries.
 *
 * @example
 * ```typescript
 * const page = await builder
 *   .filterByFormula("{Status}='Active'")
 *   .sortBy('Name', 'asc')
 *   .page();
 *
 * for await (const record of builder.stream()) {
 *   console.log(record.id);
 * }
 * ```
 */
export class ListRecordsBuilder {
  private readonly client: AirtableClient;
  private readonly baseId: string;
  private readonly tableIdOrName: string;

  private filterFormula?: string;
  private sorts: SortField[] = [];
  private fields?: string[];
  private view?: string;
  private pageSizeValue?: number;
  private maxRecordsValue?: number;
  private cellFormatValue?: CellFormat;
  private timeZoneValue?: string;
  private userLocaleValue?: string;
  private returnFieldsByFieldIdValue?: boolean;

  constructor(client: AirtableClient, baseId: string, tableIdOrName: string) {
    this.client = client;
    this.baseId = baseId;
    this.tableIdOrName = tableIdOrName;
  }

  /**
   * Sets the filter formula (Airtable formula syntax).
   *
   * @example
   * ```typescript
   * builder.filterByFormula("AND({Status}='Active', {Count}>10)")
   * ```
   */
  filterByFormula(formula: string): this {
    this.filterFormula = formula;
    return this;
  }

  /**
   * Adds a sort field. Multiple calls sort by each field in turn.
   */
  sortBy(field: string, direction: SortDirection = 'asc'): this {
    this.sorts.push({ field, direction });
    return this;
  }

  /**
   * Adds several sort keys; `"-Field"` sorts descending.
   */
  sort(specs: SortSpec[]): this {
    for (const spec of specs) {
      this.sorts.push(toSortField(spec));
    }
    return this;
  }

  selectFields(fields: string[]): this {
    this.fields = fields;
    return this;
  }

  inView(viewIdOrName: string): this {
    this.view = viewIdOrName;
    return this;
  }

  /**
   * Sets the page size, clamped to 1-100.
   */
  pageSize(size: number): this {
    this.pageSizeValue = validatePageSize(size);
    return this;
  }

  /**
   * Caps the total number of records returned across all pages.
   */
  maxRecords(count: number): this {
    this.maxRecordsValue = Math.max(0, Math.floor(count));
    return this;
  }

  cellFormat(format: CellFormat): this {
    this.cellFormatValue = format;
    return this;
  }

  timeZone(tz: string): this {
    this.timeZoneValue = tz;
    return this;
  }

  userLocale(locale: string): this {
    this.userLocaleValue = locale;
    return this;
  }

  returnFieldsByFieldId(enabled: boolean = true): this {
    this.returnFieldsByFieldIdValue = enabled;
    return this;
  }

  /**
   * Applies an options object in one go.
   */
  withOptions(options: ListRecordsOptions): this {
    if (options.formula !== undefined) this.filterByFormula(options.formula);
    if (options.sort) this.sort(options.sort);
    if (options.fields) this.selectFields(options.fields);
    if (options.view !== undefined) this.inView(options.view);
    if (options.pageSize !== undefined) this.pageSize(options.pageSize);
    if (options.maxRecords !== undefined) this.maxRecords(options.maxRecords);
    if (options.cellFormat !== undefined) this.cellFormat(options.cellFormat);
    if (options.timeZone !== undefined) this.timeZone(options.timeZone);
    if (options.userLocale !== undefined) this.userLocale(options.userLocale);
    if (options.returnFieldsByFieldId !== undefined) {
      this.returnFieldsByFieldId(options.returnFieldsByFieldId);
    }
    return this;
  }

  /**
   * Fetches a single page of records.
   *
   * @param offset - Pagination token from a previous page
   */
  async page(offset?: string): Promise<ListRecordsResponse> {
    const startTime = Date.now();
    this.client.logger.debug('Fetching page of records', {
      baseId: this.baseId,
      table: this.tableIdOrName,
      offset,
    });

    const response = await this.client.get<ListRecordsResponse>(
      tablePath(this.baseId, this.tableIdOrName),
      this.buildQueryParams(offset)
    );

    this.client.metrics.timing(MetricNames.OPERATION_LATENCY, Date.now() - startTime, {
      operation: 'list',
    });
    this.client.logger.debug('Fetched page of records', {
      count: response.records.length,
      hasMore: response.offset !== undefined,
    });

    return response;
  }

  /**
   * Streams records one at a time, following pagination until the last page
   * or until `maxRecords` have been yielded.
   */
  async *stream(): AsyncGenerator<AirtableRecord> {
    let offset: string | undefined;
    let yielded = 0;
    const limit = this.maxRecordsValue;

    if (limit === 0) {
      return;
    }

    do {
      const response = await this.page(offset);

      for (const record of response.records) {
        yield record;
        yielded++;
        if (limit !== undefined && yielded >= limit) {
          return;
        }
      }

      offset = response.offset;
    } while (offset);
  }

  /**
   * Fetches every matching record.
   */
  async all(): Promise<AirtableRecord[]> {
    const records: AirtableRecord[] = [];
    for await (const record of this.stream()) {
      records.push(record);
    }

    this.client.logger.debug('Fetched all records', {
      totalCount: records.length,
      baseId: this.baseId,
      table: this.tableIdOrName,
    });

    return records;
  }

  /**
   * Returns the first matching record, or undefined when nothing matches.
   */
  async first(): Promise<AirtableRecord | undefined> {
    const response = await this.maxRecords(1).pageSize(1).page();
    return response.records[0];
  }

  /**
   * Builds query parameters for the API request.
   */
  buildQueryParams(offset?: string): QueryParams {
    const query: QueryParams = {};

    if (this.filterFormula) {
      query.filterByFormula = this.filterFormula;
    }

    // sort[0][field], sort[0][direction], ...
    this.sorts.forEach((sort, index) => {
      query[`sort[${index}][field]`] = sort.field;
      query[`sort[${index}][direction]`] = sort.direction;
    });

    if (this.fields && this.fields.length > 0) {
      query['fields[]'] = this.fields;
    }

    query.view = this.view;
    query.pageSize = this.pageSizeValue;
    query.maxRecords = this.maxRecordsValue;
    query.offset = offset;
    query.cellFormat = this.cellFormatValue;
    query.timeZone = this.timeZoneValue;
    query.userLocale = this.userLocaleValue;
    query.returnFieldsByFieldId = this.returnFieldsByFieldIdValue;

    return query;
  }
}

// ============================================================================
// List Service
// ============================================================================

export interface ListService {
  /**
   * Creates a new list records builder.
   */
  list(): ListRecordsBuilder;
}

export class ListServiceImpl implements ListService {
  private readonly client: AirtableClient;
  private readonly baseId: string;
  private readonly tableIdOrName: string;

  constructor(client: AirtableClient, baseId: string, tableIdOrName: string) {
    this.client = client;
    this.baseId = baseId;
    this.tableIdOrName = tableIdOrName;
  }

  list(): ListRecordsBuilder {
    return new ListRecordsBuilder(this.client, this.baseId, this.tableIdOrName);
  }
}

/**
 * Creates a new list service bound to one table.
 *
 * @example
 * ```typescript
 * const active = await createListService(client, 'appExample', 'Users')
 *   .list()
 *   .filterByFormula("{Status}='Active'")
 *   .all();
 * ```
 */
export function createListService(
  client: AirtableClient,
  baseId: string,
  tableIdOrName: string
): ListService {
  return new ListServiceImpl(client, baseId, tableIdOrName);
}
