/**
 * Airtable API type definitions.
 *
 * Core types for records, schema metadata and per-operation options.
 */

import { BatchSizeExceededError } from '../errors/index.js';

// ============================================================================
// Identifier Types
// ============================================================================

/**
 * Identifiers are opaque to this library and are never checked locally;
 * Airtable rejects malformed ones itself.
 */

/** Base ID (e.g. "appXXXXXXXXXXXXXX"). */
export type BaseId = string;

/** Table ID or table name. */
export type TableIdOrName = string;

/** Record ID (e.g. "recXXXXXXXXXXXXXX"). */
export type RecordId = string;

export type FieldId = string;

export type ViewId = string;

// ============================================================================
// Record Types
// ============================================================================

/**
 * Field name (or ID) to value mapping.
 *
 * Values are passed through untouched in both directions.
 */
export type Fields = { [fieldName: string]: unknown };

/**
 * Airtable record representation.
 */
export interface AirtableRecord {
  /** Record ID */
  id: RecordId;
  /** Record creation timestamp (ISO 8601) */
  createdTime: string;
  fields: Fields;
  /** Present when the request asked for comment counts */
  commentCount?: number;
}

/**
 * Deleted record representation.
 */
export interface DeletedRecord {
  id: RecordId;
  deleted: true;
}

/**
 * Record update with ID for batch operations.
 */
export interface RecordUpdate {
  id: RecordId;
  fields: Fields;
}

/**
 * Upsert input: records may carry an ID, otherwise they are matched on key fields.
 */
export interface UpsertRecordInput {
  id?: RecordId;
  fields: Fields;
}

/**
 * Result from an upsert operation.
 */
export interface UpsertResult {
  /** IDs of newly created records */
  createdRecords: RecordId[];
  /** IDs of updated records */
  updatedRecords: RecordId[];
  /** All records after upsert */
  records: AirtableRecord[];
}

// ============================================================================
// Query Types
// ============================================================================

export type SortDirection = 'asc' | 'desc';

/**
 * Field to sort by.
 */
export interface SortField {
  /** Field name or ID */
  field: string;
  direction: SortDirection;
}

/**
 * A sort key. A bare string sorts ascending, or descending with a leading `-`.
 */
export type SortSpec = SortField | string;

/**
 * Cell format for API responses.
 */
export type CellFormat = 'json' | 'string';

/**
 * Response from listing records.
 */
export interface ListRecordsResponse {
  records: AirtableRecord[];
  /** Pagination offset token (if more records available) */
  offset?: string;
}

// ============================================================================
// Operation Options
// ============================================================================

/**
 * Formatting options shared by reads.
 */
export interface GetRecordOptions {
  /** 'json' (default) or 'string'; 'string' also needs timeZone and userLocale */
  cellFormat?: CellFormat;
  /** e.g. "America/New_York" */
  timeZone?: string;
  /** e.g. "en-us" */
  userLocale?: string;
  /** Key returned fields by field ID instead of name */
  returnFieldsByFieldId?: boolean;
}

/**
 * Options for listing records.
 */
export interface ListRecordsOptions extends GetRecordOptions {
  /** View ID or name */
  view?: string;
  /** Records per page (clamped to 1-100) */
  pageSize?: number;
  /** Stop after this many records in total */
  maxRecords?: number;
  /** Field names or IDs to return */
  fields?: string[];
  sort?: SortSpec[];
  /** Formula string sent as filterByFormula */
  formula?: string;
}

/**
 * Options for writes.
 */
export interface WriteOptions {
  /** Let Airtable coerce string values into the field's type */
  typecast?: boolean;
  returnFieldsByFieldId?: boolean;
}

/**
 * Options for updates.
 */
export interface UpdateOptions extends WriteOptions {
  /** Clear every field not given (PUT) instead of merging (PATCH) */
  replace?: boolean;
}

// ============================================================================
// Metadata Types
// ============================================================================

export type PermissionLevel = 'none' | 'read' | 'comment' | 'edit' | 'create';

/**
 * Airtable base metadata.
 */
export interface Base {
  id: BaseId;
  name: string;
  permissionLevel: PermissionLevel;
}

/**
 * Response page from the base listing endpoint.
 */
export interface ListBasesResponse {
  bases: Base[];
  offset?: string;
}

/**
 * Field schema definition.
 */
export interface FieldSchema {
  id: FieldId;
  name: string;
  /** Field type, e.g. "singleLineText" or "multipleRecordLinks" */
  type: string;
  /** Type-specific options */
  options?: { [key: string]: unknown };
  description?: string;
}

/**
 * View schema definition.
 */
export interface ViewSchema {
  id: ViewId;
  name: string;
  /** "grid", "form", "calendar", "gallery", "kanban", ... */
  type: string;
}

/**
 * Table schema definition.
 */
export interface TableSchema {
  id: string;
  name: string;
  primaryFieldId: FieldId;
  fields: FieldSchema[];
  views: ViewSchema[];
  description?: string;
}

// ============================================================================
// Limits
// ============================================================================

/**
 * Maximum number of records per create/update/delete/upsert request.
 */
export const MAX_BATCH_SIZE = 10;

export const MIN_PAGE_SIZE = 1;

export const MAX_PAGE_SIZE = 100;

/**
 * Checks that a single request's batch stays within Airtable's limit.
 *
 * @throws BatchSizeExceededError if there are more than {@link MAX_BATCH_SIZE} items
 */
export function validateBatchSize(count: number): void {
  if (count > MAX_BATCH_SIZE) {
    throw new BatchSizeExceededError(MAX_BATCH_SIZE, count);
  }
}

/**
 * Clamps a page size to the valid range (1-100).
 */
export function validatePageSize(size: number): number {
  if (size < MIN_PAGE_SIZE) {
    return MIN_PAGE_SIZE;
  }
  if (size > MAX_PAGE_SIZE) {
    return MAX_PAGE_SIZE;
  }
  return Math.floor(size);
}

/**
 * Normalises a sort key.
 *
 * @example
 * ```typescript
 * toSortField('-Due');  // { field: 'Due', direction: 'desc' }
 * toSortField('Name');  // { field: 'Name', direction: 'asc' }
 * ```
 */
export function toSortField(spec: SortSpec): SortField {
  if (typeof spec !== 'string') {
    return spec;
  }
  if (spec.startsWith('-')) {
    return { field: spec.slice(1), direction: 'desc' };
  }
  return { field: spec, direction: 'asc' };
}
