/**
 * Airtable API services.
 */

// ============================================================================
// Record Service
// ============================================================================

export {
  RecordServiceImpl,
  createRecordService,
  readQuery,
  writeBody,
} from './record.js';

export type { RecordService } from './record.js';

// ============================================================================
// List Service
// ============================================================================

export {
  ListServiceImpl,
  ListRecordsBuilder,
  createListService,
} from './list.js';

export type { ListService } from './list.js';

// ============================================================================
// Batch Service
// ============================================================================

export {
  BatchServiceImpl,
  createBatchService,
  chunk,
} from './batch.js';

export type { BatchService } from './batch.js';

// ============================================================================
// Metadata Service
// ============================================================================

export {
  MetadataServiceImpl,
  createMetadataService,
} from './metadata.js';

export type { MetadataService } from './metadata.js';

// ============================================================================
// Paths
// ============================================================================

export { tablePath, recordPath, metaTablesPath, META_BASES_PATH } from './paths.js';
