/**
 * Metadata service: bases and table schemas through the Meta API.
 */

import type { AirtableClient } from '../client/index.js';
import type { Base, ListBasesResponse, TableSchema } from '../types/index.js';
import { NotFoundError } from '../errors/index.js';
import { META_BASES_PATH, metaTablesPath } from './paths.js';

interface ListTablesResponse {
  tables: TableSchema[];
}

// ============================================================================
// Metadata Service Interface
// ============================================================================

/**
 * Metadata service interface for base and table schema operations.
 */
export interface MetadataService {
  /**
   * Lists all bases the token can access, following pagination.
   *
   * @throws {AuthenticationError} If authentication fails
   */
  listBases(): Promise<Base[]>;

  /**
   * Finds one base among the accessible bases.
   *
   * @throws {NotFoundError} If no accessible base has this ID
   */
  getBase(baseId: string): Promise<Base>;

  /**
   * Lists all tables in a base with their schemas.
   *
   * @throws {NotFoundError} If the base is not found
   */
  listTables(baseId: string): Promise<TableSchema[]>;

  /**
   * Gets the schema of one table, matched by ID or by name.
   *
   * @throws {NotFoundError} If the base or table is not found
   */
  getTable(baseId: string, tableIdOrName: string): Promise<TableSchema>;
}

// ============================================================================
// Metadata Service Implementation
// ============================================================================

/**
 * @example
 * ```typescript
 * const metadata = new MetadataServiceImpl(client);
 * const bases = await metadata.listBases();
 * const schema = await metadata.getTable('appExample', 'Tasks');
 * ```
 */
export class MetadataServiceImpl implements MetadataService {
  private readonly client: AirtableClient;

  constructor(client: AirtableClient) {
    this.client = client;
  }

  async listBases(): Promise<Base[]> {
    return this.client.tracer.withSpan('airtable.meta.listBases', async (span) => {
      const bases: Base[] = [];
      let offset: string | undefined;
      let pages = 0;

      do {
        const response = await this.client.get<ListBasesResponse>(META_BASES_PATH, { offset });
        bases.push(...response.bases);
        offset = response.offset;
        pages++;
      } while (offset);

      span.setAttribute('count', bases.length);
      this.client.logger.debug('Fetched bases list', { count: bases.length, pages });
      return bases;
    });
  }

  async getBase(baseId: string): Promise<Base> {
    const bases = await this.listBases();
    const base = bases.find(b => b.id === baseId);
    if (!base) {
      throw new NotFoundError(`base ${baseId}`);
    }
    return base;
  }

  async listTables(baseId: string): Promise<TableSchema[]> {
    return this.client.tracer.withSpan('airtable.meta.listTables', async (span) => {
      span.setAttribute('base', baseId);

      const response = await this.client.get<ListTablesResponse>(metaTablesPath(baseId));

      this.client.logger.debug('Fetched tables list', { baseId, count: response.tables.length });
      return response.tables;
    });
  }

  async getTable(baseId: string, tableIdOrName: string): Promise<TableSchema> {
    const tables = await this.listTables(baseId);
    // Airtable has no single-table schema endpoint
    const table = tables.find(t => t.id === tableIdOrName) ?? tables.find(t => t.name === tableIdOrName);
    if (!table) {
      throw new NotFoundError(`table ${tableIdOrName} in base ${baseId}`);
    }
    return table;
  }
}

/**
 * Creates a metadata service instance.
 */
export function createMetadataService(client: AirtableClient): MetadataService {
  return new MetadataServiceImpl(client);
}
