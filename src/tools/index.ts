/**
 * Airtable tool adapter.
 *
 * Each operation authenticates from the credential provider, resolves a
 * base or table handle and makes one delegated call. Failures never reject:
 * they come back as `{ ok: false, error }` with a message naming what was
 * being attempted.
 *
 * @example
 * ```typescript
 * const tools = new AirtableTools({ credentials: new EnvironmentCredentialProvider() });
 *
 * const result = await tools.createRecord('appExample', 'Tasks', { Name: 'Test' });
 * if (result.ok) {
 *   console.log(result.value.id);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */

import { AirtableClient } from '../client/index.js';
import {
  AirtableConfigBuilder,
  ClientSettings,
  ClientSettingsInput,
  configWithToken,
} from '../config/index.js';
import { ConfigurationError } from '../errors/index.js';
import { CredentialProvider, resolveApiKey } from '../credentials/index.js';
import { FormulaNode, toFormulaString } from '../formulas/index.js';
import { MetricNames, Observability, createNoopObservability } from '../observability/index.js';
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
import { ToolResult, failure, success, toToolError } from './result.js';
import { AIRTABLE_TOOLS, ToolDefinition } from './definitions.js';

/**
 * List options where the formula may also be a structured expression.
 */
export interface ListRecordsToolOptions extends Omit<ListRecordsOptions, 'formula'> {
  formula?: string | FormulaNode;
}

export interface AirtableToolsOptions {
  /** Where the API key comes from; read on every call */
  credentials?: CredentialProvider;
  settings?: ClientSettingsInput;
  observability?: Observability;
}

// ============================================================================
// Adapter
// ============================================================================

export class AirtableTools {
  private readonly credentials: CredentialProvider;
  private readonly settings: ClientSettings;
  private readonly observability: Observability;
  private cached?: { apiKey: string; client: AirtableClient };

  /**
   * @throws {ConfigurationError} If no credential provider is given
   */
  constructor(options: AirtableToolsOptions = {}) {
    if (!options.credentials) {
      throw new ConfigurationError('A credential provider is required');
    }
    this.credentials = options.credentials;
    this.settings = new AirtableConfigBuilder().withSettings(options.settings ?? {}).buildSettings();
    this.observability = options.observability ?? createNoopObservability();
  }

  /**
   * Returns a client for the current API key, reusing the last one while the
   * key is unchanged.
   *
   * @throws {AuthenticationError} If the credentials hold no API key
   */
  async getClient(): Promise<AirtableClient> {
    const apiKey = resolveApiKey(await this.credentials.getCredentials());

    let cached = this.cached;
    if (!cached || cached.apiKey !== apiKey) {
      cached = {
        apiKey,
        client: new AirtableClient(configWithToken(this.settings, apiKey), this.observability),
      };
      this.cached = cached;
    }
    return cached.client;
  }

  /**
   * The eleven tools this adapter exposes, in catalogue order.
   */
  listTools(): readonly ToolDefinition[] {
    return AIRTABLE_TOOLS;
  }

  // ==========================================================================
  // Bases and tables
  // ==========================================================================

  async listBases(): Promise<ToolResult<Base[]>> {
    return this.run('list_bases', 'Error listing bases', client => client.bases());
  }

  async listTables(baseId: string): Promise<ToolResult<TableSchema[]>> {
    return this.run('list_tables', `Error listing tables for base '${baseId}'`, client =>
      client.base(baseId).tables()
    );
  }

  // ==========================================================================
  // Records
  // ==========================================================================

  async getRecord(
    baseId: string,
    tableIdOrName: string,
    recordId: string,
    options: GetRecordOptions = {}
  ): Promise<ToolResult<AirtableRecord>> {
    return this.run(
      'get_record',
      `Error getting record '${recordId}' from '${tableIdOrName}' in '${baseId}'`,
      client => client.table(baseId, tableIdOrName).get(recordId, options)
    );
  }

  async listRecords(
    baseId: string,
    tableIdOrName: string,
    options: ListRecordsToolOptions = {}
  ): Promise<ToolResult<AirtableRecord[]>> {
    return this.run(
      'list_records',
      `Error listing records from '${tableIdOrName}' in '${baseId}'`,
      client => {
        const { formula, ...rest } = options;
        const listOptions: ListRecordsOptions =
          formula === undefined ? rest : { ...rest, formula: toFormulaString(formula) };
        return client.table(baseId, tableIdOrName).all(listOptions);
      }
    );
  }

  async createRecord(
    baseId: string,
    tableIdOrName: string,
    fields: Fields,
    options: WriteOptions = {}
  ): Promise<ToolResult<AirtableRecord>> {
    return this.run(
      'create_record',
      `Error creating record in '${tableIdOrName}' in '${baseId}'`,
      client => client.table(baseId, tableIdOrName).create(fields, options)
    );
  }

  async updateRecord(
    baseId: string,
    tableIdOrName: string,
    recordId: string,
    fields: Fields,
    options: UpdateOptions = {}
  ): Promise<ToolResult<AirtableRecord>> {
    return this.run(
      'update_record',
      `Error updating record '${recordId}' in '${tableIdOrName}' in '${baseId}'`,
      client => client.table(baseId, tableIdOrName).update(recordId, fields, options)
    );
  }

  async deleteRecord(
    baseId: string,
    tableIdOrName: string,
    recordId: string
  ): Promise<ToolResult<DeletedRecord>> {
    return this.run(
      'delete_record',
      `Error deleting record '${recordId}' from '${tableIdOrName}' in '${baseId}'`,
      client => client.table(baseId, tableIdOrName).delete(recordId)
    );
  }

  // ==========================================================================
  // Batches
  // ==========================================================================

  async batchCreateRecords(
    baseId: string,
    tableIdOrName: string,
    records: Fields[],
    options: WriteOptions = {}
  ): Promise<ToolResult<AirtableRecord[]>> {
    return this.run(
      'batch_create_records',
      `Error batch creating records in '${tableIdOrName}' in '${baseId}'`,
      client => client.table(baseId, tableIdOrName).batchCreate(records, options)
    );
  }

  async batchUpdateRecords(
    baseId: string,
    tableIdOrName: string,
    records: RecordUpdate[],
    options: UpdateOptions = {}
  ): Promise<ToolResult<AirtableRecord[]>> {
    return this.run(
      'batch_update_records',
      `Error batch updating records in '${tableIdOrName}' in '${baseId}'`,
      client => client.table(baseId, tableIdOrName).batchUpdate(records, options)
    );
  }

  async batchDeleteRecords(
    baseId: string,
    tableIdOrName: string,
    recordIds: string[]
  ): Promise<ToolResult<DeletedRecord[]>> {
    return this.run(
      'batch_delete_records',
      `Error batch deleting records from '${tableIdOrName}' in '${baseId}'`,
      client => client.table(baseId, tableIdOrName).batchDelete(recordIds)
    );
  }

  /**
   * Creates or updates records. A record with an `id` updates that record;
   * otherwise `keyFields` decide whether an existing record matches.
   */
  async batchUpsertRecords(
    baseId: string,
    tableIdOrName: string,
    records: UpsertRecordInput[],
    keyFields: string[],
    options: UpdateOptions = {}
  ): Promise<ToolResult<UpsertResult>> {
    return this.run(
      'batch_upsert_records',
      `Error batch upserting records in '${tableIdOrName}' in '${baseId}'`,
      client => client.table(baseId, tableIdOrName).batchUpsert(records, keyFields, options)
    );
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private async run<T>(
    tool: string,
    context: string,
    operation: (client: AirtableClient) => Promise<T>
  ): Promise<ToolResult<T>> {
    const { logger, metrics } = this.observability;
    metrics.increment(MetricNames.TOOL_CALLS_TOTAL, 1, { tool });

    try {
      const client = await this.getClient();
      return success(await operation(client));
    } catch (error) {
      const toolError = toToolError(context, error);
      metrics.increment(MetricNames.TOOL_FAILURES_TOTAL, 1, { tool, kind: toolError.kind });
      logger.warn('Tool call failed', {
        tool,
        kind: toolError.kind,
        error: toolError.message,
      });
      return failure(toolError);
    }
  }
}

export type { ToolResult, ToolError, ToolErrorKind } from './result.js';
export { success, failure, toToolError } from './result.js';
export { AIRTABLE_TOOLS, findTool } from './definitions.js';
export type { ToolDefinition, ToolAnnotations } from './definitions.js';
