/**
 * Static tool catalogue.
 *
 * Each entry carries the zod shape of its arguments and an `execute` that
 * validates raw arguments before calling the adapter.
 */

import { z, type ZodRawShape } from 'zod';
import { ValidationError } from '../errors/index.js';
import { formulaNodeSchema } from '../formulas/index.js';
import type { AirtableTools } from './index.js';
import { failure, toToolError, type ToolResult } from './result.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Behaviour hints for hosts, mirroring MCP tool annotations.
 */
export interface ToolAnnotations {
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

export interface ToolDefinition {
  name: string;
  title: string;
  description: string;
  tags: readonly string[];
  inputShape: ZodRawShape;
  annotations: ToolAnnotations;
  /**
   * Validates `args` and runs the tool. Invalid arguments produce a
   * `validation` error result.
   */
  execute(tools: AirtableTools, args: unknown): Promise<ToolResult<unknown>>;
}

function defineTool<S extends ZodRawShape, T>(options: {
  name: string;
  title: string;
  description: string;
  tags: readonly string[];
  annotations: ToolAnnotations;
  input: S;
  run: (tools: AirtableTools, args: z.infer<z.ZodObject<S, 'strip'>>) => Promise<ToolResult<T>>;
}): ToolDefinition {
  const schema: z.ZodObject<S, 'strip'> = z.object(options.input);

  return {
    name: options.name,
    title: options.title,
    description: options.description,
    tags: options.tags,
    inputShape: options.input,
    annotations: options.annotations,
    async execute(tools, args) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
          .join('; ');
        return failure(toToolError(`Invalid arguments for ${options.name}`, new ValidationError(issues)));
      }
      return options.run(tools, parsed.data);
    },
  };
}

// ============================================================================
// Argument Schemas
// ============================================================================

const baseId = z.string().min(1).describe('Base ID, e.g. "appXXXXXXXXXXXXXX"');
const tableIdOrName = z.string().min(1).describe('Table ID or name');
const recordId = z.string().min(1).describe('Record ID, e.g. "recXXXXXXXXXXXXXX"');
const fields = z.record(z.unknown()).describe('Field values keyed by field name or ID');

const cellFormat = z.enum(['json', 'string']);

const readOptions = {
  cellFormat: cellFormat.optional(),
  timeZone: z.string().optional(),
  userLocale: z.string().optional(),
  returnFieldsByFieldId: z.boolean().optional(),
};

const writeOptions = {
  typecast: z.boolean().optional().describe('Let Airtable convert string values to the field type'),
  returnFieldsByFieldId: z.boolean().optional(),
};

const updateOptions = {
  ...writeOptions,
  replace: z.boolean().optional().describe('Clear fields that are not given instead of merging'),
};

const sortSpec = z.union([
  z.string(),
  z.object({ field: z.string().min(1), direction: z.enum(['asc', 'desc']).default('asc') }),
]);

// ============================================================================
// Catalogue
// ============================================================================

export const AIRTABLE_TOOLS: readonly ToolDefinition[] = [
  defineTool({
    name: 'list_bases',
    title: 'List bases',
    description: 'List every Airtable base the API key can access.',
    tags: ['bases', 'read'],
    annotations: { readOnlyHint: true, openWorldHint: true },
    input: {},
    run: tools => tools.listBases(),
  }),

  defineTool({
    name: 'list_tables',
    title: 'List tables',
    description: 'List the tables of a base with their fields and views.',
    tags: ['tables', 'read'],
    annotations: { readOnlyHint: true, openWorldHint: true },
    input: { baseId },
    run: (tools, args) => tools.listTables(args.baseId),
  }),

  defineTool({
    name: 'get_record',
    title: 'Get record',
    description: 'Fetch one record by ID.',
    tags: ['records', 'read'],
    annotations: { readOnlyHint: true, openWorldHint: true },
    input: { baseId, tableIdOrName, recordId, options: z.object(readOptions).optional() },
    run: (tools, args) => tools.getRecord(args.baseId, args.tableIdOrName, args.recordId, args.options),
  }),

  defineTool({
    name: 'list_records',
    title: 'List records',
    description:
      'List records in a table, following pagination. `formula` is an Airtable formula string ' +
      'or a structured expression such as {"type":"compare","operator":"=","left":{"type":"field","name":"Status"},"right":{"type":"value","value":"Open"}}.',
    tags: ['records', 'read'],
    annotations: { readOnlyHint: true, openWorldHint: true },
    input: {
      baseId,
      tableIdOrName,
      options: z
        .object({
          ...readOptions,
          view: z.string().optional(),
          pageSize: z.number().int().optional(),
          maxRecords: z.number().int().nonnegative().optional(),
          fields: z.array(z.string()).optional(),
          sort: z.array(sortSpec).optional(),
          formula: z.union([z.string(), formulaNodeSchema]).optional(),
        })
        .optional(),
    },
    run: (tools, args) => tools.listRecords(args.baseId, args.tableIdOrName, args.options),
  }),

  defineTool({
    name: 'create_record',
    title: 'Create record',
    description: 'Create one record.',
    tags: ['records', 'write'],
    annotations: { openWorldHint: true },
    input: { baseId, tableIdOrName, fields, options: z.object(writeOptions).optional() },
    run: (tools, args) => tools.createRecord(args.baseId, args.tableIdOrName, args.fields, args.options),
  }),

  defineTool({
    name: 'update_record',
    title: 'Update record',
    description: 'Update one record. Fields are merged unless `replace` is set.',
    tags: ['records', 'write'],
    annotations: { idempotentHint: true, openWorldHint: true },
    input: { baseId, tableIdOrName, recordId, fields, options: z.object(updateOptions).optional() },
    run: (tools, args) =>
      tools.updateRecord(args.baseId, args.tableIdOrName, args.recordId, args.fields, args.options),
  }),

  defineTool({
    name: 'delete_record',
    title: 'Delete record',
    description: 'Delete one record.',
    tags: ['records', 'delete'],
    annotations: { destructiveHint: true, idempotentHint: true, openWorldHint: true },
    input: { baseId, tableIdOrName, recordId },
    run: (tools, args) => tools.deleteRecord(args.baseId, args.tableIdOrName, args.recordId),
  }),

  defineTool({
    name: 'batch_create_records',
    title: 'Batch create records',
    description: 'Create many records. Sent to Airtable 10 at a time.',
    tags: ['records', 'write', 'batch'],
    annotations: { openWorldHint: true },
    input: { baseId, tableIdOrName, records: z.array(fields), options: z.object(writeOptions).optional() },
    run: (tools, args) =>
      tools.batchCreateRecords(args.baseId, args.tableIdOrName, args.records, args.options),
  }),

  defineTool({
    name: 'batch_update_records',
    title: 'Batch update records',
    description: 'Update many records, each given as {id, fields}. Sent to Airtable 10 at a time.',
    tags: ['records', 'write', 'batch'],
    annotations: { idempotentHint: true, openWorldHint: true },
    input: {
      baseId,
      tableIdOrName,
      records: z.array(z.object({ id: z.string().min(1), fields })),
      options: z.object(updateOptions).optional(),
    },
    run: (tools, args) =>
      tools.batchUpdateRecords(args.baseId, args.tableIdOrName, args.records, args.options),
  }),

  defineTool({
    name: 'batch_delete_records',
    title: 'Batch delete records',
    description: 'Delete many records by ID. Sent to Airtable 10 at a time.',
    tags: ['records', 'delete', 'batch'],
    annotations: { destructiveHint: true, idempotentHint: true, openWorldHint: true },
    input: { baseId, tableIdOrName, recordIds: z.array(z.string().min(1)) },
    run: (tools, args) => tools.batchDeleteRecords(args.baseId, args.tableIdOrName, args.recordIds),
  }),

  defineTool({
    name: 'batch_upsert_records',
    title: 'Batch upsert records',
    description:
      'Create or update many records. Records with an id update that record; ' +
      'others match existing records on `keyFields` and are created when nothing matches.',
    tags: ['records', 'write', 'batch'],
    annotations: { idempotentHint: true, openWorldHint: true },
    input: {
      baseId,
      tableIdOrName,
      records: z.array(z.object({ id: z.string().min(1).optional(), fields })),
      keyFields: z.array(z.string().min(1)).min(1),
      options: z.object(updateOptions).optional(),
    },
    run: (tools, args) =>
      tools.batchUpsertRecords(args.baseId, args.tableIdOrName, args.records, args.keyFields, args.options),
  }),
];

/**
 * Looks up a catalogue entry by name.
 */
export function findTool(name: string): ToolDefinition | undefined {
  return AIRTABLE_TOOLS.find(tool => tool.name === name);
}
