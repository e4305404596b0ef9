/**
 * MCP server tests, run over an in-memory transport.
 */

import { vi } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import {
  AirtableTools,
  StaticCredentialProvider,
  createAirtableMcpServer,
  toCallToolResult,
  success,
  failure,
} from '../index.js';
import { CREATED_TIME, FakeAirtable, TEST_SETTINGS } from './helpers/fake-airtable.js';

describe('toCallToolResult', () => {
  it('should render values as JSON text', () => {
    expect(toCallToolResult(success({ id: 'rec1' }))).toEqual({
      content: [{ type: 'text', text: '{\n  "id": "rec1"\n}' }],
    });
    expect(toCallToolResult(success(undefined))).toEqual({
      content: [{ type: 'text', text: 'null' }],
    });
  });

  it('should render errors with isError', () => {
    const result = toCallToolResult(
      failure({
        kind: 'not_found',
        name: 'NotFoundError',
        message: 'Error getting record: NotFoundError - Resource not found: rec1',
        detail: 'Resource not found: rec1',
        retryable: false,
      })
    );

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error getting record: NotFoundError - Resource not found: rec1' }],
      isError: true,
    });
  });
});

describe('createAirtableMcpServer', () => {
  let fake: FakeAirtable;
  let client: Client;
  let closeServer: () => Promise<void>;

  beforeEach(async () => {
    fake = new FakeAirtable();
    vi.stubGlobal('fetch', vi.fn(fake.fetch));

    const tools = new AirtableTools({
      credentials: new StaticCredentialProvider({ api_key: 'test-token' }),
      settings: TEST_SETTINGS,
    });
    const server = createAirtableMcpServer(tools);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    client = new Client({ name: 'test-client', version: '0.0.0' });
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
    closeServer = () => server.close();
  });

  afterEach(async () => {
    await client.close();
    await closeServer();
    vi.unstubAllGlobals();
  });

  it('should register every tool', async () => {
    const { tools } = await client.listTools();

    expect(tools.map(t => t.name)).toEqual([
      'list_bases',
      'list_tables',
      'get_record',
      'list_records',
      'create_record',
      'update_record',
      'delete_record',
      'batch_create_records',
      'batch_update_records',
      'batch_delete_records',
      'batch_upsert_records',
    ]);
  });

  it('should publish argument schemas and hints', async () => {
    const { tools } = await client.listTools();
    const getRecord = tools.find(t => t.name === 'get_record');

    expect(getRecord?.inputSchema.required).toEqual(['baseId', 'tableIdOrName', 'recordId']);
    expect(getRecord?.annotations).toMatchObject({ title: 'Get record', readOnlyHint: true });
  });

  it('should return tool values as text', async () => {
    const result = await client.callTool({
      name: 'create_record',
      arguments: { baseId: 'appA', tableIdOrName: 'Tasks', fields: { Name: 'Test' } },
    });

    const expected = { id: 'rec00000000000001', createdTime: CREATED_TIME, fields: { Name: 'Test' } };
    expect(result).toMatchObject({
      content: [{ type: 'text', text: JSON.stringify(expected, null, 2) }],
    });
    expect(fake.recordsIn('appA', 'Tasks')).toEqual([expected]);
  });

  it('should flag failed calls with isError', async () => {
    const result = await client.callTool({
      name: 'delete_record',
      arguments: { baseId: 'baseX', tableIdOrName: 'Tasks', recordId: 'recNotExist' },
    });

    expect(result).toMatchObject({
      isError: true,
      content: [
        {
          type: 'text',
          text: "Error deleting record 'recNotExist' from 'Tasks' in 'baseX': NotFoundError - Resource not found: Record recNotExist not found",
        },
      ],
    });
  });
});
