/**
 * MCP server exposing the Airtable tool catalogue.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { PACKAGE_NAME, PACKAGE_VERSION } from '../config/index.js';
import type { AirtableTools } from '../tools/index.js';
import type { ToolResult } from '../tools/result.js';

export const SERVER_NAME = PACKAGE_NAME;
export const SERVER_VERSION = PACKAGE_VERSION;

export interface AirtableMcpServerOptions {
  name?: string;
  version?: string;
}

/**
 * Renders a tool result as MCP content. Values become pretty-printed JSON;
 * errors become their message with `isError` set.
 */
export function toCallToolResult(result: ToolResult<unknown>): CallToolResult {
  if (result.ok) {
    return {
      content: [{ type: 'text', text: JSON.stringify(result.value ?? null, null, 2) }],
    };
  }
  return {
    content: [{ type: 'text', text: result.error.message }],
    isError: true,
  };
}

/**
 * Creates an MCP server with every tool of `tools` registered.
 *
 * @example
 * ```typescript
 * const server = createAirtableMcpServer(tools);
 * await server.connect(new StdioServerTransport());
 * ```
 */
export function createAirtableMcpServer(
  tools: AirtableTools,
  options: AirtableMcpServerOptions = {}
): McpServer {
  const server = new McpServer({
    name: options.name ?? SERVER_NAME,
    version: options.version ?? SERVER_VERSION,
  });

  for (const definition of tools.listTools()) {
    server.registerTool(
      definition.name,
      {
        title: definition.title,
        description: definition.description,
        inputSchema: definition.inputShape,
        annotations: { title: definition.title, ...definition.annotations },
      },
      async args => toCallToolResult(await definition.execute(tools, args))
    );
  }

  return server;
}
