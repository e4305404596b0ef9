#!/usr/bin/env node
/**
 * Runs the Airtable MCP server over stdio.
 *
 * Environment:
 *   AIRTABLE_API_KEY    personal access token (read on every tool call)
 *   AIRTABLE_BASE_URL   API base URL, default https://api.airtable.com/v0
 *   AIRTABLE_TIMEOUT_MS, AIRTABLE_RATE_LIMIT_RPS, AIRTABLE_MAX_RETRIES
 *   AIRTABLE_LOG_LEVEL  debug | info | warn | error (logs go to stderr)
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { AirtableConfigBuilder, ENV_VARS } from './config/index.js';
import { EnvironmentCredentialProvider } from './credentials/index.js';
import { toError } from './errors/index.js';
import { createConsoleObservability, parseLogLevel } from './observability/index.js';
import { createAirtableMcpServer } from './server/index.js';
import { AirtableTools } from './tools/index.js';

async function main(): Promise<void> {
  const observability = createConsoleObservability({
    level: parseLogLevel(process.env[ENV_VARS.LOG_LEVEL]),
    context: { service: 'airtable-tools' },
    destination: 'stderr',
  });

  const tools = new AirtableTools({
    credentials: new EnvironmentCredentialProvider(),
    settings: AirtableConfigBuilder.fromEnv().buildSettings(),
    observability,
  });

  const server = createAirtableMcpServer(tools);
  await server.connect(new StdioServerTransport());

  observability.logger.info('Airtable MCP server started', {
    transport: 'stdio',
    tools: tools.listTools().length,
  });
}

main().catch((error: unknown) => {
  const err = toError(error);
  process.stderr.write(`${JSON.stringify({ level: 'ERROR', message: 'Server failed to start', error: err.message })}\n`);
  process.exitCode = 1;
});
