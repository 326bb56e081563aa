#!/usr/bin/env node
/**
 * txn-insight MCP server
 *
 * Serves the conversational transaction analyst over MCP stdio.
 * stdout carries JSON-RPC only; all logging goes to stderr.
 */

import 'dotenv/config';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadEnvironmentWith } from '../common/environment.js';
import { ConfigError, errorMessage } from '../common/errors.js';
import { openDataset } from '../common/services/dataset-loader.js';
import { logError, logInfo, setLogLevel } from '../common/services/logger.js';
import { getAnalystConfig, validateConfig } from './analyst/config.js';
import { AnalystEngine } from './analyst/engine.js';
import { registerAnalystTools } from './analyst/tools/analyst-tools.js';

export const SERVER_NAME = 'txn-insight-mcp';
export const SERVER_VERSION = '1.0.0';

export interface ServeOptions {
  datasetPath?: string;
}

/**
 * Build the engine and serve it over stdio until the client disconnects
 */
export async function runStdio(options: ServeOptions = {}): Promise<void> {
  const env = loadEnvironmentWith({ dataset: options.datasetPath });
  setLogLevel(env.LOG_LEVEL);

  const config = getAnalystConfig();
  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    throw new ConfigError(`Invalid analyst configuration: ${configErrors.join('; ')}`);
  }

  const dataset = openDataset({ path: env.DATASET_PATH, table: env.DATASET_TABLE });
  const engine = new AnalystEngine(dataset, { config });

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });
  registerAnalystTools(server, engine);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logInfo('MCP server running on stdio', { phase: 'startup', transport: env.TRANSPORT });
}

// =============================================================================
// ENTRY POINT
// =============================================================================

if (require.main === module) {
  runStdio().catch((error) => {
    logError('Fatal error', { phase: 'startup', error: errorMessage(error) });
    process.exit(1);
  });
}
