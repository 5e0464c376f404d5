/**
 * MCP Server initialization and configuration.
 *
 * Sets up the MCP server with the daiji tools and the tables resource.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DaijiConverter } from '../daiji/converter.js';
import { executeConvert } from './tools/convert.js';
import { executeNormalize } from './tools/normalize.js';
import {
  convertParamsShape,
  CONVERT_TOOL_NAME,
  CONVERT_TOOL_DESCRIPTION,
} from '../validators/convert.js';
import {
  normalizeParamsShape,
  NORMALIZE_TOOL_NAME,
  NORMALIZE_TOOL_DESCRIPTION,
} from '../validators/normalize.js';
import {
  readTablesResource,
  tablesResourceDefinition,
  TABLES_RESOURCE_URI,
} from './resources/tables.js';
import { logger } from '../utils/logger.js';
import { VERSION } from '../version.js';

export const TOOL_NAMES = [CONVERT_TOOL_NAME, NORMALIZE_TOOL_NAME] as const;
export const RESOURCE_URIS = [TABLES_RESOURCE_URI] as const;

/**
 * Create and configure the MCP server.
 *
 * @param converter - Converter holding the server's configuration
 * @returns Configured McpServer instance
 */
export function createMCPServer(converter: DaijiConverter): McpServer {
  const server = new McpServer({
    name: 'Daiji Converter',
    version: VERSION,
  });

  registerTools(server, converter);
  registerResources(server, converter);

  logger.debug('MCP server configured', {
    tools: TOOL_NAMES,
    resources: RESOURCE_URIS,
  });

  return server;
}

/**
 * Tool annotations indicating behavior hints for clients.
 * Conversions are pure: no state is read or written.
 */
const TOOL_ANNOTATIONS = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: false,
} as const;

/**
 * Register all MCP tools.
 *
 * @param server - MCP server instance
 * @param converter - Converter shared by the tools
 */
function registerTools(server: McpServer, converter: DaijiConverter): void {
  server.tool(
    CONVERT_TOOL_NAME,
    CONVERT_TOOL_DESCRIPTION,
    convertParamsShape,
    TOOL_ANNOTATIONS,
    async (args) => executeConvert(args, converter)
  );

  server.tool(
    NORMALIZE_TOOL_NAME,
    NORMALIZE_TOOL_DESCRIPTION,
    normalizeParamsShape,
    TOOL_ANNOTATIONS,
    async (args) => executeNormalize(args)
  );
}

/**
 * Register all MCP resources.
 *
 * @param server - MCP server instance
 * @param converter - Converter whose tables are published
 */
function registerResources(server: McpServer, converter: DaijiConverter): void {
  server.resource(
    tablesResourceDefinition.name,
    tablesResourceDefinition.uri,
    {
      description: tablesResourceDefinition.description,
      mimeType: tablesResourceDefinition.mimeType,
    },
    async () => readTablesResource(converter)
  );
}
