/**
 * Stdio transport for MCP server
 * The transport assistant hosts spawn locally
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { logger } from '../utils/index.js';

/**
 * Start the MCP server with stdio transport
 */
export async function startStdioServer(server: Server, sessionId: string): Promise<void> {
  const transport = new StdioServerTransport();

  await server.connect(transport);

  // stdout is reserved for the MCP protocol; the logger writes to stderr
  logger.info('Vikunja MCP server running on stdio');
  logger.info(`X-Q session: ${sessionId}`);
}
