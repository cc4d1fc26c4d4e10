#!/usr/bin/env node

/**
 * Vikunja MCP Server
 *
 * Vikunja task queries and the X-Q handoff queue exposed as an MCP server.
 */

import type { Server as HttpServer } from 'http';
import { VikunjaClient } from './api/client.js';
import { ConfigInstanceResolver, loadServerConfig } from './config/index.js';
import { HandoffQueue, PowerQueryService } from './services/index.js';
import { createMcpServer } from './server/mcp-server.js';
import { startStdioServer } from './server/stdio.js';
import { startStreamableHttpServer } from './server/streamable-http.js';
import type { RemoteClientFactory } from './types/index.js';
import { errorMessage, logger } from './utils/index.js';

let httpServer: HttpServer | null = null;

/**
 * Main entry point for Vikunja MCP Server
 */
async function main(): Promise<void> {
  const config = loadServerConfig(process.env);

  const resolver = new ConfigInstanceResolver();
  const clientFactory: RemoteClientFactory = (instance) =>
    new VikunjaClient(instance, { timeoutMs: config.requestTimeoutMs });

  // Print startup banner
  logger.info('='.repeat(50));
  logger.info('Vikunja MCP Server');
  logger.info('='.repeat(50));
  logger.info(`Mode: ${config.mode}`);
  logger.info(`Log Level: ${config.logLevel}`);
  logger.info(`X-Q Session: ${config.sessionId}`);
  if (config.mode !== 'stdio') {
    logger.info(`Host: ${config.host}`);
    logger.info(`Port: ${config.port}`);
  }
  logger.info('='.repeat(50));

  const instances = resolver.listInstances();
  if (instances.length === 0) {
    logger.warn('No Vikunja instances configured; tools will report NotConfigured');
  } else {
    logger.info(`Instances: ${instances.join(', ')}`);
  }

  const queue = new HandoffQueue({ resolver, clientFactory, sessionId: config.sessionId });
  const queries = new PowerQueryService(resolver, clientFactory);

  if (config.mode === 'stdio' || config.mode === 'both') {
    await startStdioServer(createMcpServer(queue, queries), queue.sessionId);
  }

  if (config.mode === 'http' || config.mode === 'both') {
    httpServer = await startStreamableHttpServer(queue, queries, {
      port: config.port,
      host: config.host,
    });
  }

  logger.info('Server ready');
}

/**
 * Handle graceful shutdown
 */
function setupShutdownHandlers(): void {
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    if (httpServer) {
      httpServer.close();
    }
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: errorMessage(reason) });
  process.exit(1);
});

setupShutdownHandlers();

main().catch((error: unknown) => {
  logger.error('Failed to start server', { error: errorMessage(error) });
  process.exit(1);
});
