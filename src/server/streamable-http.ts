/**
 * Streamable HTTP transport for MCP server
 * Stateless: every POST to /mcp gets its own transport and MCP Server instance
 */

import type { Server as HttpServer } from 'http';
import express from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { HandoffQueue, PowerQueryService } from '../services/index.js';
import { errorMessage, logger } from '../utils/index.js';
import { createMcpServer } from './mcp-server.js';

/**
 * Configuration options for Streamable HTTP server
 */
export interface StreamableHttpServerOptions {
  port: number;
  host: string;
}

function createStreamableHttpApp(
  queue: HandoffQueue,
  queries: PowerQueryService
): express.Express {
  const app = express();

  app.use(express.json());

  // CORS support
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Mcp-Session-Id');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      transport: 'streamable-http',
      session: queue.sessionId,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.post('/mcp', async (req, res) => {
    const startTime = Date.now();
    const server = createMcpServer(queue, queries);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    res.on('close', () => {
      transport.close().catch((error: unknown) => {
        logger.warn('Error closing transport', { error: errorMessage(error) });
      });
      server.close().catch((error: unknown) => {
        logger.warn('Error closing MCP server', { error: errorMessage(error) });
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);

      logger.debug('MCP request completed', {
        duration: `${Date.now() - startTime}ms`,
        statusCode: res.statusCode,
      });
    } catch (error) {
      logger.error('MCP request failed', {
        duration: `${Date.now() - startTime}ms`,
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });

      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    }
  });

  // Stateless mode has no streams to resume or sessions to end
  app.all('/mcp', (_req, res) => {
    res.status(405).json({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null,
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(
    (err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
      logger.error('Server error', {
        error: err.message,
        stack: err.stack,
        path: req.path,
        method: req.method,
      });
      res.status(500).json({ error: 'Internal server error' });
    }
  );

  return app;
}

/**
 * Start the MCP server with Streamable HTTP transport
 */
export function startStreamableHttpServer(
  queue: HandoffQueue,
  queries: PowerQueryService,
  options: StreamableHttpServerOptions
): Promise<HttpServer> {
  const app = createStreamableHttpApp(queue, queries);

  return new Promise((resolve, reject) => {
    const httpServer = app.listen(options.port, options.host, () => {
      const address = httpServer.address();
      const port = address !== null && typeof address === 'object' ? address.port : options.port;
      logger.info('Vikunja MCP server running on Streamable HTTP');
      logger.info(`URL: http://${options.host}:${port}/mcp`);
      logger.info(`Health: http://${options.host}:${port}/health`);
      logger.info(`X-Q session: ${queue.sessionId}`);
      resolve(httpServer);
    });

    httpServer.on('error', reject);

    httpServer.timeout = 120000;
    httpServer.keepAliveTimeout = 65000;
    httpServer.headersTimeout = 66000;
  });
}
