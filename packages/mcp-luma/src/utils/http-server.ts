/**
 * Streamable-HTTP transport for the MCP server.
 *
 * One McpServer and transport pair per session, keyed by the `mcp-session-id` header.
 */

import express, { type Request, type Response } from 'express';
import type { Logger } from 'pino';
import type { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

/**
 * Extracts MCP session ID from HTTP request headers
 *
 * Supports both lowercase and capitalized header names for compatibility.
 */
export function getSessionId(headers: Request['headers']): string | undefined {
  const header = headers['mcp-session-id'] || headers['Mcp-Session-Id'];
  return typeof header === 'string' ? header : undefined;
}

export function sendErrorResponse(
  res: Response,
  status: number,
  code: number,
  message: string,
  id: unknown = null,
): void {
  if (res.headersSent || res.destroyed) return;
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code, message },
    id,
  });
}

function requestIdOf(body: unknown): unknown {
  return typeof body === 'object' && body !== null && 'id' in body ? body.id : null;
}

function isInitializeRequest(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'method' in body && body.method === 'initialize';
}

function isConnectionClosed(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return ['aborted', 'closed', 'terminated', 'ECONNRESET', 'EPIPE'].some((marker) => message.includes(marker));
}

export interface HttpServerConfig {
  serverName: string;
  version: string;
  transports: Map<string, StreamableHTTPServerTransport>;
  /** Creates a connected-ready server and transport for a new session. */
  createSession: () => {
    server: { connect: (transport: StreamableHTTPServerTransport) => Promise<void> };
    transport: StreamableHTTPServerTransport;
  };
  logger: Logger;
}

/**
 * Sets up:
 * - GET /health - Health check endpoint
 * - GET /mcp - SSE stream for an existing session
 * - DELETE /mcp - Session termination endpoint
 * - POST /mcp - Main MCP endpoint; `initialize` without a session opens one
 */
export function setupMcpEndpoints(app: express.Application, config: HttpServerConfig): void {
  const { serverName, version, transports, createSession, logger } = config;

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      server: serverName,
      version,
      activeSessions: transports.size,
    });
  });

  app.get('/mcp', async (req: Request, res: Response) => {
    const sessionId = getSessionId(req.headers);
    if (!sessionId) {
      sendErrorResponse(res, 400, -32000, 'Bad Request: No session ID provided');
      return;
    }

    const transport = transports.get(sessionId);
    if (!transport) {
      sendErrorResponse(res, 404, -32000, 'Session not found');
      return;
    }

    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      if (isConnectionClosed(error) || res.destroyed) {
        logger.debug({ sessionId, error: String(error) }, 'SSE stream connection closed');
        return;
      }
      logger.error({ sessionId, error: error instanceof Error ? error.message : String(error) }, 'Error handling SSE stream request');
      sendErrorResponse(res, 500, -32603, 'Internal server error');
    }
  });

  app.delete('/mcp', async (req: Request, res: Response) => {
    const sessionId = getSessionId(req.headers);
    if (!sessionId) {
      sendErrorResponse(res, 400, -32000, 'Bad Request: No session ID provided');
      return;
    }

    const transport = transports.get(sessionId);
    if (!transport) {
      sendErrorResponse(res, 404, -32000, 'Session not found');
      return;
    }

    try {
      await transport.handleRequest(req, res, req.body);
      logger.info({ sessionId, totalSessions: transports.size - 1 }, 'Session deleted');
    } catch (error) {
      logger.error(
        { error: error instanceof Error ? error.message : String(error), sessionId },
        'Error handling session termination',
      );
      sendErrorResponse(res, 500, -32603, 'Error handling session termination');
    } finally {
      transports.delete(sessionId);
    }
  });

  app.post('/mcp', async (req: Request, res: Response) => {
    const requestId = requestIdOf(req.body);
    try {
      const sessionId = getSessionId(req.headers);

      if (sessionId) {
        const transport = transports.get(sessionId);
        if (!transport) {
          sendErrorResponse(res, 404, -32000, 'Session not found', requestId);
          return;
        }
        await transport.handleRequest(req, res, req.body);
        return;
      }

      if (!isInitializeRequest(req.body)) {
        sendErrorResponse(res, 400, -32000, 'Bad Request: No session ID provided', requestId);
        return;
      }

      const { server, transport } = createSession();
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      if (isConnectionClosed(error)) {
        logger.warn({ requestId, error: String(error) }, 'Client connection closed during request');
        return;
      }
      logger.error({ error: error instanceof Error ? error.message : String(error), requestId }, 'Error handling MCP request');
      sendErrorResponse(res, 500, -32603, 'Internal server error', requestId);
    }
  });
}

export function createHttpApp(config: HttpServerConfig): express.Application {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));
  setupMcpEndpoints(app, config);
  return app;
}

/**
 * Closes every open session transport and the HTTP listener on SIGTERM/SIGINT.
 */
export function setupGracefulShutdown(
  server: ReturnType<express.Application['listen']>,
  transports: Map<string, StreamableHTTPServerTransport>,
  logger: Logger,
): void {
  const shutdown = async () => {
    logger.info('Shutting down...');
    for (const [sessionId, transport] of transports.entries()) {
      try {
        await transport.close();
      } catch (error) {
        logger.error(
          { error: error instanceof Error ? error.message : String(error), sessionId },
          'Error closing transport',
        );
      }
    }
    transports.clear();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}
