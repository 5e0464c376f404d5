/**
 * Hono application serving the MCP Streamable HTTP endpoint.
 *
 * Each MCP session gets its own transport and server instance; all of
 * them share one read-only converter.
 */

import { Hono } from 'hono';
import type { HttpBindings } from '@hono/node-server';
import { RESPONSE_ALREADY_SENT } from '@hono/node-server/utils/response';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { randomUUID } from 'node:crypto';
import type { DaijiConverter } from './daiji/converter.js';
import { createMCPServer, RESOURCE_URIS, TOOL_NAMES } from './mcp/server.js';
import { logger } from './utils/logger.js';
import { VERSION } from './version.js';

/**
 * Open MCP sessions keyed by session id.
 */
export type SessionStore = Map<string, StreamableHTTPServerTransport>;

function jsonRpcError(code: number, message: string, id: unknown = null) {
  return {
    jsonrpc: '2.0' as const,
    error: { code, message },
    id,
  };
}

/**
 * Build the HTTP application.
 *
 * @param converter - Converter used by every session
 * @param sessions - Session store (exposed so shutdown can close them)
 */
export function createApp(
  converter: DaijiConverter,
  sessions: SessionStore = new Map()
): Hono<{ Bindings: HttpBindings }> {
  const app = new Hono<{ Bindings: HttpBindings }>();

  /**
   * Health check endpoint.
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: VERSION,
    });
  });

  /**
   * Root endpoint with server info.
   */
  app.get('/', (c) => {
    return c.json({
      name: 'Daiji Converter MCP Server',
      version: VERSION,
      description:
        'MCP server converting numbers to formal Japanese daiji numerals ' +
        '(12345 → 壱万弐千参百四拾五) for contracts, receipts and certificates.',
      endpoints: {
        mcp: '/mcp',
        health: '/health',
      },
      tools: TOOL_NAMES,
      resources: RESOURCE_URIS,
    });
  });

  /**
   * MCP endpoint - handles POST requests for MCP protocol.
   */
  app.post('/mcp', async (c) => {
    const sessionId = c.req.header('mcp-session-id');
    let requestId: unknown = null;

    try {
      const body: unknown = await c.req.json();
      if (body && typeof body === 'object' && 'id' in body) {
        requestId = body.id;
      }

      let transport = sessionId ? sessions.get(sessionId) : undefined;

      if (transport) {
        logger.debug('Reusing session', { sessionId });
      } else if (!sessionId && isInitializeRequest(body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (id) => {
            sessions.set(id, created);
            logger.info('Session initialized', { sessionId: id });
          },
        });

        // Set onclose before connect() so an early close is not missed
        created.onclose = () => {
          if (created.sessionId) {
            sessions.delete(created.sessionId);
            logger.info('Session closed', { sessionId: created.sessionId });
          }
        };

        await createMCPServer(converter).connect(created);
        transport = created;
      } else {
        return c.json(
          jsonRpcError(
            -32000,
            'Invalid session. Send an initialize request without mcp-session-id to start.'
          ),
          400
        );
      }

      await transport.handleRequest(c.env.incoming, c.env.outgoing, body);
      return RESPONSE_ALREADY_SENT;
    } catch (error) {
      logger.error('MCP request error', {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
        sessionId,
      });

      return c.json(jsonRpcError(-32603, 'Internal server error', requestId), 500);
    }
  });

  /**
   * MCP endpoint - handles GET requests for SSE streams.
   */
  app.get('/mcp', async (c) => {
    const sessionId = c.req.header('mcp-session-id');
    const transport = sessionId ? sessions.get(sessionId) : undefined;

    if (!transport) {
      return c.json(jsonRpcError(-32000, 'Invalid or missing session ID'), 400);
    }

    try {
      await transport.handleRequest(c.env.incoming, c.env.outgoing);
      return RESPONSE_ALREADY_SENT;
    } catch (error) {
      logger.error('MCP GET error', {
        error: error instanceof Error ? error.message : String(error),
        sessionId,
      });
      return c.json({ error: 'Internal server error' }, 500);
    }
  });

  /**
   * MCP endpoint - handles DELETE requests to close sessions.
   */
  app.delete('/mcp', async (c) => {
    const sessionId = c.req.header('mcp-session-id');
    const transport = sessionId ? sessions.get(sessionId) : undefined;

    if (!sessionId || !transport) {
      return c.json(jsonRpcError(-32000, 'Invalid or missing session ID'), 400);
    }

    try {
      await transport.close();
      sessions.delete(sessionId);
      logger.info('Session deleted', { sessionId });
      return c.json({ success: true });
    } catch (error) {
      logger.error('Session close error', {
        error: error instanceof Error ? error.message : String(error),
        sessionId,
      });
      return c.json({ error: 'Failed to close session' }, 500);
    }
  });

  return app;
}
