/**
 * Daiji Converter MCP Server - HTTP Entry Point
 *
 * Serves daiji conversion tools over the MCP Streamable HTTP transport.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp, type SessionStore } from './app.js';
import { loadConfig, type AppConfig } from './config.js';
import { DaijiConverter } from './daiji/converter.js';
import { logger } from './utils/logger.js';

const sessions: SessionStore = new Map();

/**
 * Validate environment on startup.
 */
function validateEnvironment(): { config: AppConfig; converter: DaijiConverter } {
  try {
    const config = loadConfig();
    const converter = new DaijiConverter(config.converter);
    logger.info('Configuration loaded', {
      port: config.port,
      appendOneBeforeSmallUnits: config.converter.appendOneBeforeSmallUnits,
      overflowPolicy: config.converter.overflowPolicy,
      customLargeUnits: config.converter.largeUnitNames !== undefined,
    });
    return { config, converter };
  } catch (error) {
    logger.error('Environment validation failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

/**
 * Graceful shutdown handler.
 */
async function handleShutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down gracefully`);

  const closePromises: Promise<void>[] = [];
  for (const [sessionId, transport] of sessions) {
    closePromises.push(
      Promise.resolve(transport.close())
        .then(() => {
          logger.debug('Closed session on shutdown', { sessionId });
        })
        .catch((err) => {
          logger.debug('Error closing session on shutdown', {
            sessionId,
            error: err instanceof Error ? err.message : String(err),
          });
        })
    );
  }

  await Promise.allSettled(closePromises);
  sessions.clear();
  process.exit(0);
}

process.on('SIGTERM', () => void handleShutdown('SIGTERM'));
process.on('SIGINT', () => void handleShutdown('SIGINT'));

const { config, converter } = validateEnvironment();
const app = createApp(converter, sessions);

serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    logger.info(`Daiji MCP server listening on port ${info.port}`);
    logger.info(`Health check: http://localhost:${info.port}/health`);
    logger.info(`MCP endpoint: http://localhost:${info.port}/mcp`);
  }
);
