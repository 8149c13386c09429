#!/usr/bin/env node

// MCP servers must only output JSON-RPC messages to stdout; logs go to stderr.

import { loadConfig, type ServerConfig } from './config.js';
import { TrendingServer } from './server.js';
import { logger } from './util/logger.js';

let config: ServerConfig;
try {
  config = loadConfig();
} catch (error) {
  logger.error('Server failed to start:', error);
  process.exit(1);
}

logger.debug('[Config] Configuration loaded:', config);

const server = new TrendingServer(config);
server.run().catch((err) => {
  logger.error('Server failed to start:', err);
  process.exit(1);
});

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down...`);
  try {
    await server.close();
  } catch (error) {
    logger.warn('Error while closing server:', error);
  }
  process.exit(0);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
