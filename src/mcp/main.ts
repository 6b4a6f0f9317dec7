#!/usr/bin/env node
/**
 * Stdio entry point for MCP clients.
 */
import { startServer } from './server.js';
import { logger } from '../utils/logger.js';

startServer().catch((err: unknown) => {
  logger.error('MCP server failed to start', err instanceof Error ? err : undefined);
  process.exit(1);
});
