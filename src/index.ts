#!/usr/bin/env node
/**
 * @fileoverview Entry point: composes the container and starts the MCP server
 * on stdio, shutting it down cleanly on SIGINT/SIGTERM.
 * @module src/index
 */
import 'reflect-metadata';

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { composeContainer } from '@/container/index.js';
import { startStdioServer } from '@/mcp-server/server.js';
import { ErrorHandler, logger } from '@/utils/index.js';

let server: McpServer | undefined;

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down`, { signal });
  try {
    await server?.close();
    process.exit(0);
  } catch (error) {
    ErrorHandler.handleError(error, { operation: 'shutdown' });
    process.exit(1);
  }
}

async function start(): Promise<void> {
  composeContainer();
  server = await startStdioServer();

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

start().catch((error: unknown) => {
  const mcpError = ErrorHandler.handleError(error, { operation: 'startup' });
  logger.crit('Server failed to start', { errorCode: mcpError.code }, error);
  process.exit(1);
});
