/**
 * @fileoverview Creates the MCP server instance and connects it to the stdio
 * transport.
 * @module src/mcp-server/server
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { config } from '@/config/index.js';
import { logger, requestContextService } from '@/utils/index.js';
import { registerTools } from './tools/tool-registration.js';

export function createMcpServerInstance(): McpServer {
  const context = requestContextService.createRequestContext({
    operation: 'createMcpServerInstance',
  });

  const server = new McpServer(
    { name: config.mcpServerName, version: config.mcpServerVersion },
    { capabilities: { tools: { listChanged: false }, logging: {} } },
  );

  registerTools(server, context);
  return server;
}

export async function startStdioServer(): Promise<McpServer> {
  const server = createMcpServerInstance();
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.notice('MCP server listening on stdio', {
    name: config.mcpServerName,
    version: config.mcpServerVersion,
  });
  return server;
}
