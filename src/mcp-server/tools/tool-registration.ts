/**
 * @fileoverview Registers every tool definition with an McpServer instance.
 * @module src/mcp-server/tools/tool-registration
 */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ZodObject, ZodRawShape } from 'zod';

import { logger, type RequestContext } from '@/utils/index.js';
import { allToolDefinitions } from './definitions/index.js';
import type { ToolDefinition } from './utils/toolDefinition.js';
import { createMcpToolHandler } from './utils/toolHandlerFactory.js';

function registerTool<
  TInputSchema extends ZodObject<ZodRawShape>,
  TOutputSchema extends ZodObject<ZodRawShape>,
>(server: McpServer, tool: ToolDefinition<TInputSchema, TOutputSchema>): void {
  const inputShape: ZodRawShape = tool.inputSchema.shape;
  const outputShape: ZodRawShape = tool.outputSchema.shape;

  server.registerTool(
    tool.name,
    {
      title: tool.title,
      description: tool.description,
      inputSchema: inputShape,
      outputSchema: outputShape,
      annotations: tool.annotations,
    },
    createMcpToolHandler(tool),
  );
}

export function registerTools(server: McpServer, context: RequestContext): void {
  for (const tool of allToolDefinitions) {
    registerTool(server, tool);
    logger.debug(`Registered tool: ${tool.name}`, { ...context });
  }
  logger.info(`Registered ${allToolDefinitions.length} tools`, { ...context });
}
