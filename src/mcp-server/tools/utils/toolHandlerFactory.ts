/**
 * @fileoverview Wraps tool logic into an MCP SDK tool callback: creates the
 * request context, validates input, formats the result and converts thrown
 * errors into `isError` results.
 * @module src/mcp-server/tools/utils/toolHandlerFactory
 */
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ZodObject, ZodRawShape } from 'zod';

import {
  ErrorHandler,
  logger,
  requestContextService,
} from '@/utils/index.js';
import type { SdkContext, ToolDefinition } from './toolDefinition.js';

export function createMcpToolHandler<
  TInputSchema extends ZodObject<ZodRawShape>,
  TOutputSchema extends ZodObject<ZodRawShape>,
>(tool: ToolDefinition<TInputSchema, TOutputSchema>) {
  return async (
    args: Record<string, unknown>,
    sdkContext: SdkContext,
  ): Promise<CallToolResult> => {
    const appContext = requestContextService.createRequestContext({
      operation: 'HandleToolRequest',
      additionalContext: {
        toolName: tool.name,
        sessionId: sdkContext.sessionId,
      },
    });

    try {
      const input = await tool.inputSchema.parseAsync(args);
      const result = await tool.logic(input, appContext, sdkContext);
      const structuredContent: Record<string, unknown> = result;

      return {
        structuredContent,
        content: tool.responseFormatter
          ? tool.responseFormatter(result)
          : [{ type: 'text', text: JSON.stringify(result, null, 2) }],
      };
    } catch (error) {
      const mcpError = ErrorHandler.handleError(error, {
        operation: `tool:${tool.name}`,
        context: appContext,
        input: args,
      });
      logger.debug('Returning tool error result', {
        ...appContext,
        errorCode: mcpError.code,
      });

      return {
        isError: true,
        content: [{ type: 'text', text: `Error: ${mcpError.message}` }],
        structuredContent: {
          code: mcpError.code,
          message: mcpError.message,
          data: mcpError.data,
        },
      };
    }
  };
}
