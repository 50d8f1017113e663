/**
 * @fileoverview Shape of a declarative tool definition: schemas, annotations,
 * pure logic and an optional formatter for the text content blocks.
 * @module src/mcp-server/tools/utils/toolDefinition
 */
import type { RequestHandlerExtra } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type {
  ContentBlock,
  ServerNotification,
  ServerRequest,
  ToolAnnotations,
} from '@modelcontextprotocol/sdk/types.js';
import type { z, ZodObject, ZodRawShape } from 'zod';

import type { RequestContext } from '@/utils/index.js';

export type { ToolAnnotations };

/**
 * Per-call context handed to tool handlers by the MCP SDK.
 */
export type SdkContext = RequestHandlerExtra<ServerRequest, ServerNotification>;

export interface ToolDefinition<
  TInputSchema extends ZodObject<ZodRawShape>,
  TOutputSchema extends ZodObject<ZodRawShape>,
> {
  /** Programmatic name (snake_case). */
  name: string;
  /** Human-readable title shown by clients. */
  title?: string;
  /** Description the model uses to decide when to call the tool. */
  description: string;
  inputSchema: TInputSchema;
  outputSchema: TOutputSchema;
  annotations?: ToolAnnotations;
  /**
   * Business logic. Throws McpError on failure; the handler factory turns
   * thrown errors into `isError` results.
   */
  logic(
    input: z.infer<TInputSchema>,
    appContext: RequestContext,
    sdkContext: SdkContext,
  ): Promise<z.infer<TOutputSchema>>;
  /** Builds the content blocks; defaults to the result as JSON text. */
  responseFormatter?(result: z.infer<TOutputSchema>): ContentBlock[];
}
