/**
 * @fileoverview Central error normalization. Converts arbitrary thrown values
 * into McpError instances and logs them with their request context.
 * @module src/utils/internal/errorHandler
 */
import { ZodError } from 'zod';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger } from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

export interface ErrorHandlerOptions {
  operation: string;
  context?: RequestContext;
  input?: unknown;
}

export class ErrorHandler {
  /**
   * Maps an unknown error onto an McpError. Existing McpErrors pass through,
   * zod failures become ValidationError and anything else InternalError.
   */
  public static toMcpError(error: unknown): McpError {
    if (error instanceof McpError) return error;

    if (error instanceof ZodError) {
      const issues = error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      );
      return new McpError(
        JsonRpcErrorCode.ValidationError,
        `Validation failed: ${issues.join('; ')}`,
        { issues },
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    return new McpError(JsonRpcErrorCode.InternalError, message, {
      originalErrorName: error instanceof Error ? error.name : typeof error,
    });
  }

  /**
   * Normalizes and logs an error, returning the McpError for the caller to
   * rethrow or report.
   */
  public static handleError(
    error: unknown,
    options: ErrorHandlerOptions,
  ): McpError {
    const mcpError = ErrorHandler.toMcpError(error);
    logger.error(
      `Error in ${options.operation}: ${mcpError.message}`,
      {
        ...options.context,
        operation: options.operation,
        errorCode: mcpError.code,
        errorData: mcpError.data,
        input: options.input,
      },
      error,
    );
    return mcpError;
  }
}
