/**
 * @fileoverview Request context creation. Every tool call gets a context with a
 * unique request id and timestamp that is threaded through services and logs.
 * @module src/utils/internal/requestContext
 */
import { randomUUID } from 'node:crypto';

/**
 * Per-request tracing context. Extra fields (operation, tool name, domain ids)
 * are spread into log lines alongside the id.
 */
export interface RequestContext {
  requestId: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface CreateRequestContextParams {
  operation: string;
  parentContext?: RequestContext;
  additionalContext?: Record<string, unknown>;
}

export const requestContextService = {
  createRequestContext(params: CreateRequestContextParams): RequestContext {
    const { operation, parentContext, additionalContext } = params;
    return {
      ...parentContext,
      ...additionalContext,
      requestId: parentContext?.requestId ?? randomUUID(),
      timestamp: new Date().toISOString(),
      operation,
    };
  },
};
