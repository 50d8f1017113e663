/**
 * @fileoverview Shared error types: JSON-RPC error codes and the McpError class
 * thrown across services, providers and tool handlers.
 * @module src/types-global/errors
 */

/**
 * JSON-RPC 2.0 error codes, standard and server-defined.
 */
export enum JsonRpcErrorCode {
  InvalidParams = -32602,
  InternalError = -32603,
  ServiceUnavailable = -32000,
  NotFound = -32001,
  Timeout = -32004,
  ValidationError = -32007,
  ConfigurationError = -32008,
}

/**
 * Error carrying a JSON-RPC code and structured data for logging and for the
 * tool error payload.
 */
export class McpError extends Error {
  public readonly code: JsonRpcErrorCode;
  public readonly data?: Record<string, unknown>;

  constructor(
    code: JsonRpcErrorCode,
    message: string,
    data?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'McpError';
    this.code = code;
    this.data = data;
    Object.setPrototypeOf(this, McpError.prototype);
  }
}
