/**
 * @fileoverview Classifies errors raised while processing a single identifier.
 * @module src/services/structure-finder/core/failures
 */
import { ZodError } from 'zod';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import type { FailureKind, ItemFailure, PdbId } from '../types.js';

/**
 * Raised when a response parses but lacks a value the record needs.
 */
export class MalformedEntryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedEntryError';
  }
}

const TRANSIENT_KINDS: ReadonlySet<FailureKind> = new Set<FailureKind>([
  'timeout',
  'network_error',
  'http_error',
]);

/**
 * Failures that may succeed on a later attempt. A report containing one is
 * not cached.
 */
export function isTransientFailure(failure: ItemFailure): boolean {
  return TRANSIENT_KINDS.has(failure.kind);
}

function classify(error: unknown): FailureKind {
  if (error instanceof ZodError || error instanceof SyntaxError) {
    return 'malformed_response';
  }
  if (error instanceof MalformedEntryError) return 'malformed_response';
  if (error instanceof McpError) {
    switch (error.code) {
      case JsonRpcErrorCode.Timeout:
        return 'timeout';
      case JsonRpcErrorCode.NotFound:
        return 'not_found';
      default:
        return error.data?.['errorSource'] === 'FetchHttpError'
          ? 'http_error'
          : 'network_error';
    }
  }
  return 'network_error';
}

export function toItemFailure(pdbId: PdbId, error: unknown): ItemFailure {
  return {
    pdbId,
    kind: classify(error),
    message: error instanceof Error ? error.message : String(error),
  };
}
