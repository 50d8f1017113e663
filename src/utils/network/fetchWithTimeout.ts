/**
 * @fileoverview fetch wrapper that aborts after a timeout and converts HTTP,
 * timeout and network failures into McpError. The timeout covers reading the
 * response body as well as receiving the headers.
 * @module src/utils/network/fetchWithTimeout
 */
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger } from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

/**
 * Standard RequestInit plus the timeout, the body reader and optional logging
 * context.
 */
export interface FetchWithTimeoutOptions<T> extends Omit<RequestInit, 'signal'> {
  timeout: number;
  /** Reads the body of a 2xx response; runs before the timer is cleared. */
  parse: (response: Response) => Promise<T>;
  context?: RequestContext;
}

/**
 * Fetches a resource and reads its body, aborting after `options.timeout`
 * milliseconds.
 *
 * @returns Whatever `options.parse` produces for a 2xx response.
 * @throws {McpError} `Timeout` when aborted, `NotFound` for 404,
 *   `ServiceUnavailable` for other HTTP statuses and network errors. Errors
 *   thrown by `parse` itself propagate unchanged.
 */
export async function fetchWithTimeout<T>(
  url: string | URL,
  options: FetchWithTimeoutOptions<T>,
): Promise<T> {
  const { timeout, parse, context, ...init } = options;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  const urlString = url.toString();
  const operationDescription = `fetch ${init.method ?? 'GET'} ${urlString}`;

  logger.debug(`Attempting ${operationDescription} with ${timeout}ms timeout.`, {
    ...context,
  });

  async function send(): Promise<Response> {
    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (
        controller.signal.aborted ||
        (error instanceof Error && error.name === 'AbortError')
      ) {
        throw timeoutError();
      }

      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.warning(`Network error during ${operationDescription}: ${errorMessage}`, {
        ...context,
        errorSource: 'FetchNetworkError',
      });
      throw new McpError(
        JsonRpcErrorCode.ServiceUnavailable,
        `Network error during ${operationDescription}: ${errorMessage}`,
        {
          requestId: context?.requestId,
          url: urlString,
          originalErrorName: error instanceof Error ? error.name : 'UnknownError',
          errorSource: 'FetchNetworkError',
        },
      );
    }
  }

  function timeoutError(): McpError {
    logger.warning(`${operationDescription} timed out after ${timeout}ms.`, {
      ...context,
      errorSource: 'FetchTimeout',
    });
    return new McpError(
      JsonRpcErrorCode.Timeout,
      `${operationDescription} timed out.`,
      { requestId: context?.requestId, url: urlString, errorSource: 'FetchTimeout' },
    );
  }

  try {
    const response = await send();
    if (!response.ok) {
      logger.warning(`Fetch failed for ${urlString} with status ${response.status}.`, {
        ...context,
        errorSource: 'FetchHttpError',
        statusCode: response.status,
      });
      throw new McpError(
        response.status === 404
          ? JsonRpcErrorCode.NotFound
          : JsonRpcErrorCode.ServiceUnavailable,
        `HTTP error! Status: ${response.status} ${response.statusText}`,
        {
          requestId: context?.requestId,
          url: urlString,
          errorSource: 'FetchHttpError',
          statusCode: response.status,
          statusText: response.statusText,
        },
      );
    }

    let result: T;
    try {
      result = await parse(response);
    } catch (error) {
      if (controller.signal.aborted) throw timeoutError();
      throw error;
    }

    logger.debug(`Successfully fetched ${urlString}. Status: ${response.status}`, {
      ...context,
    });
    return result;
  } finally {
    clearTimeout(timeoutId);
  }
}
