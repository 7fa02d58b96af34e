/**
 * HTTP error type for the gateway client
 */

import type { ApiError } from './types.js';

export const NOT_FOUND_STATUS = 404;
export const SERVER_ERROR_THRESHOLD = 500;

/**
 * Codes for failures that did not produce a usable HTTP response
 */
export type TransportErrorCode = 'TIMEOUT' | 'NETWORK_ERROR' | 'NON_JSON_RESPONSE' | 'INVALID_JSON';

/**
 * Error class for API errors with HTTP status
 */
export class ApiRequestError extends Error {
  public readonly status: number;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    status: number,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ApiRequestError';
    this.status = status;
    this.code = options?.code;
    this.details = options?.details;
  }

  /**
   * Convert to ApiError format
   */
  toApiError(): ApiError {
    return {
      status: this.status,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }

  isNotFound(): boolean {
    return this.status === NOT_FOUND_STATUS;
  }

  isServerError(): boolean {
    return this.status >= SERVER_ERROR_THRESHOLD;
  }

  /**
   * True when the request never got a response (timeout or network failure)
   */
  isTransportError(): boolean {
    return this.status === 0;
  }
}

/**
 * Wrap a fetch rejection into an ApiRequestError
 */
export function toTransportError(error: unknown, url: string, timeoutMs: number): ApiRequestError {
  if (error instanceof Error && error.name === 'AbortError') {
    return new ApiRequestError(`Request to ${url} timed out after ${timeoutMs}ms`, 0, {
      code: 'TIMEOUT',
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ApiRequestError(`Request to ${url} failed: ${message}`, 0, {
    code: 'NETWORK_ERROR',
    cause: error,
  });
}
