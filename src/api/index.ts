/**
 * Gateway Admin API client module
 *
 * Provides:
 * - GatewayClient with upstreams, targets, services, routes sub-clients
 * - JSON logging with secret redaction
 * - Type definitions for Admin API entities
 */

// Main client
export { createClient, normalizeAdminUrl, DEFAULT_TIMEOUT_MS, LIST_PAGE_SIZE } from './client.js';

export type {
  GatewayClient,
  UpstreamsClient,
  TargetsClient,
  ServicesClient,
  RoutesClient,
} from './client.js';

// Errors
export { ApiRequestError, NOT_FOUND_STATUS, SERVER_ERROR_THRESHOLD } from './errors.js';
export type { TransportErrorCode } from './errors.js';

// Logger utilities
export {
  logger,
  createLogger,
  ApiLogger,
  parseLogLevel,
  redactString,
  redactPatterns,
  redactObject,
  redactHeaders,
} from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

// Types
export type * from './types.js';
