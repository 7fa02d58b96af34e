/**
 * Admin API types for the gateway client
 *
 * Entities mirror the JSON the Admin API returns. Collection fields are
 * nullable because the API reports unset lists as null.
 */

// =============================================================================
// Common Types
// =============================================================================

/**
 * Standard API error response
 */
export interface ApiError {
  /** HTTP status code (0 when no response was received) */
  status: number;
  /** Error message from API */
  message: string;
  /** Error code for programmatic handling */
  code?: string;
  /** Additional error details */
  details?: Record<string, unknown>;
}

export type HttpMethod = 'GET' | 'POST' | 'PATCH';

/**
 * Paginated list envelope used by every list endpoint
 */
export interface ListResponse<T> {
  data: T[];
  /** Cursor for the next page, absent on the last page */
  offset?: string | null;
  next?: string | null;
}

/**
 * Foreign key reference as returned and accepted by the Admin API
 */
export interface EntityRef {
  id?: string;
  name?: string;
}

// =============================================================================
// Upstream & Target Types
// =============================================================================

export interface Upstream {
  id: string;
  name: string;
  tags?: string[] | null;
  created_at?: number;
}

export interface CreateUpstreamRequest {
  name: string;
  tags?: string[];
}

export interface Target {
  id?: string;
  /** host:port */
  target: string;
  weight?: number;
  upstream?: EntityRef | null;
}

export interface CreateTargetRequest {
  target: string;
  weight: number;
}

// =============================================================================
// Service Types
// =============================================================================

export interface Service {
  id: string;
  /** Services created without a name report null */
  name?: string | null;
  protocol?: string;
  host?: string;
  port?: number;
  path?: string | null;
  retries?: number;
  connect_timeout?: number;
  read_timeout?: number;
  write_timeout?: number;
  tags?: string[] | null;
}

/**
 * Retry and timeout settings shared by create and update payloads
 */
export interface ServiceExtras {
  retries?: number;
  connect_timeout?: number;
  read_timeout?: number;
  write_timeout?: number;
}

export interface CreateServiceRequest extends ServiceExtras {
  name: string;
  /** Shorthand for protocol/host/port/path; mutually exclusive with them */
  url?: string;
  protocol?: string;
  host?: string;
  port?: number;
  path?: string;
}

export type UpdateServiceRequest = Omit<CreateServiceRequest, 'name'>;

// =============================================================================
// Route Types
// =============================================================================

export type PathHandling = 'v0' | 'v1';

export interface Route {
  id: string;
  /** Routes created without a name report null */
  name?: string | null;
  hosts?: string[] | null;
  paths?: string[] | null;
  methods?: string[] | null;
  protocols?: string[] | null;
  snis?: string[] | null;
  tags?: string[] | null;
  headers?: Record<string, string[]> | null;
  strip_path?: boolean;
  preserve_host?: boolean;
  path_handling?: string;
  regex_priority?: number;
  https_redirect_status_code?: number;
  request_buffering?: boolean;
  response_buffering?: boolean;
  service?: EntityRef | null;
}

/**
 * Mutable route fields; every field is optional so a payload carries only
 * what was declared (create) or what changed (update)
 */
export interface RouteFieldsPayload {
  hosts?: string[];
  paths?: string[];
  methods?: string[];
  protocols?: string[];
  snis?: string[];
  tags?: string[];
  headers?: Record<string, string[]>;
  strip_path?: boolean;
  preserve_host?: boolean;
  path_handling?: PathHandling;
  regex_priority?: number;
  https_redirect_status_code?: number;
  request_buffering?: boolean;
  response_buffering?: boolean;
}

export interface CreateRouteRequest extends RouteFieldsPayload {
  name: string;
  service: { id: string };
}

export interface UpdateRouteRequest extends RouteFieldsPayload {
  service?: { id: string };
}

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Gateway client configuration
 */
export interface GatewayClientConfig {
  /** Admin API base URL; http:// is assumed when the scheme is missing */
  adminUrl: string;
  /** Admin token, sent as Kong-Admin-Token and as a bearer token */
  token?: string;
  /** Workspace prefix for every path */
  workspace?: string;
  /** Per-request timeout in milliseconds (default: 15000) */
  timeout?: number;
  /** Log requests and responses at debug level */
  debug?: boolean;
  /** Appended to the User-Agent header */
  userAgent?: string;
}

/**
 * Outcome of probing the Admin API
 */
export interface PingResult {
  ok: boolean;
  /** URL of the probe that decided the outcome */
  endpoint: string;
  status?: number;
  /** Gateway version, when the root endpoint reported one */
  version?: string;
  /** Why the probe failed */
  reason?: string;
}
