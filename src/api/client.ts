/**
 * Gateway Admin API Client
 *
 * Provides a typed interface to the Admin API with:
 * - Per-request timeout (no automatic retry)
 * - JSON logging with secret redaction
 * - Workspace scoping via path prefix
 * - Name-keyed lookups where 404 means "absent"
 */

import type {
  Upstream,
  CreateUpstreamRequest,
  Target,
  CreateTargetRequest,
  Service,
  CreateServiceRequest,
  UpdateServiceRequest,
  Route,
  CreateRouteRequest,
  UpdateRouteRequest,
  GatewayClientConfig,
  HttpMethod,
  ListResponse,
  PingResult,
} from './types.js';
import { ApiRequestError, toTransportError } from './errors.js';
import { createLogger, logger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Upstreams sub-client
 */
export interface UpstreamsClient {
  get(name: string): Promise<Upstream | undefined>;
  list(): Promise<Upstream[]>;
  create(request: CreateUpstreamRequest): Promise<Upstream>;
}

/**
 * Targets sub-client; targets are always addressed through their upstream
 */
export interface TargetsClient {
  list(upstream: string): Promise<Target[]>;
  /** Re-adding an existing address replaces its weight */
  add(upstream: string, request: CreateTargetRequest): Promise<Target>;
}

/**
 * Services sub-client
 */
export interface ServicesClient {
  get(name: string): Promise<Service | undefined>;
  list(): Promise<Service[]>;
  create(request: CreateServiceRequest): Promise<Service>;
  update(name: string, request: UpdateServiceRequest): Promise<Service>;
}

/**
 * Routes sub-client
 */
export interface RoutesClient {
  get(name: string): Promise<Route | undefined>;
  list(): Promise<Route[]>;
  create(request: CreateRouteRequest): Promise<Route>;
  update(name: string, request: UpdateRouteRequest): Promise<Route>;
}

/**
 * Main gateway client interface
 */
export interface GatewayClient {
  upstreams: UpstreamsClient;
  targets: TargetsClient;
  services: ServicesClient;
  routes: RoutesClient;
  /** Probe the Admin API; never throws */
  ping(): Promise<PingResult>;
  /** Get current client configuration */
  getConfig(): { adminUrl: string; workspace?: string; timeout: number };
}

type QueryParams = Record<string, string | number | boolean | undefined>;

interface RequestOptions {
  params?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_TIMEOUT_MS = 15000;
export const LIST_PAGE_SIZE = 1000;

const GATEWAY_HEADERS = ['server', 'via', 'x-kong-admin-latency'];

// =============================================================================
// URL helpers
// =============================================================================

/**
 * Add http:// when the scheme is missing and trim trailing slashes
 */
export function normalizeAdminUrl(adminUrl: string): string {
  let url = adminUrl.trim();
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(url)) {
    url = `http://${url}`;
  }
  return url.replace(/\/+$/, '');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Rejects with an AbortError once the signal fires
 */
function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    const fail = (): void => {
      const error = new Error('This operation was aborted');
      error.name = 'AbortError';
      reject(error);
    };
    if (signal.aborted) {
      fail();
    } else {
      signal.addEventListener('abort', fail, { once: true });
    }
  });
}

function looksLikeHtml(text: string): boolean {
  const head = text.trimStart().slice(0, 15).toLowerCase();
  return head.startsWith('<!doctype') || head.startsWith('<html');
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create a gateway Admin API client
 *
 * @param config - Client configuration options
 * @returns Configured gateway client
 */
export function createClient(config: GatewayClientConfig): GatewayClient {
  const baseUrl = normalizeAdminUrl(config.adminUrl);
  const workspace = config.workspace?.trim() || undefined;
  const timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
  const base = config.debug ? createLogger({ ...logger.getConfig(), level: 'debug' }) : logger;
  const log = base.child({ component: 'admin-client' });

  const defaultHeaders: Record<string, string> = {
    Accept: 'application/json',
    'Content-Type': 'application/json',
    'User-Agent': config.userAgent ? `gatesync ${config.userAgent}` : 'gatesync',
  };

  if (config.token) {
    defaultHeaders['Kong-Admin-Token'] = config.token;
    defaultHeaders['Authorization'] = `Bearer ${config.token}`;
  }

  function buildUrl(path: string, params?: QueryParams): URL {
    const prefix = workspace ? `/${encodeURIComponent(workspace)}` : '';
    const url = new URL(`${baseUrl}${prefix}${path}`);
    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }
    return url;
  }

  /**
   * Send a request and hand the response to `read`. The timeout covers the
   * body as well as the headers; transport failures become ApiRequestError.
   */
  async function send<R>(
    method: HttpMethod,
    url: URL,
    options: RequestOptions,
    read: (response: Response) => Promise<R>
  ): Promise<R> {
    const headers = { ...defaultHeaders, ...options.headers };
    log.request(method, url.toString(), { headers, body: options.body });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const startTime = Date.now();

    try {
      const response = await fetch(url.toString(), {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });
      log.response(response.status, url.toString(), { durationMs: Date.now() - startTime });
      return await Promise.race([read(response), untilAborted(controller.signal)]);
    } catch (error) {
      if (error instanceof ApiRequestError) {
        throw error;
      }
      throw toTransportError(error, url.toString(), timeout);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Read a JSON body, rejecting HTML pages and other non-JSON responses
   */
  async function readJson(response: Response, url: URL): Promise<unknown> {
    const text = await response.text();
    const contentType = response.headers.get('content-type') ?? '';
    if (looksLikeHtml(text) || (contentType !== '' && !contentType.includes('json'))) {
      throw new ApiRequestError(
        `Expected JSON from ${url.pathname} but received ${contentType || 'an HTML page'}; is the admin URL pointing at the Admin API?`,
        response.status,
        { code: 'NON_JSON_RESPONSE' }
      );
    }
    if (text.trim() === '') {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ApiRequestError(`Invalid JSON from ${url.pathname}`, response.status, {
        code: 'INVALID_JSON',
        cause: error,
      });
    }
  }

  async function toHttpError(response: Response, method: HttpMethod, url: URL): Promise<ApiRequestError> {
    let errorMessage = `Admin API error (${response.status}) on ${method} ${url.pathname}`;
    let errorDetails: Record<string, unknown> | undefined;

    const errorBody = await response.text();
    if (errorBody) {
      try {
        const parsed: unknown = JSON.parse(errorBody);
        if (isRecord(parsed)) {
          errorDetails = parsed;
          if (typeof parsed.message === 'string') {
            errorMessage = `${errorMessage}: ${parsed.message}`;
          }
        }
      } catch {
        errorMessage = `${errorMessage}: ${errorBody.substring(0, 200)}`;
      }
    }

    return new ApiRequestError(errorMessage, response.status, { details: errorDetails });
  }

  /**
   * Make an API request and decode the JSON body
   *
   * The decoded body is trusted to match the Admin API entity shape.
   */
  async function request<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T> {
    const url = buildUrl(path, options.params);
    const body = await send(method, url, options, async (response) => {
      if (!response.ok) {
        throw await toHttpError(response, method, url);
      }
      return readJson(response, url);
    });
    return body as T;
  }

  /**
   * GET an entity by name; 404 resolves to undefined
   */
  async function getOptional<T>(path: string): Promise<T | undefined> {
    try {
      return await request<T>('GET', path);
    } catch (error) {
      if (error instanceof ApiRequestError && error.isNotFound()) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Follow the offset cursor until the collection is exhausted
   */
  async function listAll<T>(path: string): Promise<T[]> {
    const items: T[] = [];
    let offset: string | undefined;
    do {
      const page = await request<ListResponse<T>>('GET', path, {
        params: { size: LIST_PAGE_SIZE, offset },
      });
      items.push(...(page.data ?? []));
      offset = page.offset ?? undefined;
    } while (offset);
    return items;
  }

  const seg = encodeURIComponent;

  // ---------------------------------------------------------------------------
  // Sub-clients
  // ---------------------------------------------------------------------------

  const upstreams: UpstreamsClient = {
    get: (name) => getOptional<Upstream>(`/upstreams/${seg(name)}`),
    list: () => listAll<Upstream>('/upstreams'),
    create: (body) => request<Upstream>('POST', '/upstreams', { body }),
  };

  const targets: TargetsClient = {
    list: (upstream) => listAll<Target>(`/upstreams/${seg(upstream)}/targets`),
    add: (upstream, body) => request<Target>('POST', `/upstreams/${seg(upstream)}/targets`, { body }),
  };

  const services: ServicesClient = {
    get: (name) => getOptional<Service>(`/services/${seg(name)}`),
    list: () => listAll<Service>('/services'),
    create: (body) => request<Service>('POST', '/services', { body }),
    update: (name, body) => request<Service>('PATCH', `/services/${seg(name)}`, { body }),
  };

  const routes: RoutesClient = {
    get: (name) => getOptional<Route>(`/routes/${seg(name)}`),
    list: () => listAll<Route>('/routes'),
    create: (body) => request<Route>('POST', '/routes', { body }),
    update: (name, body) => request<Route>('PATCH', `/routes/${seg(name)}`, { body }),
  };

  // ---------------------------------------------------------------------------
  // Ping
  // ---------------------------------------------------------------------------

  async function probe(path: '/status' | '/'): Promise<PingResult> {
    const url = buildUrl(path);
    const endpoint = url.toString();
    try {
      return await send('GET', url, {}, (response) => classifyProbe(path, endpoint, response));
    } catch (error) {
      return { ok: false, endpoint, reason: error instanceof Error ? error.message : String(error) };
    }
  }

  async function classifyProbe(path: '/status' | '/', endpoint: string, response: Response): Promise<PingResult> {
    const status = response.status;
    const hasGatewayHeader = GATEWAY_HEADERS.some((name) => {
      const value = response.headers.get(name);
      return name === 'server' || name === 'via' ? /kong/i.test(value ?? '') : value !== null;
    });
    if (hasGatewayHeader && (response.ok || status === 401 || status === 403)) {
      return { ok: true, endpoint, status, version: await readVersion(response) };
    }
    if (!response.ok) {
      return { ok: false, endpoint, status, reason: `HTTP ${status}` };
    }

    const text = await response.text();
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return { ok: false, endpoint, status, reason: 'response is not JSON' };
    }
    if (!isRecord(body)) {
      return { ok: false, endpoint, status, reason: 'unexpected response body' };
    }
    const markers = path === '/status' ? ['database', 'server'] : ['version', 'configuration'];
    if (markers.some((key) => key in body)) {
      return {
        ok: true,
        endpoint,
        status,
        version: typeof body.version === 'string' ? body.version : undefined,
      };
    }
    return { ok: false, endpoint, status, reason: 'response does not look like a gateway Admin API' };
  }

  async function readVersion(response: Response): Promise<string | undefined> {
    const text = await response.text();
    try {
      const body: unknown = JSON.parse(text);
      return isRecord(body) && typeof body.version === 'string' ? body.version : undefined;
    } catch {
      return undefined;
    }
  }

  async function ping(): Promise<PingResult> {
    const status = await probe('/status');
    if (status.ok) {
      return status;
    }
    const root = await probe('/');
    return root.ok ? root : { ...root, reason: `${status.reason ?? 'unreachable'}; ${root.reason ?? 'unreachable'}` };
  }

  return {
    upstreams,
    targets,
    services,
    routes,
    ping,
    getConfig: () => ({ adminUrl: baseUrl, workspace, timeout }),
  };
}
