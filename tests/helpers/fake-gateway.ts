/**
 * In-memory gateway for pipeline tests
 *
 * Stores entities by name the way the Admin API does, fills in the
 * defaults the gateway applies on create, and records every call.
 */

import type {
  GatewayClient,
  RoutesClient,
  ServicesClient,
  TargetsClient,
  UpstreamsClient,
} from '../../src/api/client.js';
import { ApiRequestError } from '../../src/api/errors.js';
import type {
  CreateServiceRequest,
  Route,
  RouteFieldsPayload,
  Service,
  Target,
  UpdateServiceRequest,
  Upstream,
} from '../../src/api/types.js';

export type FakeOperation =
  | 'upstreams.get'
  | 'upstreams.list'
  | 'upstreams.create'
  | 'targets.list'
  | 'targets.add'
  | 'services.get'
  | 'services.list'
  | 'services.create'
  | 'services.update'
  | 'routes.get'
  | 'routes.list'
  | 'routes.create'
  | 'routes.update';

export interface FakeCall {
  op: FakeOperation;
  /** Entity name (or upstream name for targets) */
  name?: string;
  body?: unknown;
}

const DEFAULT_PORTS: Record<string, number> = { http: 80, https: 443 };

export class FakeGateway implements GatewayClient {
  readonly upstreamStore = new Map<string, Upstream>();
  readonly targetStore = new Map<string, Target[]>();
  readonly serviceStore = new Map<string, Service>();
  readonly routeStore = new Map<string, Route>();
  readonly calls: FakeCall[] = [];

  private nextId = 1;
  private readonly failures = new Map<FakeOperation, Error>();

  /** Make every call to `op` reject with `error` */
  failOn(op: FakeOperation, error: Error = new ApiRequestError('Admin API error (500)', 500)): this {
    this.failures.set(op, error);
    return this;
  }

  /** Calls that change state */
  mutations(): FakeCall[] {
    return this.calls.filter((call) => /\.(create|update|add)$/.test(call.op));
  }

  clearCalls(): void {
    this.calls.length = 0;
  }

  private record(op: FakeOperation, name?: string, body?: unknown): void {
    this.calls.push({ op, name, body });
    const failure = this.failures.get(op);
    if (failure) {
      throw failure;
    }
  }

  private id(prefix: string): string {
    return `${prefix}-${this.nextId++}`;
  }

  private conflict(kind: string, name: string): ApiRequestError {
    return new ApiRequestError(`UNIQUE violation detected on '{name="${name}"}' (${kind})`, 409);
  }

  // ---------------------------------------------------------------------------
  // Seeding
  // ---------------------------------------------------------------------------

  seedUpstream(name: string, targets: { target: string; weight?: number }[] = []): Upstream {
    const upstream: Upstream = { id: this.id('upstream'), name };
    this.upstreamStore.set(name, upstream);
    this.targetStore.set(
      name,
      targets.map((target) => ({ id: this.id('target'), target: target.target, weight: target.weight ?? 100 }))
    );
    return upstream;
  }

  seedService(service: Omit<Service, 'id'> & { name: string }): Service {
    const stored: Service = { id: this.id('service'), ...service };
    this.serviceStore.set(service.name, stored);
    return stored;
  }

  seedRoute(route: Omit<Route, 'id' | 'service'> & { name: string; service: string }): Route {
    const service = this.serviceStore.get(route.service);
    if (!service) {
      throw new Error(`seedRoute: unknown service ${route.service}`);
    }
    const stored: Route = { ...routeDefaults(), ...route, id: this.id('route'), service: { id: service.id } };
    this.routeStore.set(route.name, stored);
    return stored;
  }

  // ---------------------------------------------------------------------------
  // GatewayClient
  // ---------------------------------------------------------------------------

  readonly upstreams: UpstreamsClient = {
    get: async (name) => {
      this.record('upstreams.get', name);
      return this.upstreamStore.get(name);
    },
    list: async () => {
      this.record('upstreams.list');
      return [...this.upstreamStore.values()];
    },
    create: async (request) => {
      this.record('upstreams.create', request.name, request);
      if (this.upstreamStore.has(request.name)) throw this.conflict('upstreams', request.name);
      const upstream: Upstream = { id: this.id('upstream'), name: request.name, tags: request.tags };
      this.upstreamStore.set(request.name, upstream);
      this.targetStore.set(request.name, []);
      return upstream;
    },
  };

  readonly targets: TargetsClient = {
    list: async (upstream) => {
      this.record('targets.list', upstream);
      const targets = this.targetStore.get(upstream);
      if (!targets) throw new ApiRequestError('Not found', 404);
      return targets.map((target) => ({ ...target }));
    },
    add: async (upstream, request) => {
      this.record('targets.add', upstream, request);
      const targets = this.targetStore.get(upstream);
      if (!targets) throw new ApiRequestError('Not found', 404);
      const existing = targets.find((target) => target.target === request.target);
      if (existing) {
        existing.weight = request.weight;
        return { ...existing };
      }
      const target: Target = { id: this.id('target'), target: request.target, weight: request.weight };
      targets.push(target);
      return { ...target };
    },
  };

  readonly services: ServicesClient = {
    get: async (name) => {
      this.record('services.get', name);
      return this.serviceStore.get(name);
    },
    list: async () => {
      this.record('services.list');
      return [...this.serviceStore.values()];
    },
    create: async (request) => {
      this.record('services.create', request.name, request);
      if (this.serviceStore.has(request.name)) throw this.conflict('services', request.name);
      const service: Service = { id: this.id('service'), name: request.name, ...serviceFields(request) };
      this.serviceStore.set(request.name, service);
      return service;
    },
    update: async (name, request) => {
      this.record('services.update', name, request);
      const service = this.serviceStore.get(name);
      if (!service) throw new ApiRequestError('Not found', 404);
      Object.assign(service, serviceFields(request));
      return service;
    },
  };

  readonly routes: RoutesClient = {
    get: async (name) => {
      this.record('routes.get', name);
      return this.routeStore.get(name);
    },
    list: async () => {
      this.record('routes.list');
      return [...this.routeStore.values()];
    },
    create: async (request) => {
      this.record('routes.create', request.name, request);
      if (this.routeStore.has(request.name)) throw this.conflict('routes', request.name);
      const route: Route = { ...routeDefaults(), ...request, id: this.id('route') };
      this.routeStore.set(request.name, route);
      return route;
    },
    update: async (name, request) => {
      this.record('routes.update', name, request);
      const route = this.routeStore.get(name);
      if (!route) throw new ApiRequestError('Not found', 404);
      const fields: RouteFieldsPayload = request;
      Object.assign(route, fields);
      if (request.service) route.service = { id: request.service.id };
      return route;
    },
  };

  async ping() {
    return { ok: true, endpoint: 'http://fake/status', status: 200 };
  }

  getConfig() {
    return { adminUrl: 'http://fake', timeout: 1000 };
  }
}

/** Defaults the gateway stores for fields a create request leaves out */
function routeDefaults(): Omit<Route, 'id' | 'name'> {
  return {
    protocols: ['http', 'https'],
    strip_path: true,
    preserve_host: false,
    request_buffering: true,
    response_buffering: true,
    path_handling: 'v0',
    regex_priority: 0,
    https_redirect_status_code: 426,
  };
}

/**
 * Split a url into its parts the way the gateway does
 */
function serviceFields(request: CreateServiceRequest | UpdateServiceRequest): Omit<Service, 'id' | 'name'> {
  const { url, ...rest } = request;
  if (url === undefined) {
    return rest;
  }
  const parsed = new URL(url);
  const protocol = parsed.protocol.replace(/:$/, '');
  return {
    ...rest,
    protocol,
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : DEFAULT_PORTS[protocol],
    path: parsed.pathname === '/' ? null : parsed.pathname,
  };
}
