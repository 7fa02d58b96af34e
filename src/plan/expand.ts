/**
 * Shorthand expansion
 *
 * Turns a normalized document into the flat desired state: implicit
 * upstreams for upstream-bound services, and a synthesized service,
 * upstream and targets for every route that names no service.
 */

import { ValidationError } from '../errors.js';
import type { PathHandling, ServiceExtras } from '../api/types.js';
import type { DesiredDocument, RouteSpec, ServiceSpec, TargetSpec } from '../spec/types.js';
import { defaultRouteName } from '../reconcilers/routes/naming.js';
import {
  targetName,
  type DesiredRoute,
  type DesiredRouteFields,
  type DesiredService,
  type DesiredState,
  type DesiredTarget,
  type DesiredUpstream,
  type ResourceOwner,
  type ShorthandLink,
  type UpstreamBackend,
} from '../reconcilers/types.js';

export const DEFAULT_TARGET_WEIGHT = 100;
export const MAX_TARGET_WEIGHT = 1000;
export const DEFAULT_PROTOCOL = 'http';
export const REDIRECT_STATUS_CODES: readonly number[] = [426, 301, 302, 307, 308];

/**
 * Default port for a backend protocol
 */
export function defaultPort(protocol: string): number {
  return protocol === 'https' ? 443 : 80;
}

/**
 * Zero reads as "not specified"
 */
export function declaredNumber(value: number | undefined): number | undefined {
  return value === undefined || value === 0 ? undefined : value;
}

function declaredString(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function declaredList(value: string[] | undefined): string[] | undefined {
  return value === undefined || value.length === 0 ? undefined : value;
}

// =============================================================================
// Expander
// =============================================================================

class StateBuilder {
  readonly upstreams = new Map<string, DesiredUpstream>();
  readonly targets = new Map<string, DesiredTarget>();
  readonly services = new Map<string, DesiredService>();
  readonly routes = new Map<string, DesiredRoute>();
  readonly shorthand: ShorthandLink[] = [];

  /**
   * Register an upstream unless one with the same name exists
   */
  ensureUpstream(name: string, owner?: ResourceOwner): void {
    if (!this.upstreams.has(name)) {
      this.upstreams.set(name, { name, owner });
    }
  }

  addTarget(upstream: string, spec: TargetSpec, owner: ResourceOwner | undefined, path: string): string {
    const weight = spec.weight ?? 0;
    if (weight < 0 || weight > MAX_TARGET_WEIGHT) {
      throw new ValidationError(`must be between 0 and ${MAX_TARGET_WEIGHT}`, `${path}.weight`);
    }
    const desired: DesiredTarget = {
      upstream,
      target: spec.target,
      weight: weight === 0 ? DEFAULT_TARGET_WEIGHT : weight,
      weightDeclared: weight !== 0,
      owner,
    };

    const key = targetName(upstream, spec.target);
    const existing = this.targets.get(key);
    if (existing) {
      if (existing.weight !== desired.weight) {
        throw new ValidationError(
          `target "${spec.target}" is declared on upstream "${upstream}" with weights ${existing.weight} and ${desired.weight}`,
          path
        );
      }
      if (desired.weightDeclared && !existing.weightDeclared) {
        this.targets.set(key, { ...existing, weightDeclared: true });
      }
      return spec.target;
    }
    this.targets.set(key, desired);
    return spec.target;
  }

  build(): DesiredState {
    return {
      upstreams: [...this.upstreams.values()],
      targets: [...this.targets.values()],
      services: [...this.services.values()],
      routes: [...this.routes.values()],
      shorthand: this.shorthand,
    };
  }
}

/**
 * Expand a normalized document into the desired state
 *
 * @throws ValidationError on duplicate names, missing required fields or out-of-range values
 */
export function expandDocument(document: DesiredDocument): DesiredState {
  const state = new StateBuilder();
  const declaredServices = new Set(document.services.map((service) => service.name));

  document.upstreams.forEach((spec, index) => {
    const path = `upstreams[${index}]`;
    if (state.upstreams.has(spec.name)) {
      throw new ValidationError(`duplicate upstream "${spec.name}"`, `${path}.name`);
    }
    state.ensureUpstream(spec.name);
    spec.targets.forEach((target, i) => state.addTarget(spec.name, target, undefined, `${path}.targets[${i}]`));
  });

  document.services.forEach((spec, index) => {
    const path = `services[${index}]`;
    if (state.services.has(spec.name)) {
      throw new ValidationError(`duplicate service "${spec.name}"`, `${path}.name`);
    }
    state.services.set(spec.name, expandService(state, spec, path));
  });

  document.routes.forEach((spec, index) => {
    const path = `routes[${index}]`;
    const route = spec.service
      ? { name: spec.name || defaultRouteName(spec.service, spec.paths, spec.methods), service: spec.service }
      : expandShorthand(state, spec, declaredServices, path);

    if (state.routes.has(route.name)) {
      throw new ValidationError(`duplicate route "${route.name}"`, `${path}.name`);
    }
    state.routes.set(route.name, { ...route, fields: routeFields(spec, path) });
  });

  return state.build();
}

function expandService(state: StateBuilder, spec: ServiceSpec, path: string): DesiredService {
  const url = declaredString(spec.url);
  const upstream = declaredString(spec.upstream);
  const extras: ServiceExtras = {
    retries: declaredNumber(spec.retries),
    connect_timeout: declaredNumber(spec.connect_timeout),
    read_timeout: declaredNumber(spec.read_timeout),
    write_timeout: declaredNumber(spec.write_timeout),
  };

  if (url !== undefined && upstream !== undefined) {
    throw new ValidationError('url and upstream are mutually exclusive', path);
  }

  if (url !== undefined) {
    if (spec.targets.length > 0) {
      throw new ValidationError('targets require an upstream-bound service, not a url', `${path}.targets`);
    }
    if (!URL.canParse(url)) {
      throw new ValidationError(`"${url}" is not a valid URL`, `${path}.url`);
    }
    return { name: spec.name, backend: { mode: 'url', url }, extras };
  }

  if (upstream === undefined) {
    throw new ValidationError('requires either url or upstream', path);
  }

  const owner: ResourceOwner = { kind: 'service', name: spec.name };
  state.ensureUpstream(upstream, owner);
  spec.targets.forEach((target, i) => state.addTarget(upstream, target, owner, `${path}.targets[${i}]`));

  return {
    name: spec.name,
    backend: upstreamBackend(upstream, spec.protocol, spec.port, spec.path),
    extras,
  };
}

function upstreamBackend(
  upstream: string,
  protocol: string | undefined,
  port: number | undefined,
  path: string | undefined
): UpstreamBackend {
  const resolvedProtocol = (declaredString(protocol) ?? DEFAULT_PROTOCOL).toLowerCase();
  return {
    mode: 'upstream',
    upstream,
    protocol: resolvedProtocol,
    port: declaredNumber(port) ?? defaultPort(resolvedProtocol),
    path: declaredString(path),
  };
}

/**
 * Synthesize `<route>-service` and `<route>-upstream` (or the overrides) for a route without a service
 */
function expandShorthand(
  state: StateBuilder,
  spec: RouteSpec,
  declaredServices: ReadonlySet<string>,
  path: string
): { name: string; service: string } {
  const name = declaredString(spec.name);
  if (name === undefined) {
    throw new ValidationError('route has no name and no service', path);
  }

  const serviceName = declaredString(spec.service_name) ?? `${name}-service`;
  const upstreamName = declaredString(spec.upstream_name) ?? `${name}-upstream`;
  if (declaredServices.has(serviceName) || state.services.has(serviceName)) {
    throw new ValidationError(
      `generated service "${serviceName}" collides with another service; set service_name or reference the service with "service"`,
      path
    );
  }

  const owner: ResourceOwner = { kind: 'route', name };
  const backend = spec.backend ?? { targets: [] };
  state.ensureUpstream(upstreamName, owner);
  const targets = backend.targets.map((target, i) =>
    state.addTarget(upstreamName, target, owner, `${path}.backend.targets[${i}]`)
  );

  state.services.set(serviceName, {
    name: serviceName,
    backend: upstreamBackend(upstreamName, backend.protocol, backend.port, backend.path),
    extras: {},
    owner,
  });
  state.shorthand.push({
    route: name,
    service: serviceName,
    upstream: upstreamName,
    targets: [...new Set(targets)],
  });

  return { name, service: serviceName };
}

/**
 * Declared route fields, normalized (methods upper-cased, path_handling lower-cased)
 */
function routeFields(spec: RouteSpec, path: string): DesiredRouteFields {
  const headers =
    spec.headers && Object.keys(spec.headers).length > 0 ? spec.headers : undefined;

  return {
    hosts: declaredList(spec.hosts),
    paths: declaredList(spec.paths),
    methods: declaredList(spec.methods)?.map((method) => method.toUpperCase()),
    protocols: declaredList(spec.protocols),
    snis: declaredList(spec.snis),
    tags: declaredList(spec.tags),
    headers,
    strip_path: spec.strip_path,
    preserve_host: spec.preserve_host,
    request_buffering: spec.request_buffering,
    response_buffering: spec.response_buffering,
    path_handling: parsePathHandling(spec.path_handling, `${path}.path_handling`),
    regex_priority: declaredNumber(spec.regex_priority),
    https_redirect_status_code: parseRedirectStatus(
      spec.https_redirect_status_code,
      `${path}.https_redirect_status_code`
    ),
  };
}

function parsePathHandling(value: string | undefined, path: string): PathHandling | undefined {
  const declared = declaredString(value)?.toLowerCase();
  if (declared === undefined) return undefined;
  if (declared === 'v0' || declared === 'v1') return declared;
  throw new ValidationError(`must be v0 or v1, got "${value}"`, path);
}

function parseRedirectStatus(value: number | undefined, path: string): number | undefined {
  const declared = declaredNumber(value);
  if (declared === undefined || REDIRECT_STATUS_CODES.includes(declared)) return declared;
  throw new ValidationError(`must be one of ${REDIRECT_STATUS_CODES.join(', ')}, got ${declared}`, path);
}
