/**
 * Remote state resolution
 *
 * One sequential lookup per desired resource. "Not found" means absent;
 * any other failure aborts with a FetchError.
 */

import type { GatewayClient } from '../api/client.js';
import type { Route, Service, Target, Upstream } from '../api/types.js';
import { DependencyError, FetchError, isReconcileError } from '../errors.js';
import type { DesiredState, ResourceKind } from '../reconcilers/types.js';

export interface RemoteState {
  upstreams: Map<string, Upstream | undefined>;
  /** Targets per upstream that exists remotely */
  targets: Map<string, Target[]>;
  /** Declared services, plus services referenced by routes but not declared */
  services: Map<string, Service | undefined>;
  routes: Map<string, Route | undefined>;
}

async function fetchOrFail<T>(kind: ResourceKind, name: string, lookup: () => Promise<T>): Promise<T> {
  try {
    return await lookup();
  } catch (error) {
    if (isReconcileError(error)) {
      throw error;
    }
    throw new FetchError(kind, name, error);
  }
}

/**
 * Fetch the current state of every desired resource
 *
 * @throws DependencyError when a route references a service that is neither
 * declared before it nor present remotely
 * @throws FetchError when a lookup fails for a reason other than "not found"
 */
export async function resolveRemoteState(client: GatewayClient, state: DesiredState): Promise<RemoteState> {
  const remote: RemoteState = {
    upstreams: new Map(),
    targets: new Map(),
    services: new Map(),
    routes: new Map(),
  };

  for (const upstream of state.upstreams) {
    const current = await fetchOrFail('upstream', upstream.name, () => client.upstreams.get(upstream.name));
    remote.upstreams.set(upstream.name, current);
  }

  for (const upstream of new Set(state.targets.map((target) => target.upstream))) {
    if (remote.upstreams.get(upstream)) {
      const targets = await fetchOrFail('upstream', upstream, () => client.targets.list(upstream));
      remote.targets.set(upstream, targets);
    }
  }

  for (const service of state.services) {
    const current = await fetchOrFail('service', service.name, () => client.services.get(service.name));
    remote.services.set(service.name, current);
  }

  const shorthandServices = new Map(state.shorthand.map((link) => [link.route, link.service] as const));
  const available = new Set(
    state.services.filter((service) => service.owner?.kind !== 'route').map((service) => service.name)
  );

  for (const route of state.routes) {
    const ownService = shorthandServices.get(route.name);
    if (ownService !== undefined) {
      available.add(ownService);
    }

    if (!available.has(route.service)) {
      // Not declared before this route: the service must already exist
      const existing = remote.services.has(route.service)
        ? remote.services.get(route.service)
        : await fetchOrFail('service', route.service, () => client.services.get(route.service));
      remote.services.set(route.service, existing);
      if (!existing) {
        throw new DependencyError('route', route.name, { kind: 'service', name: route.service });
      }
    }

    const current = await fetchOrFail('route', route.name, () => client.routes.get(route.name));
    remote.routes.set(route.name, current);
  }

  return remote;
}
