/**
 * Plan assembly
 *
 * Classifies every desired resource against the resolved remote state and
 * orders the changes so that dependencies come first.
 */

import {
  diffRoute,
  diffService,
  diffTarget,
  diffUpstream,
  type Change,
  type DesiredState,
} from '../reconcilers/index.js';
import type { RemoteState } from './resolve.js';
import type { Plan, PlanSummary } from './types.js';

export function emptySummary(): PlanSummary {
  return {
    upstream: { create: 0, update: 0, none: 0 },
    target: { create: 0, update: 0, none: 0 },
    service: { create: 0, update: 0, none: 0 },
    route: { create: 0, update: 0, none: 0 },
  };
}

export function summarize(changes: readonly Change[]): PlanSummary {
  const summary = emptySummary();
  for (const change of changes) {
    summary[change.kind][change.action] += 1;
  }
  return summary;
}

/**
 * Build the ordered plan: each upstream followed by its targets, then
 * services, then routes, each in document order
 */
export function assemblePlan(state: DesiredState, remote: RemoteState): Plan {
  const changes: Change[] = [];

  for (const upstream of state.upstreams) {
    changes.push(diffUpstream(upstream, remote.upstreams.get(upstream.name)));
    for (const target of state.targets) {
      if (target.upstream === upstream.name) {
        changes.push(diffTarget(target, remote.targets.get(upstream.name) ?? []));
      }
    }
  }

  const declaredServices = new Set(state.services.map((service) => service.name));
  for (const service of state.services) {
    changes.push(diffService(service, remote.services.get(service.name)));
  }

  for (const route of state.routes) {
    const service = remote.services.get(route.service);
    changes.push(
      diffRoute(route, remote.routes.get(route.name), {
        id: service?.id,
        createdThisRun: declaredServices.has(route.service) && service === undefined,
      })
    );
  }

  return { changes, shorthand: state.shorthand, summary: summarize(changes) };
}
