/**
 * Upstream and target diff
 *
 * Upstreams carry no comparable fields: they are created or left alone.
 * Targets are matched by address within their upstream; only a declared
 * weight can differ.
 */

import type { Target, Upstream } from '../../api/types.js';
import {
  targetName,
  type DesiredTarget,
  type DesiredUpstream,
  type TargetChange,
  type UpstreamChange,
} from '../types.js';

/** Weight the gateway assigns when a target is created without one */
export const GATEWAY_DEFAULT_WEIGHT = 100;

export function diffUpstream(desired: DesiredUpstream, current: Upstream | undefined): UpstreamChange {
  return {
    kind: 'upstream',
    name: desired.name,
    action: current ? 'none' : 'create',
    fields: [],
    desired,
    current,
    owner: desired.owner,
  };
}

/**
 * @param currentTargets - targets registered on the upstream; empty when the upstream is absent
 */
export function diffTarget(desired: DesiredTarget, currentTargets: readonly Target[]): TargetChange {
  const current = currentTargets.find((target) => target.target === desired.target);
  const base = {
    kind: 'target' as const,
    name: targetName(desired.upstream, desired.target),
    desired,
    current,
    owner: desired.owner,
  };

  if (!current) {
    return { ...base, action: 'create', fields: [] };
  }

  const currentWeight = current.weight ?? GATEWAY_DEFAULT_WEIGHT;
  if (!desired.weightDeclared || currentWeight === desired.weight) {
    return { ...base, action: 'none', fields: [] };
  }
  return {
    ...base,
    action: 'update',
    fields: [{ field: 'weight', oldValue: currentWeight, newValue: desired.weight }],
  };
}
