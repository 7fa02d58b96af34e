/**
 * Upstream and target mutations
 */

import type { GatewayClient } from '../../api/client.js';
import type { Target, Upstream } from '../../api/types.js';
import type { TargetChange, UpstreamChange } from '../types.js';

export async function createUpstream(client: GatewayClient, change: UpstreamChange): Promise<Upstream> {
  return client.upstreams.create({ name: change.desired.name });
}

/**
 * Register a target; for an existing address this replaces its weight
 */
export async function applyTarget(client: GatewayClient, change: TargetChange): Promise<Target> {
  const { upstream, target, weight } = change.desired;
  return client.targets.add(upstream, { target, weight });
}
