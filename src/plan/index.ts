/**
 * Reconciliation pipeline
 *
 * document -> expand -> resolve remote state -> diff/assemble -> render or apply
 */

import type { GatewayClient } from '../api/client.js';
import type { DesiredDocument } from '../spec/types.js';
import { assemblePlan } from './assemble.js';
import { expandDocument } from './expand.js';
import { resolveRemoteState } from './resolve.js';
import type { Plan } from './types.js';

/**
 * Expand a document and compute its plan against the gateway
 *
 * Validation runs before any remote call.
 */
export async function buildPlan(client: GatewayClient, document: DesiredDocument): Promise<Plan> {
  const state = expandDocument(document);
  const remote = await resolveRemoteState(client, state);
  return assemblePlan(state, remote);
}

export { expandDocument, defaultPort, declaredNumber, DEFAULT_TARGET_WEIGHT } from './expand.js';
export { resolveRemoteState } from './resolve.js';
export type { RemoteState } from './resolve.js';
export { assemblePlan, summarize, emptySummary } from './assemble.js';
export { applyPlan } from './execute.js';
export { renderPlan, formatFieldChange, OVERWRITE_HINT } from './render.js';
export type * from './types.js';
