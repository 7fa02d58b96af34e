/**
 * Upstream and target reconciliation
 */

export { diffUpstream, diffTarget, GATEWAY_DEFAULT_WEIGHT } from './diff.js';
export { createUpstream, applyTarget } from './apply.js';
