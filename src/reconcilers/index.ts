/**
 * Reconcilers module - per-kind diff and mutation for gateway resources
 *
 * @module reconcilers
 */

export * from './upstreams/index.js';
export * from './services/index.js';
export * from './routes/index.js';
export * from './types.js';
export { diffSets, setEquals, diffHeaders, headersEqual } from './sets.js';
