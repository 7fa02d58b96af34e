/**
 * Route reconciliation
 */

export { diffRoute, ROUTE_SET_FIELDS, ROUTE_BOOLEAN_DEFAULTS } from './diff.js';
export type { ServiceBinding } from './diff.js';
export {
  createRoute,
  updateRoute,
  buildCreateRoutePayload,
  buildRoutePatch,
  declaredRouteFields,
  routeChangesService,
} from './apply.js';
export { defaultRouteName } from './naming.js';
