/**
 * Route mutations
 *
 * The service reference is sent by id; the executor resolves it before
 * calling in here.
 */

import type { GatewayClient } from '../../api/client.js';
import type {
  CreateRouteRequest,
  Route,
  RouteFieldsPayload,
  UpdateRouteRequest,
} from '../../api/types.js';
import type { DesiredRouteFields, FieldChange, RouteChange } from '../types.js';

type RouteField = keyof RouteFieldsPayload;

const ROUTE_FIELDS: readonly RouteField[] = [
  'hosts',
  'paths',
  'methods',
  'protocols',
  'snis',
  'tags',
  'headers',
  'strip_path',
  'preserve_host',
  'path_handling',
  'regex_priority',
  'https_redirect_status_code',
  'request_buffering',
  'response_buffering',
];

/**
 * Copy the declared fields, dropping undeclared ones
 */
export function declaredRouteFields(fields: DesiredRouteFields, only?: ReadonlySet<string>): RouteFieldsPayload {
  const payload: RouteFieldsPayload = {};
  const copy = <K extends RouteField>(field: K): void => {
    if (fields[field] !== undefined && (!only || only.has(field))) {
      payload[field] = fields[field];
    }
  };
  ROUTE_FIELDS.forEach(copy);
  return payload;
}

export function buildCreateRoutePayload(change: RouteChange, serviceId: string): CreateRouteRequest {
  const fields = declaredRouteFields(change.desired.fields);
  return {
    name: change.name,
    ...fields,
    strip_path: fields.strip_path ?? true,
    service: { id: serviceId },
  };
}

/**
 * Patch holding only the changed fields; sets and headers are sent whole
 *
 * @param serviceId - required when the service reference changed
 */
export function buildRoutePatch(
  fields: DesiredRouteFields,
  changes: readonly FieldChange[],
  serviceId?: string
): UpdateRouteRequest {
  const changed = new Set(
    changes.map((change) => (change.field.startsWith('headers.') ? 'headers' : change.field))
  );
  const patch: UpdateRouteRequest = declaredRouteFields(fields, changed);
  if (changed.has('service') && serviceId !== undefined) {
    patch.service = { id: serviceId };
  }
  return patch;
}

export function routeChangesService(change: RouteChange): boolean {
  return change.fields.some((field) => field.field === 'service');
}

export async function createRoute(client: GatewayClient, change: RouteChange, serviceId: string): Promise<Route> {
  return client.routes.create(buildCreateRoutePayload(change, serviceId));
}

export async function updateRoute(
  client: GatewayClient,
  change: RouteChange,
  serviceId?: string
): Promise<Route> {
  return client.routes.update(change.name, buildRoutePatch(change.desired.fields, change.fields, serviceId));
}
