/**
 * Route diff
 *
 * Only declared fields are compared. Collections compare as sets, headers
 * key by key, and the service reference by id.
 */

import type { Route } from '../../api/types.js';
import { diffHeaders, setFieldChange } from '../sets.js';
import type { DesiredRoute, FieldChange, RouteChange } from '../types.js';

export const ROUTE_SET_FIELDS = ['hosts', 'paths', 'methods', 'protocols', 'snis', 'tags'] as const;

/** Values the gateway uses when a boolean is missing from the response */
export const ROUTE_BOOLEAN_DEFAULTS = {
  strip_path: true,
  preserve_host: false,
  request_buffering: true,
  response_buffering: true,
} as const;

type RouteBooleanField = keyof typeof ROUTE_BOOLEAN_DEFAULTS;

const ROUTE_BOOLEAN_FIELDS: readonly RouteBooleanField[] = [
  'strip_path',
  'preserve_host',
  'request_buffering',
  'response_buffering',
];

/**
 * How the route's desired service resolved
 */
export interface ServiceBinding {
  /** Remote id of the service, when it already exists */
  id?: string;
  /** The service is created in this run, so no existing route can point at it yet */
  createdThisRun: boolean;
}

export function diffRoute(desired: DesiredRoute, current: Route | undefined, binding: ServiceBinding): RouteChange {
  const base = { kind: 'route' as const, name: desired.name, desired, current, serviceId: binding.id };
  if (!current) {
    return { ...base, action: 'create', fields: [] };
  }
  const fields = diffRouteFields(desired, current, binding);
  return { ...base, action: fields.length > 0 ? 'update' : 'none', fields };
}

function diffRouteFields(desired: DesiredRoute, current: Route, binding: ServiceBinding): FieldChange[] {
  const want = desired.fields;
  const fields: FieldChange[] = [];

  for (const field of ROUTE_SET_FIELDS) {
    const desiredValues = want[field];
    if (desiredValues === undefined) continue;
    const currentValues = current[field] ?? [];
    const change =
      field === 'methods'
        ? setFieldChange(field, currentValues.map((method) => method.toUpperCase()), desiredValues)
        : setFieldChange(field, currentValues, desiredValues);
    if (change) fields.push(change);
  }

  if (want.headers !== undefined) {
    fields.push(...diffHeaders(current.headers ?? {}, want.headers));
  }

  for (const field of ROUTE_BOOLEAN_FIELDS) {
    const desiredValue = want[field];
    const currentValue = current[field] ?? ROUTE_BOOLEAN_DEFAULTS[field];
    if (desiredValue !== undefined && desiredValue !== currentValue) {
      fields.push({ field, oldValue: currentValue, newValue: desiredValue });
    }
  }

  if (want.path_handling !== undefined) {
    const currentValue = current.path_handling?.toLowerCase();
    if (currentValue !== want.path_handling) {
      fields.push({ field: 'path_handling', oldValue: currentValue, newValue: want.path_handling });
    }
  }

  for (const field of ['regex_priority', 'https_redirect_status_code'] as const) {
    const desiredValue = want[field];
    const currentValue = current[field] ?? 0;
    if (desiredValue !== undefined && desiredValue !== currentValue) {
      fields.push({ field, oldValue: currentValue, newValue: desiredValue });
    }
  }

  const serviceChange = diffServiceRef(desired.service, current, binding);
  if (serviceChange) fields.push(serviceChange);

  return fields;
}

function diffServiceRef(service: string, current: Route, binding: ServiceBinding): FieldChange | undefined {
  const currentRef = current.service ?? undefined;
  const oldValue = currentRef?.name ?? currentRef?.id;
  if (binding.createdThisRun || binding.id === undefined) {
    return { field: 'service', oldValue, newValue: service };
  }
  if (currentRef?.id === binding.id) {
    return undefined;
  }
  return { field: 'service', oldValue, newValue: service };
}
