/**
 * Service mutations
 *
 * Create payloads carry every declared field; patches carry only the
 * fields the diff reported as changed.
 */

import type { GatewayClient } from '../../api/client.js';
import type { CreateServiceRequest, Service, UpdateServiceRequest } from '../../api/types.js';
import type { DesiredService, FieldChange, ServiceChange } from '../types.js';
import { SERVICE_EXTRA_FIELDS } from './diff.js';

type ServiceField = keyof UpdateServiceRequest;

const SERVICE_PATCH_FIELDS: readonly ServiceField[] = [
  'url',
  'protocol',
  'host',
  'port',
  'path',
  ...SERVICE_EXTRA_FIELDS,
];

/**
 * Every declared field of a service, without its name
 */
export function declaredServiceFields(desired: DesiredService): UpdateServiceRequest {
  const payload: UpdateServiceRequest = {};
  const backend = desired.backend;
  if (backend.mode === 'url') {
    payload.url = backend.url;
  } else {
    payload.protocol = backend.protocol;
    payload.host = backend.upstream;
    payload.port = backend.port;
    if (backend.path !== undefined) payload.path = backend.path;
  }
  for (const field of SERVICE_EXTRA_FIELDS) {
    const value = desired.extras[field];
    if (value !== undefined) payload[field] = value;
  }
  return payload;
}

export function buildCreateServicePayload(desired: DesiredService): CreateServiceRequest {
  return { name: desired.name, ...declaredServiceFields(desired) };
}

/**
 * Patch holding only the changed fields
 */
export function buildServicePatch(desired: DesiredService, fields: readonly FieldChange[]): UpdateServiceRequest {
  const changed = new Set(fields.map((change) => change.field));
  const declared = declaredServiceFields(desired);
  const patch: UpdateServiceRequest = {};
  const copy = <K extends ServiceField>(field: K): void => {
    if (changed.has(field) && declared[field] !== undefined) {
      patch[field] = declared[field];
    }
  };
  SERVICE_PATCH_FIELDS.forEach(copy);
  return patch;
}

export async function createService(client: GatewayClient, change: ServiceChange): Promise<Service> {
  return client.services.create(buildCreateServicePayload(change.desired));
}

export async function updateService(client: GatewayClient, change: ServiceChange): Promise<Service> {
  return client.services.update(change.name, buildServicePatch(change.desired, change.fields));
}
