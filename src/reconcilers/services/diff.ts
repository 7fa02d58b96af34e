/**
 * Service diff
 *
 * Upstream-bound services compare host (the upstream name), protocol, port
 * and path. URL services compare the URL rebuilt from the remote fields.
 * Retry and timeout extras are compared only when declared.
 */

import type { Service, ServiceExtras } from '../../api/types.js';
import type { DesiredService, FieldChange, ServiceChange } from '../types.js';

export const SERVICE_EXTRA_FIELDS = [
  'retries',
  'connect_timeout',
  'read_timeout',
  'write_timeout',
] as const satisfies readonly (keyof ServiceExtras)[];

const DEFAULT_PORTS: Record<string, number> = { http: 80, https: 443 };

/**
 * Rebuild `protocol://host[:port]/path` from a remote service, omitting the
 * port when it is the protocol default
 */
export function reconstructUrl(service: Pick<Service, 'protocol' | 'host' | 'port' | 'path'>): string {
  const protocol = service.protocol ?? 'http';
  const port =
    service.port === undefined || DEFAULT_PORTS[protocol] === service.port ? '' : `:${service.port}`;
  const path = service.path && service.path !== '/' ? service.path : '';
  return `${protocol}://${service.host ?? ''}${port}${path}`;
}

/**
 * Canonical form of a declared URL, comparable with reconstructUrl output
 */
export function canonicalUrl(url: string): string {
  const parsed = new URL(url);
  const path = parsed.pathname === '/' ? '' : parsed.pathname;
  const port = parsed.port ? `:${parsed.port}` : '';
  return `${parsed.protocol.replace(/:$/, '')}://${parsed.hostname}${port}${path}`;
}

export function diffService(desired: DesiredService, current: Service | undefined): ServiceChange {
  const base = {
    kind: 'service' as const,
    name: desired.name,
    desired,
    current,
    owner: desired.owner,
  };
  if (!current) {
    return { ...base, action: 'create', fields: [] };
  }

  const fields = [...diffBackend(desired, current), ...diffExtras(desired.extras, current)];
  return { ...base, action: fields.length > 0 ? 'update' : 'none', fields };
}

function diffBackend(desired: DesiredService, current: Service): FieldChange[] {
  const backend = desired.backend;
  if (backend.mode === 'url') {
    const currentUrl = reconstructUrl(current);
    return currentUrl === canonicalUrl(backend.url)
      ? []
      : [{ field: 'url', oldValue: currentUrl, newValue: backend.url }];
  }

  const fields: FieldChange[] = [];
  const compare = (field: string, oldValue: string | number | undefined, newValue: string | number) => {
    if (oldValue !== newValue) {
      fields.push({ field, oldValue, newValue });
    }
  };
  compare('host', current.host, backend.upstream);
  compare('protocol', current.protocol, backend.protocol);
  compare('port', current.port, backend.port);
  if (backend.path !== undefined) {
    compare('path', current.path ?? undefined, backend.path);
  }
  return fields;
}

function diffExtras(extras: ServiceExtras, current: Service): FieldChange[] {
  const fields: FieldChange[] = [];
  for (const field of SERVICE_EXTRA_FIELDS) {
    const desired = extras[field];
    if (desired !== undefined && current[field] !== desired) {
      fields.push({ field, oldValue: current[field], newValue: desired });
    }
  }
  return fields;
}
