/**
 * Shared types for resource reconciliation
 *
 * Desired* types are the expanded, validated form of a document: every
 * optional field is `T | undefined` where undefined means "not declared".
 */

import type {
  Upstream,
  Target,
  Service,
  Route,
  ServiceExtras,
  RouteFieldsPayload,
} from '../api/types.js';

// =============================================================================
// Resource identity
// =============================================================================

export type ResourceKind = 'upstream' | 'service' | 'route' | 'target';

/**
 * Order in which kinds are processed and reported
 */

export const RESOURCE_LABELS: Record<ResourceKind, string> = {
  upstream: 'Upstream',
  service: 'Service',
  route: 'Route',
  target: 'Target',
};

/**
 * Format a resource for messages, e.g. `Service "demo"`
 */
export function formatResourceRef(kind: ResourceKind, name: string): string {
  return `${RESOURCE_LABELS[kind]} "${name}"`;
}

/**
 * Resource that caused an implicit resource to be synthesized
 */
export interface ResourceOwner {
  kind: 'service' | 'route';
  name: string;
}

// =============================================================================
// Desired state
// =============================================================================

export interface DesiredUpstream {
  name: string;
  owner?: ResourceOwner;
}

export interface DesiredTarget {
  upstream: string;
  /** host:port */
  target: string;
  /** Always positive; 100 when the document left it unset */
  weight: number;
  /** False when the document left the weight unset or 0; such a weight is never compared */
  weightDeclared: boolean;
  owner?: ResourceOwner;
}

export interface UrlBackend {
  mode: 'url';
  url: string;
}

export interface UpstreamBackend {
  mode: 'upstream';
  upstream: string;
  protocol: string;
  port: number;
  path?: string;
}

export interface DesiredService {
  name: string;
  backend: UrlBackend | UpstreamBackend;
  extras: ServiceExtras;
  owner?: ResourceOwner;
}

export type DesiredRouteFields = RouteFieldsPayload;

export interface DesiredRoute {
  name: string;
  /** Service name; always set after expansion */
  service: string;
  fields: DesiredRouteFields;
}

/**
 * Route-to-synthesized-resources linkage, consumed only by the renderer
 */
export interface ShorthandLink {
  route: string;
  service: string;
  upstream: string;
  /** Target addresses on the upstream */
  targets: string[];
}

/**
 * Fully expanded document, in processing order
 */
export interface DesiredState {
  upstreams: DesiredUpstream[];
  targets: DesiredTarget[];
  services: DesiredService[];
  routes: DesiredRoute[];
  shorthand: ShorthandLink[];
}

export function targetName(upstream: string, target: string): string {
  return `${upstream}/${target}`;
}

// =============================================================================
// Changes
// =============================================================================

export type Action = 'create' | 'update' | 'none';

export type FieldValue = string | number | boolean | string[];

/**
 * One differing field; sets report added/removed members instead of values
 */
export interface FieldChange {
  /** Admin API field name, e.g. `methods` or `headers.X-Env` */
  field: string;
  oldValue?: FieldValue;
  newValue?: FieldValue;
  added?: string[];
  removed?: string[];
}

interface ChangeBase<K extends ResourceKind, D, R> {
  kind: K;
  name: string;
  action: Action;
  /** Empty unless action is 'update' */
  fields: FieldChange[];
  desired: D;
  current?: R;
  owner?: ResourceOwner;
}

export type UpstreamChange = ChangeBase<'upstream', DesiredUpstream, Upstream>;
export type TargetChange = ChangeBase<'target', DesiredTarget, Target>;
export type ServiceChange = ChangeBase<'service', DesiredService, Service>;
export type RouteChange = ChangeBase<'route', DesiredRoute, Route> & {
  /** Remote id of the route's service, when it existed at planning time */
  serviceId?: string;
};

export type Change = UpstreamChange | TargetChange | ServiceChange | RouteChange;
