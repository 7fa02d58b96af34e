/**
 * Document normalizer
 *
 * Accepts YAML or JSON text in one of three shapes and yields a canonical
 * DesiredDocument:
 * 1. an object with a non-empty `upstreams`, `services` or `routes` list
 * 2. a bare list, every element being a route
 * 3. a single route object
 *
 * Values are type-checked here; cross-resource rules live in the expander.
 */

import { parse as parseYaml, YAMLParseError } from 'yaml';
import { ParseError, ValidationError } from '../errors.js';
import type {
  BackendSpec,
  DesiredDocument,
  NormalizedDocument,
  RouteSpec,
  ServiceSpec,
  TargetSpec,
  UpstreamSpec,
} from './types.js';

type RawObject = Record<string, unknown>;

const COLLECTION_KEYS = ['upstreams', 'services', 'routes'] as const;
const ROUTE_LIST_KEYS = ['paths', 'hosts', 'methods'] as const;

// =============================================================================
// Entry points
// =============================================================================

/**
 * Parse YAML (or JSON) text into a plain value
 */
export function parseDocument(text: string): unknown {
  try {
    return parseYaml(text);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ParseError(`Invalid YAML/JSON: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Recognize the document shape and build the canonical document
 */
export function normalizeDocument(raw: unknown): NormalizedDocument {
  if (isObject(raw) && COLLECTION_KEYS.some((key) => isNonEmptyList(raw[key]))) {
    const document: DesiredDocument = {
      upstreams: readObjectList(raw, 'upstreams', 'upstreams').map(readUpstream),
      services: readObjectList(raw, 'services', 'services').map(readService),
      routes: readObjectList(raw, 'routes', 'routes').map((route, index) =>
        readRoute(route, `routes[${index}]`)
      ),
    };
    return { shape: 'document', document };
  }

  if (Array.isArray(raw) && raw.length > 0) {
    const routes = raw.map((item, index) => readRoute(asObject(item, `[${index}]`), `[${index}]`));
    return { shape: 'route-list', document: { upstreams: [], services: [], routes } };
  }

  if (isObject(raw) && looksLikeRoute(raw)) {
    return {
      shape: 'single-route',
      document: { upstreams: [], services: [], routes: [readRoute(raw, 'route')] },
    };
  }

  if (raw === null || raw === undefined || isObject(raw) || Array.isArray(raw)) {
    throw new ParseError('Document contains no upstreams, services or routes');
  }
  throw new ParseError(`Unrecognized document: expected an object or a list, got ${typeof raw}`);
}

/**
 * Parse and normalize in one step
 */
export function loadDocument(text: string): NormalizedDocument {
  return normalizeDocument(parseDocument(text));
}

function looksLikeRoute(raw: RawObject): boolean {
  if (typeof raw.name === 'string' && raw.name !== '') return true;
  if (ROUTE_LIST_KEYS.some((key) => isNonEmptyList(raw[key]))) return true;
  if (typeof raw.service === 'string' && raw.service !== '') return true;
  return raw.backend !== undefined && raw.backend !== null;
}

// =============================================================================
// Resource readers
// =============================================================================

function readUpstream(raw: RawObject, index: number): UpstreamSpec {
  const path = `upstreams[${index}]`;
  return {
    name: requireString(raw, 'name', path),
    targets: readTargets(raw.targets, `${path}.targets`),
  };
}

function readService(raw: RawObject, index: number): ServiceSpec {
  const path = `services[${index}]`;
  return {
    name: requireString(raw, 'name', path),
    url: readString(raw, 'url', path),
    upstream: readString(raw, 'upstream', path),
    protocol: readString(raw, 'protocol', path),
    port: readInt(raw, 'port', path),
    path: readString(raw, 'path', path),
    retries: readInt(raw, 'retries', path),
    connect_timeout: readInt(raw, 'connect_timeout', path),
    read_timeout: readInt(raw, 'read_timeout', path),
    write_timeout: readInt(raw, 'write_timeout', path),
    targets: readTargets(raw.targets, `${path}.targets`),
  };
}

/**
 * @param path - `routes[i]` in a document, `[i]` in a bare list, `route` for a single object
 */
function readRoute(raw: RawObject, path: string): RouteSpec {
  return {
    name: readString(raw, 'name', path),
    service: readString(raw, 'service', path),
    hosts: readStringList(raw, 'hosts', path),
    paths: readStringList(raw, 'paths', path),
    methods: readStringList(raw, 'methods', path),
    protocols: readStringList(raw, 'protocols', path),
    snis: readStringList(raw, 'snis', path),
    tags: readStringList(raw, 'tags', path),
    headers: readHeaders(raw.headers, `${path}.headers`),
    strip_path: readBool(raw, 'strip_path', path),
    preserve_host: readBool(raw, 'preserve_host', path),
    request_buffering: readBool(raw, 'request_buffering', path),
    response_buffering: readBool(raw, 'response_buffering', path),
    path_handling: readString(raw, 'path_handling', path),
    regex_priority: readInt(raw, 'regex_priority', path),
    https_redirect_status_code: readInt(raw, 'https_redirect_status_code', path),
    service_name: readString(raw, 'service_name', path),
    upstream_name: readString(raw, 'upstream_name', path),
    backend: readBackend(raw.backend, `${path}.backend`),
  };
}

function readBackend(value: unknown, path: string): BackendSpec | undefined {
  if (value === undefined || value === null) return undefined;
  const raw = asObject(value, path);
  return {
    protocol: readString(raw, 'protocol', path),
    port: readInt(raw, 'port', path),
    path: readString(raw, 'path', path),
    targets: readTargets(raw.targets, `${path}.targets`),
  };
}

function readTargets(value: unknown, path: string): TargetSpec[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ValidationError('must be a list of targets', path);
  }
  return value.map((item, index) => {
    const itemPath = `${path}[${index}]`;
    const raw = asObject(item, itemPath);
    return {
      target: requireString(raw, 'target', itemPath),
      weight: readInt(raw, 'weight', itemPath),
    };
  });
}

function readHeaders(value: unknown, path: string): Record<string, string[]> | undefined {
  if (value === undefined || value === null) return undefined;
  const raw = asObject(value, path);
  const headers: Record<string, string[]> = {};
  for (const [name, entry] of Object.entries(raw)) {
    if (isScalar(entry)) {
      headers[name] = [String(entry)];
    } else if (Array.isArray(entry) && entry.every(isScalar)) {
      headers[name] = entry.map(String);
    } else {
      throw new ValidationError('must be a string or a list of strings', `${path}.${name}`);
    }
  }
  return headers;
}

// =============================================================================
// Field readers
// =============================================================================

function isObject(value: unknown): value is RawObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isNonEmptyList(value: unknown): boolean {
  return Array.isArray(value) && value.length > 0;
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function asObject(value: unknown, path: string): RawObject {
  if (!isObject(value)) {
    throw new ValidationError('must be an object', path);
  }
  return value;
}

function readObjectList(raw: RawObject, key: string, path: string): RawObject[] {
  const value = raw[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ValidationError('must be a list', path);
  }
  return value.map((item, index) => asObject(item, `${path}[${index}]`));
}

function readString(raw: RawObject, key: string, path: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  // YAML reads bare numbers such as `port: 8080` or a numeric name as numbers
  if (typeof value === 'string' || typeof value === 'number') return String(value);
  throw new ValidationError('must be a string', `${path}.${key}`);
}

function requireString(raw: RawObject, key: string, path: string): string {
  const value = readString(raw, key, path);
  if (value === undefined || value.trim() === '') {
    throw new ValidationError('is required', `${path}.${key}`);
  }
  return value;
}

function readInt(raw: RawObject, key: string, path: string): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  throw new ValidationError('must be an integer', `${path}.${key}`);
}

function readBool(raw: RawObject, key: string, path: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'boolean') return value;
  throw new ValidationError('must be true or false', `${path}.${key}`);
}

function readStringList(raw: RawObject, key: string, path: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (Array.isArray(value) && value.every(isScalar)) return value.map(String);
  throw new ValidationError('must be a list of strings', `${path}.${key}`);
}
