/**
 * Admin API connection settings
 *
 * Resolution priority (highest to lowest):
 * 1. CLI flag (--admin-url, --token, --workspace, --timeout, ...)
 * 2. Environment variable (GATESYNC_ADMIN_URL, GATESYNC_TOKEN, ...)
 * 3. Config file (~/.gatesync/config.yaml, or --config / GATESYNC_CONFIG)
 * 4. Defaults
 */

import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { DEFAULT_TIMEOUT_MS, normalizeAdminUrl } from '../api/client.js';
import { ConfigError } from '../errors.js';
import type { AdminConfig, ConfigSource } from '../types.js';

export const DEFAULT_ADMIN_URL = 'http://localhost:8001';

/** Environment variable names */
export const ENV = {
  adminUrl: 'GATESYNC_ADMIN_URL',
  token: 'GATESYNC_TOKEN',
  workspace: 'GATESYNC_WORKSPACE',
  tlsSkipVerify: 'GATESYNC_TLS_SKIP_VERIFY',
  timeout: 'GATESYNC_TIMEOUT',
  config: 'GATESYNC_CONFIG',
  noColor: 'NO_COLOR',
} as const;

/**
 * Config file contents (snake_case keys)
 */
export interface ConfigFile {
  admin_url?: string;
  token?: string;
  workspace?: string;
  tls_skip_verify?: boolean;
  no_color?: boolean;
  timeout?: number;
}

/**
 * Values given on the command line
 */
export interface AdminConfigFlags {
  adminUrl?: string;
  token?: string;
  workspace?: string;
  config?: string;
  tlsSkipVerify?: boolean;
  noColor?: boolean;
  timeout?: number;
}

type Env = Record<string, string | undefined>;

export function defaultConfigPath(): string {
  return join(homedir(), '.gatesync', 'config.yaml');
}

export function configPathFrom(flags: Pick<AdminConfigFlags, 'config'>, env: Env = process.env): string {
  return flags.config || env[ENV.config] || defaultConfigPath();
}

// =============================================================================
// Config file
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Read the config file; a missing file yields null
 *
 * @throws ConfigError when the file is not valid YAML or has mistyped keys
 */
export function loadConfigFile(path: string): ConfigFile | null {
  if (!existsSync(path)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to parse config file ${path}: ${err instanceof Error ? err.message : String(err)}`,
      'Fix the YAML syntax or run `gatesync init` to rewrite it',
      { cause: err }
    );
  }

  if (raw === null || raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`Config file ${path} must contain a mapping`);
  }
  const data = raw;

  const config: ConfigFile = {};
  const str = (key: 'admin_url' | 'token' | 'workspace'): void => {
    const value = data[key];
    if (value === undefined || value === null) return;
    if (typeof value !== 'string') throw new ConfigError(`${path}: ${key} must be a string`);
    config[key] = value;
  };
  const bool = (key: 'tls_skip_verify' | 'no_color'): void => {
    const value = data[key];
    if (value === undefined || value === null) return;
    if (typeof value !== 'boolean') throw new ConfigError(`${path}: ${key} must be true or false`);
    config[key] = value;
  };
  str('admin_url');
  str('token');
  str('workspace');
  bool('tls_skip_verify');
  bool('no_color');
  const timeout = data.timeout;
  if (timeout !== undefined && timeout !== null) {
    if (typeof timeout !== 'number' || !Number.isInteger(timeout) || timeout <= 0) {
      throw new ConfigError(`${path}: timeout must be a positive integer (milliseconds)`);
    }
    config.timeout = timeout;
  }
  return config;
}

/**
 * Write the config file, readable by the owner only
 */
export function writeConfigFile(path: string, config: ConfigFile): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, stringifyYaml(config), { mode: 0o600 });
  // mode only applies when the file is created
  chmodSync(path, 0o600);
}

// =============================================================================
// Resolution
// =============================================================================

export function parseBoolEnv(value: string | undefined): boolean {
  return ['1', 'true', 'yes', 'on'].includes((value ?? '').trim().toLowerCase());
}

export function parseTimeout(value: string, source: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ConfigError(`${source} must be a positive integer (milliseconds), got "${value}"`);
  }
  return timeout;
}

function pick(
  flag: string | undefined,
  env: string | undefined,
  file: string | undefined
): { value?: string; source?: ConfigSource } {
  if (flag) return { value: flag, source: 'flag' };
  if (env) return { value: env, source: 'env' };
  if (file) return { value: file, source: 'file' };
  return {};
}

/**
 * Merge flags, environment, config file and defaults
 */
export function resolveAdminConfig(flags: AdminConfigFlags = {}, env: Env = process.env): AdminConfig {
  const configPath = configPathFrom(flags, env);
  const file = loadConfigFile(configPath);

  const adminUrl = pick(flags.adminUrl, env[ENV.adminUrl], file?.admin_url);
  const token = pick(flags.token, env[ENV.token], file?.token);
  const workspace = pick(flags.workspace, env[ENV.workspace], file?.workspace);

  const envTimeout = env[ENV.timeout];
  const timeout =
    flags.timeout ??
    (envTimeout ? parseTimeout(envTimeout, ENV.timeout) : undefined) ??
    file?.timeout ??
    DEFAULT_TIMEOUT_MS;

  const noColorEnv = env[ENV.noColor];

  return {
    adminUrl: normalizeAdminUrl(adminUrl.value ?? DEFAULT_ADMIN_URL),
    token: token.value,
    workspace: workspace.value,
    tlsSkipVerify:
      flags.tlsSkipVerify === true || parseBoolEnv(env[ENV.tlsSkipVerify]) || file?.tls_skip_verify === true,
    noColor: flags.noColor === true || (noColorEnv !== undefined && noColorEnv !== '') || file?.no_color === true,
    timeout,
    configPath: file ? configPath : undefined,
    sources: {
      adminUrl: adminUrl.source ?? 'default',
      token: token.source,
      workspace: workspace.source,
    },
  };
}
