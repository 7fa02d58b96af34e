/**
 * init command - Find a reachable Admin API and save it to the config file
 */

import { createClient, normalizeAdminUrl } from '../api/client.js';
import type { PingResult } from '../api/types.js';
import { configPathFrom, ENV, loadConfigFile, writeConfigFile, type ConfigFile } from '../config/admin.js';
import type { CommandContext, CommandResult } from '../types.js';
import { info, success, error as printError, verbose } from '../utils/output.js';
import { failureResult } from './shared.js';

/** Probed after the flag and the environment, in order */
export const DEFAULT_CANDIDATES = [
  'http://localhost:8001',
  'https://localhost:8444',
  'http://127.0.0.1:8001',
  'http://host.docker.internal:8001',
] as const;

export interface InitOptions {
  adminUrl?: string;
  token?: string;
  workspace?: string;
}

export interface InitResult {
  adminUrl?: string;
  configPath: string;
  attempts: PingResult[];
}

export type AdminProbe = (adminUrl: string, options: { token?: string; workspace?: string }) => Promise<PingResult>;

export interface InitDeps {
  probe?: AdminProbe;
  env?: Record<string, string | undefined>;
}

/**
 * Candidate URLs in probe order, without duplicates
 */
export function initCandidates(flag: string | undefined, env: string | undefined): string[] {
  const urls = [flag, env, ...DEFAULT_CANDIDATES].filter((url): url is string => Boolean(url?.trim()));
  return [...new Set(urls.map(normalizeAdminUrl))];
}

/**
 * Execute the init command
 */
export async function initCommand(
  ctx: CommandContext,
  options: InitOptions = {},
  deps: InitDeps = {}
): Promise<CommandResult<InitResult>> {
  const env = deps.env ?? process.env;
  const probe: AdminProbe =
    deps.probe ??
    ((adminUrl, auth) =>
      createClient({ adminUrl, ...auth, timeout: ctx.admin.timeout, debug: ctx.options.verbose }).ping());
  const token = options.token ?? ctx.options.token ?? env[ENV.token];
  const workspace = options.workspace ?? ctx.options.workspace ?? env[ENV.workspace];
  const configPath = configPathFrom({ config: ctx.options.config }, env);

  const attempts: PingResult[] = [];
  try {
    for (const candidate of initCandidates(options.adminUrl ?? ctx.options.adminUrl, env[ENV.adminUrl])) {
      verbose(`Probing ${candidate}`, ctx.options.verbose);
      const result = await probe(candidate, { token, workspace });
      attempts.push(result);
      if (!result.ok) {
        continue;
      }

      const config: ConfigFile = { ...loadConfigFile(configPath), admin_url: candidate };
      if (token) config.token = token;
      if (workspace) config.workspace = workspace;
      writeConfigFile(configPath, config);

      const message = `Saved ${candidate} to ${configPath}`;
      if (ctx.outputFormat === 'human') {
        success(`Admin API found at ${candidate}${result.version ? ` (version ${result.version})` : ''}`);
        info(message);
      }
      return { success: true, message, data: { adminUrl: candidate, configPath, attempts } };
    }
  } catch (err) {
    return failureResult(ctx, 'Init failed', err);
  }

  const message = 'No reachable Admin API found';
  const errors = attempts.map((attempt) => `${attempt.endpoint}: ${attempt.reason ?? 'unreachable'}`);
  if (ctx.outputFormat === 'human') {
    printError(message);
    errors.forEach((line) => info(line));
    info('Pass --admin-url <url> or set GATESYNC_ADMIN_URL');
  }
  return { success: false, message, data: { configPath, attempts }, errors };
}
