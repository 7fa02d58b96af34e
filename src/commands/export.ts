/**
 * export command - Dump remote upstreams, services and routes as a document
 */

import { existsSync, writeFileSync } from 'node:fs';
import { stringify as stringifyYaml } from 'yaml';
import type { GatewayClient } from '../api/client.js';
import { ConfigError } from '../errors.js';
import { exportDocument, type ExportResult } from '../spec/export.js';
import type { CommandContext, CommandResult } from '../types.js';
import { success, verbose, warn } from '../utils/output.js';
import { clientFromContext, failureResult } from './shared.js';

export interface ExportCommandOptions {
  /** Write to this file instead of stdout */
  output?: string;
  /** Fold services and upstreams into their routes */
  shorthand?: boolean;
  /** With shorthand: append upstreams no route uses */
  includeOrphans?: boolean;
  /** Overwrite an existing output file */
  force?: boolean;
}

/**
 * Execute the export command
 *
 * @param client - overrides the client built from the admin settings
 */
export async function exportCommand(
  ctx: CommandContext,
  options: ExportCommandOptions = {},
  client: GatewayClient = clientFromContext(ctx)
): Promise<CommandResult<ExportResult>> {
  verbose(`Executing export command`, ctx.options.verbose);

  try {
    if (options.includeOrphans && !options.shorthand) {
      throw new ConfigError('--include-orphans requires --shorthand');
    }
    if (options.output && existsSync(options.output) && !options.force) {
      throw new ConfigError(`${options.output} already exists`, 'Pass --force to overwrite it');
    }

    const result = await exportDocument(client, {
      shorthand: options.shorthand,
      includeOrphans: options.includeOrphans,
    });
    const text = stringifyYaml(result.document);

    if (ctx.outputFormat === 'human') {
      for (const reason of result.skipped) {
        warn(`Skipped ${reason}`);
      }
    }

    if (options.output) {
      writeFileSync(options.output, text);
      if (ctx.outputFormat === 'human') {
        success(`Exported to ${options.output}`);
      }
    } else if (ctx.outputFormat === 'human') {
      process.stdout.write(text);
    }

    return {
      success: true,
      message: options.output ? `Exported to ${options.output}` : 'Exported remote state',
      data: result,
    };
  } catch (err) {
    return failureResult(ctx, 'Export failed', err);
  }
}
