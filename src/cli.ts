#!/usr/bin/env node
/**
 * gatesync CLI - Declarative configuration for an API gateway Admin API
 *
 * Commands:
 * - apply: Plan and apply upstreams, targets, services and routes from a document
 * - apply example: Print a commented document template
 * - export: Dump remote state as an apply-compatible document
 * - ping: Check the Admin API connection
 * - init: Find a reachable Admin API and save it to the config file
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError, Option } from 'commander';
import type { GlobalOptions, CommandContext, CommandResult } from './types.js';
import { applyCommand, exampleCommand, exportCommand, initCommand, pingCommand } from './commands/index.js';
import { printResult, error, warn, verbose as verboseLog } from './utils/output.js';
import { resolveAdminConfig, ENV } from './config/index.js';
import { isReconcileError } from './errors.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 * Resolves the admin connection from flags, env and the config file
 */
function createContext(options: GlobalOptions): CommandContext {
  const admin = resolveAdminConfig({
    adminUrl: options.adminUrl,
    token: options.token,
    workspace: options.workspace,
    config: options.config,
    tlsSkipVerify: options.tlsSkipVerify,
    noColor: !options.color,
    timeout: options.timeout,
  });

  if (admin.noColor) {
    chalk.level = 0;
  }

  if (admin.tlsSkipVerify) {
    // Read by Node's TLS layer for every connection made after this point
    process.env.NODE_TLS_REJECT_UNAUTHORIZED = '0';
    if (!options.json) {
      warn('TLS certificate verification is disabled');
    }
  }

  if (options.verbose) {
    verboseLog(`Admin API: ${admin.adminUrl} (via ${admin.sources.adminUrl})`, true);
    verboseLog(`Config file: ${admin.configPath ?? '(none)'}`, true);
    if (admin.workspace) {
      verboseLog(`Workspace: ${admin.workspace} (via ${admin.sources.workspace ?? 'default'})`, true);
    }
  }

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    admin,
  };
}

function parseTimeoutOption(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new InvalidArgumentError('Expected a positive integer (milliseconds).');
  }
  return timeout;
}

/**
 * Build the context, run a command, print JSON results and exit
 */
async function run<T>(label: string, command: (ctx: CommandContext) => Promise<CommandResult<T>>): Promise<void> {
  const globalOpts = program.opts<GlobalOptions>();
  try {
    const ctx = createContext(globalOpts);
    const result = await command(ctx);

    if (ctx.outputFormat === 'json') {
      printResult(result, ctx.outputFormat);
    }

    process.exit(result.success ? 0 : 1);
  } catch (err) {
    const message = isReconcileError(err) ? err.toUserMessage() : err instanceof Error ? err.message : String(err);
    if (globalOpts.json) {
      printResult({ success: false, message: `${label} failed: ${message}`, errors: [message] }, 'json');
    } else {
      error(`${label} failed: ${message}`);
    }
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('gatesync')
  .description('Declarative configuration for an API gateway Admin API')
  .version(VERSION)
  // Global options available to all commands
  // Environment fallbacks are applied by resolveAdminConfig
  .addOption(new Option('--admin-url <url>', `Admin API URL (env: ${ENV.adminUrl})`))
  .addOption(new Option('--token <token>', `Admin API token (env: ${ENV.token})`))
  .addOption(new Option('--workspace <name>', `Workspace to operate in (env: ${ENV.workspace})`))
  .addOption(new Option('--config <path>', `Config file (env: ${ENV.config}, default: ~/.gatesync/config.yaml)`))
  .addOption(new Option('--tls-skip-verify', 'Skip TLS certificate verification').default(false))
  .addOption(new Option('--timeout <ms>', 'Request timeout in milliseconds').argParser(parseTimeoutOption))
  .addOption(new Option('--no-color', 'Disable coloured output'))
  .addOption(new Option('--dry-run', 'Show what would happen without making changes').default(false))
  .addOption(new Option('--json', 'Output JSON for CI/automation').default(false))
  .addOption(new Option('-v, --verbose', 'Enable verbose logging').default(false));

interface ApplyCliOptions {
  file?: string;
  diff?: boolean;
  compact?: boolean;
  ascii?: boolean;
  overwrite?: boolean;
}

/**
 * apply command - Plan and apply a document
 */
const apply = program
  .command('apply')
  .description('Create or update upstreams, targets, services and routes from a document')
  .option('-f, --file <path>', 'YAML or JSON document to apply')
  .option('--diff', 'Show the plan with field-level diffs before applying', false)
  .option('--compact', 'Hide unchanged resources in the plan', false)
  .option('--ascii', 'Use plain-text icons in the plan', false)
  .option('--overwrite', 'Update existing resources that differ from the document', false)
  .action(async (cmdOpts: ApplyCliOptions) => {
    const file = cmdOpts.file;
    await run('Apply', async (ctx) => {
      if (!file) {
        return { success: false, message: 'Missing document: pass -f <file>', errors: ['-f <file> is required'] };
      }
      return applyCommand(ctx, {
        file,
        diff: cmdOpts.diff,
        compact: cmdOpts.compact,
        ascii: cmdOpts.ascii,
        overwrite: cmdOpts.overwrite,
      });
    });
  });

interface ExampleCliOptions {
  type: string;
  comments: boolean;
  output?: string;
  force?: boolean;
}

/**
 * apply example command - Print a document template
 */
apply
  .command('example')
  .description('Print a commented example document')
  .option('--type <type>', 'Template: full, routes-simple, route-basic or route-simple', 'full')
  .option('--no-comments', 'Strip comments from the template')
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .option('--force', 'Overwrite the output file if it exists', false)
  .action(async (cmdOpts: ExampleCliOptions) => {
    await run('Example', (ctx) =>
      exampleCommand(ctx, {
        type: cmdOpts.type,
        comments: cmdOpts.comments,
        output: cmdOpts.output,
        force: cmdOpts.force,
      })
    );
  });

interface ExportCliOptions {
  output?: string;
  shorthand?: boolean;
  includeOrphans?: boolean;
  force?: boolean;
}

/**
 * export command - Dump remote state
 */
program
  .command('export')
  .description('Export remote upstreams, services and routes as an apply-compatible document')
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .option('--shorthand', 'Fold each service and upstream into the route that uses it', false)
  .option('--include-orphans', 'With --shorthand, also export upstreams no route uses', false)
  .option('--force', 'Overwrite the output file if it exists', false)
  .action(async (cmdOpts: ExportCliOptions) => {
    await run('Export', (ctx) => exportCommand(ctx, cmdOpts));
  });

/**
 * ping command - Check the Admin API connection
 */
program
  .command('ping')
  .description('Check that the Admin API is reachable')
  .action(async () => {
    await run('Ping', (ctx) => pingCommand(ctx));
  });

/**
 * init command - Discover the Admin API and save the connection
 */
program
  .command('init')
  .description('Find a reachable Admin API and save it to the config file')
  .action(async () => {
    await run('Init', (ctx) => initCommand(ctx));
  });

// Parse and execute
await program.parseAsync();
