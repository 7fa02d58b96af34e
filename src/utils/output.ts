/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { ApplyResult, ExecutionStatus } from '../plan/types.js';
import { formatResourceRef } from '../reconcilers/types.js';
import type { CommandResult, OutputFormat } from '../types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

const STATUS_STYLES: Record<ExecutionStatus, { icon: string; color: (text: string) => string }> = {
  created: { icon: '+', color: chalk.green },
  updated: { icon: '~', color: chalk.yellow },
  skipped: { icon: '!', color: chalk.yellow },
  unchanged: { icon: '=', color: chalk.gray },
  failed: { icon: '✗', color: chalk.red },
};

/**
 * One line per resource, then the skipped updates and the totals
 */
export function printApplyResult(result: ApplyResult): void {
  for (const entry of result.results) {
    const style = STATUS_STYLES[entry.status];
    const line = `${style.icon} ${formatResourceRef(entry.kind, entry.name)}: ${entry.status}`;
    console.log(style.color(entry.error ? `${line} (${entry.error})` : line));
  }

  if (result.skips.length > 0) {
    console.log(chalk.yellow(`\n${result.skips.length} existing resource(s) differ and were not updated:`));
    for (const skip of result.skips) {
      console.log(chalk.yellow(`  • ${formatResourceRef(skip.kind, skip.name)}: ${skip.fields.join(', ')}`));
    }
    console.log(chalk.gray('  Re-run with --overwrite to update them.'));
  }

  const { created, updated, skipped, unchanged, failed } = result.summary;
  console.log(
    chalk.bold(`\nCreated ${created}, updated ${updated}, skipped ${skipped}, unchanged ${unchanged}, failed ${failed}`)
  );
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}
