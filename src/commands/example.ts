/**
 * apply example command - Print or write a commented document template
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { ConfigError } from '../errors.js';
import type { CommandContext, CommandResult } from '../types.js';
import { success, verbose } from '../utils/output.js';
import { failureResult } from './shared.js';

export const EXAMPLE_TYPES = ['full', 'routes-simple', 'route-basic', 'route-simple'] as const;
export type ExampleType = (typeof EXAMPLE_TYPES)[number];

export interface ExampleOptions {
  /** Template name (default: full) */
  type?: string;
  /** False when --no-comments was given */
  comments?: boolean;
  /** Write to this file instead of stdout */
  output?: string;
  /** Overwrite an existing output file */
  force?: boolean;
}

function isExampleType(value: string): value is ExampleType {
  return EXAMPLE_TYPES.some((type) => type === value);
}

/**
 * Template text, optionally with comments removed
 */
export function loadExample(type: ExampleType, comments = true): string {
  const text = readFileSync(new URL(`../../templates/${type}.yaml`, import.meta.url), 'utf-8');
  return comments ? text : stringifyYaml(parseYaml(text));
}

/**
 * Execute the apply example command
 */
export async function exampleCommand(
  ctx: CommandContext,
  options: ExampleOptions = {}
): Promise<CommandResult<{ type: ExampleType; output?: string; content: string }>> {
  const type = options.type ?? 'full';
  verbose(`Executing apply example command (type: ${type})`, ctx.options.verbose);

  try {
    if (!isExampleType(type)) {
      throw new ConfigError(`Unknown example type "${type}"`, `Choose one of: ${EXAMPLE_TYPES.join(', ')}`);
    }
    const content = loadExample(type, options.comments !== false);

    if (!options.output) {
      if (ctx.outputFormat === 'human') {
        process.stdout.write(content);
      }
      return { success: true, message: `Example "${type}"`, data: { type, content } };
    }

    if (existsSync(options.output) && !options.force) {
      throw new ConfigError(`${options.output} already exists`, 'Pass --force to overwrite it');
    }
    writeFileSync(options.output, content);
    if (ctx.outputFormat === 'human') {
      success(`Wrote ${type} example to ${options.output}`);
    }
    return {
      success: true,
      message: `Wrote ${type} example to ${options.output}`,
      data: { type, output: options.output, content },
    };
  } catch (err) {
    return failureResult(ctx, 'Example failed', err);
  }
}
