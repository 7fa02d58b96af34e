/**
 * apply command - Reconcile the gateway against a declarative document
 */

import { readFileSync } from 'node:fs';
import type { GatewayClient } from '../api/client.js';
import { ConfigError } from '../errors.js';
import { applyPlan, buildPlan, renderPlan } from '../plan/index.js';
import type { ApplyResult, Plan, PlanSummary } from '../plan/types.js';
import type { Action, ResourceKind } from '../reconcilers/types.js';
import { loadDocument } from '../spec/normalize.js';
import type { CommandContext, CommandResult } from '../types.js';
import { dryRunNotice, info, printApplyResult, verbose } from '../utils/output.js';
import { clientFromContext, failureResult } from './shared.js';

export interface ApplyCommandOptions {
  /** Document path */
  file: string;
  /** Render the plan with field diffs before executing */
  diff?: boolean;
  /** Hide unchanged entries in the rendered plan */
  compact?: boolean;
  /** Plain-text icons and separators */
  ascii?: boolean;
  /** Update existing resources that differ */
  overwrite?: boolean;
}

export interface PlannedChange {
  kind: ResourceKind;
  name: string;
  action: Action;
  fields: string[];
}

export interface ApplyCommandData {
  dryRun: boolean;
  summary: PlanSummary;
  changes: PlannedChange[];
  /** Absent on a dry run */
  result?: Omit<ApplyResult, 'error'>;
}

function readDocumentFile(file: string): string {
  try {
    return readFileSync(file, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`,
      'Pass the document path with -f <file>',
      { cause: err }
    );
  }
}

function describePlan(plan: Plan): PlannedChange[] {
  return plan.changes.map((change) => ({
    kind: change.kind,
    name: change.name,
    action: change.action,
    fields: change.fields.map((field) => field.field),
  }));
}

/**
 * Execute the apply command
 *
 * @param client - overrides the client built from the admin settings
 */
export async function applyCommand(
  ctx: CommandContext,
  options: ApplyCommandOptions,
  client: GatewayClient = clientFromContext(ctx)
): Promise<CommandResult<ApplyCommandData>> {
  const { options: globalOpts, outputFormat } = ctx;
  const overwrite = options.overwrite === true;

  verbose(`Executing apply command`, globalOpts.verbose);
  verbose(`Document: ${options.file}`, globalOpts.verbose);
  verbose(`Admin API: ${ctx.admin.adminUrl} (${ctx.admin.sources.adminUrl})`, globalOpts.verbose);

  let plan: Plan;
  try {
    const { shape, document } = loadDocument(readDocumentFile(options.file));
    verbose(`Document shape: ${shape}`, globalOpts.verbose);
    plan = await buildPlan(client, document);
  } catch (err) {
    return failureResult(ctx, 'Planning failed', err);
  }

  const renderLines = (): string[] =>
    renderPlan(plan, {
      ascii: options.ascii,
      color: !ctx.admin.noColor,
      compact: options.compact,
      showDiff: options.diff,
      overwrite,
    });

  const data: ApplyCommandData = {
    dryRun: globalOpts.dryRun,
    summary: plan.summary,
    changes: describePlan(plan),
  };

  if (globalOpts.dryRun) {
    if (outputFormat === 'human') {
      dryRunNotice();
      renderLines().forEach((line) => console.log(line));
    }
    return { success: true, message: `Planned ${plan.changes.length} resource(s)`, data };
  }

  if (outputFormat === 'human' && options.diff) {
    renderLines().forEach((line) => console.log(line));
    console.log();
  }

  const result = await applyPlan(client, plan, { overwrite });
  const { error: fatal, ...serializable } = result;
  data.result = serializable;

  if (outputFormat === 'human') {
    printApplyResult(result);
    if (fatal?.suggestion) {
      info(fatal.suggestion);
    }
  }

  if (!result.success) {
    return {
      success: false,
      message: `Apply stopped: ${fatal?.message ?? 'a change failed'}`,
      data,
      errors: result.errors,
    };
  }

  const { created, updated, skipped } = result.summary;
  return {
    success: true,
    message: `Applied: ${created} created, ${updated} updated, ${skipped} skipped`,
    data,
  };
}
