/**
 * Plan execution
 *
 * Creates always run. Updates run only with overwrite enabled; otherwise
 * they are recorded as skips. The first failing call aborts the rest of
 * the plan.
 */

import type { GatewayClient } from '../api/client.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import { DependencyError, ExecutionError, isReconcileError } from '../errors.js';
import {
  applyTarget,
  createRoute,
  createService,
  createUpstream,
  formatResourceRef,
  routeChangesService,
  updateRoute,
  updateService,
  type Change,
  type RouteChange,
} from '../reconcilers/index.js';
import type { ApplyOptions, ApplyResult, ExecutionStatus, Plan } from './types.js';

/**
 * Execute a plan against the gateway
 */
export async function applyPlan(client: GatewayClient, plan: Plan, options: ApplyOptions): Promise<ApplyResult> {
  const log = options.logger ?? defaultLogger;
  const createdServiceIds = new Map<string, string>();
  const result: ApplyResult = {
    results: [],
    summary: { created: 0, updated: 0, skipped: 0, unchanged: 0, failed: 0 },
    skips: [],
    errors: [],
    success: true,
  };

  const record = (change: Change, status: ExecutionStatus, error?: string): void => {
    result.results.push({ kind: change.kind, name: change.name, status, error });
    result.summary[status] += 1;
  };

  for (const change of plan.changes) {
    if (change.action === 'none') {
      record(change, 'unchanged');
      continue;
    }

    if (change.action === 'update' && !options.overwrite) {
      record(change, 'skipped');
      result.skips.push({
        kind: change.kind,
        name: change.name,
        fields: change.fields.map((field) => field.field),
      });
      continue;
    }

    const action = change.action;
    try {
      log.debug(`${action} ${formatResourceRef(change.kind, change.name)}`, {
        fields: change.fields.map((field) => field.field),
      });
      await executeChange(client, change, createdServiceIds);
      record(change, action === 'create' ? 'created' : 'updated');
    } catch (error) {
      const failure = isReconcileError(error)
        ? error
        : new ExecutionError(change.kind, change.name, action, error);
      log.debug(`Aborting plan: ${failure.message}`);
      record(change, 'failed', failure.message);
      result.errors.push(failure.message);
      result.success = false;
      result.error = failure;
      break;
    }
  }

  return result;
}

async function executeChange(
  client: GatewayClient,
  change: Change,
  createdServiceIds: Map<string, string>
): Promise<void> {
  switch (change.kind) {
    case 'upstream':
      await createUpstream(client, change);
      return;
    case 'target':
      await applyTarget(client, change);
      return;
    case 'service':
      if (change.action === 'create') {
        const service = await createService(client, change);
        createdServiceIds.set(change.name, service.id);
      } else {
        await updateService(client, change);
      }
      return;
    case 'route':
      if (change.action === 'create') {
        await createRoute(client, change, await resolveServiceId(client, change, createdServiceIds));
      } else {
        const serviceId = routeChangesService(change)
          ? await resolveServiceId(client, change, createdServiceIds)
          : undefined;
        await updateRoute(client, change, serviceId);
      }
      return;
  }
}

/**
 * Id of the route's service: created earlier in this run, resolved while
 * planning, or looked up
 */
async function resolveServiceId(
  client: GatewayClient,
  change: RouteChange,
  createdServiceIds: ReadonlyMap<string, string>
): Promise<string> {
  const service = change.desired.service;
  const created = createdServiceIds.get(service);
  if (created !== undefined) {
    return created;
  }
  if (change.serviceId !== undefined) {
    return change.serviceId;
  }
  const existing = await client.services.get(service);
  if (!existing) {
    throw new DependencyError('route', change.name, { kind: 'service', name: service });
  }
  return existing.id;
}
