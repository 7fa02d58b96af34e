/**
 * Helpers shared by the command handlers
 */

import { ApiRequestError, createClient, type GatewayClient } from '../api/index.js';
import { isReconcileError } from '../errors.js';
import type { CommandContext, CommandResult } from '../types.js';
import { error as printError, info } from '../utils/output.js';

/**
 * Client for the resolved admin connection
 */
export function clientFromContext(ctx: CommandContext): GatewayClient {
  return createClient({
    adminUrl: ctx.admin.adminUrl,
    token: ctx.admin.token,
    workspace: ctx.admin.workspace,
    timeout: ctx.admin.timeout,
    debug: ctx.options.verbose,
  });
}

/**
 * Turn a thrown error into a failed result, printing it in human mode
 */
export function failureResult<T>(ctx: CommandContext, prefix: string, err: unknown): CommandResult<T> {
  const message = err instanceof Error ? err.message : String(err);
  const suggestion = isReconcileError(err) ? err.suggestion : undefined;

  if (ctx.outputFormat === 'human') {
    printError(`${prefix}: ${message}`);
    if (suggestion) {
      info(suggestion);
    }
    if (err instanceof ApiRequestError && err.isTransportError()) {
      info(`Is the gateway Admin API reachable at ${ctx.admin.adminUrl}? Try \`gatesync ping\`.`);
    }
  }

  return {
    success: false,
    message: `${prefix}: ${message}`,
    errors: [isReconcileError(err) ? err.toUserMessage() : message],
  };
}
