/**
 * ping command - Check that the admin URL answers like a gateway Admin API
 */

import type { GatewayClient } from '../api/client.js';
import type { PingResult } from '../api/types.js';
import type { CommandContext, CommandResult } from '../types.js';
import { error as printError, success, verbose } from '../utils/output.js';
import { clientFromContext } from './shared.js';

/**
 * Execute the ping command
 */
export async function pingCommand(
  ctx: CommandContext,
  client: GatewayClient = clientFromContext(ctx)
): Promise<CommandResult<PingResult>> {
  verbose(`Pinging ${ctx.admin.adminUrl}`, ctx.options.verbose);

  const result = await client.ping();
  const version = result.version ? ` (version ${result.version})` : '';

  if (result.ok) {
    const message = `Admin API reachable at ${result.endpoint}${version}`;
    if (ctx.outputFormat === 'human') success(message);
    return { success: true, message, data: result };
  }

  const message = `Admin API not reachable at ${ctx.admin.adminUrl}: ${result.reason ?? 'unknown error'}`;
  if (ctx.outputFormat === 'human') printError(message);
  return { success: false, message, data: result, errors: [message] };
}
