/**
 * Control commands -- start, stop or restart one server through the gateway.
 *
 * Usage:
 *   hostwarden start <server-id> [--reason text]
 *   hostwarden stop lobby -r "maintenance"
 *   hostwarden restart lobby --config ./hostwarden.json
 */

import { toError, type ServerAction } from '@hostwarden/core';
import { loadConfig } from '../config.js';
import { CHECK, CROSS, DIM, RED, RESET } from '../ui.js';
import { parseCommandArgs } from './args.js';
import { gatewayBaseUrl, requestGateway } from './client.js';

/** Reason sent when none is given on the command line. */
export const DEFAULT_CLI_REASON = 'cli';

export async function control(action: ServerAction, args: string[]): Promise<void> {
  const parsed = parseCommandArgs(args);
  const serverId = parsed.positionals[0];

  if (!serverId) {
    console.error(`\n  ${RED}Error:${RESET} Server id is required.`);
    console.error(`  ${DIM}Usage: hostwarden ${action} <server-id> [--reason text]${RESET}\n`);
    process.exitCode = 1;
    return;
  }

  let baseUrl: string;
  try {
    baseUrl = gatewayBaseUrl(loadConfig(parsed.config ?? undefined).gateway);
  } catch (err) {
    console.error(`\n  ${RED}Failed to load config:${RESET} ${toError(err).message}\n`);
    process.exitCode = 1;
    return;
  }

  const reason = parsed.reason ?? DEFAULT_CLI_REASON;
  try {
    await requestGateway(baseUrl, 'POST', `/v1/${action}`, { server_id: serverId, reason });
    console.log(`  ${CHECK} ${action} ${serverId} ${DIM}(${reason})${RESET}`);
  } catch (err) {
    console.error(`  ${CROSS} ${action} ${serverId}: ${toError(err).message}`);
    process.exitCode = 1;
  }
}
