/**
 * Status command -- print the fleet snapshot served by a running gateway.
 *
 * Usage:
 *   hostwarden status
 *   hostwarden status --config ./hostwarden.json
 */

import { InvalidArgumentError, toError } from '@hostwarden/core';
import { loadConfig } from '../config.js';
import { BOLD, CYAN, DIM, RED, RESET, colorHealth, colorStatus, table } from '../ui.js';
import { parseCommandArgs } from './args.js';
import { gatewayBaseUrl, requestGateway } from './client.js';

// ---------------------------------------------------------------------------
// Snapshot parsing
// ---------------------------------------------------------------------------

export interface StatusRow {
  id: string;
  name: string;
  status: string;
  health: string;
  priority: number;
}

export interface StatusReport {
  clientId: string;
  rows: StatusRow[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a `/v1/status` body. Rows are ordered by priority (highest
 * first), then id.
 */
export function parseStatusReport(body: unknown): StatusReport {
  if (!isRecord(body) || typeof body.client_id !== 'string' || !isRecord(body.servers)) {
    throw new InvalidArgumentError('Unexpected status response from gateway');
  }

  const rows: StatusRow[] = [];
  for (const [id, entry] of Object.entries(body.servers)) {
    if (
      !isRecord(entry) ||
      typeof entry.name !== 'string' ||
      typeof entry.status !== 'string' ||
      typeof entry.health !== 'string' ||
      typeof entry.priority !== 'number'
    ) {
      throw new InvalidArgumentError(`Unexpected status entry for server "${id}"`);
    }
    rows.push({ id, name: entry.name, status: entry.status, health: entry.health, priority: entry.priority });
  }

  rows.sort((a, b) => b.priority - a.priority || a.id.localeCompare(b.id));
  return { clientId: body.client_id, rows };
}

export function formatStatusTable(report: StatusReport): string[] {
  const lines = [`\n  ${CYAN}${BOLD}Fleet${RESET} ${DIM}(${report.clientId})${RESET}\n`];
  if (report.rows.length === 0) {
    lines.push(`  ${DIM}No servers configured.${RESET}`);
    return lines;
  }

  lines.push(
    ...table([
      ['ID', 'NAME', 'STATUS', 'HEALTH', 'PRIORITY'],
      ...report.rows.map((row) => [
        row.id,
        row.name,
        colorStatus(row.status),
        colorHealth(row.health),
        String(row.priority),
      ]),
    ]),
  );
  return lines;
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

export async function status(args: string[]): Promise<void> {
  const parsed = parseCommandArgs(args);

  let baseUrl: string;
  try {
    baseUrl = gatewayBaseUrl(loadConfig(parsed.config ?? undefined).gateway);
  } catch (err) {
    console.error(`\n  ${RED}Failed to load config:${RESET} ${toError(err).message}\n`);
    process.exitCode = 1;
    return;
  }

  try {
    const report = parseStatusReport(await requestGateway(baseUrl, 'GET', '/v1/status'));
    for (const line of formatStatusTable(report)) console.log(line);
    console.log('');
  } catch (err) {
    console.error(`\n  ${RED}Error:${RESET} ${toError(err).message}\n`);
    process.exitCode = 1;
  }
}
