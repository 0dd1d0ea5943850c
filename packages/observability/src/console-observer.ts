/**
 * ConsoleObserver — structured console logging with ANSI color coding.
 *
 * Formats supervisor events, control requests and relay connectivity as
 * human-readable console output, respecting the configured log level.
 * Raw process output is debug-only; crashes go to stderr.
 */

import type {
  IObserver,
  ServerEvent,
  ControlRequestEvent,
  RelayConnectionEvent,
} from '@hostwarden/core';

// ---------------------------------------------------------------------------
// ANSI escape codes
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

const FG = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

// ---------------------------------------------------------------------------
// Log-level gate
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Event → level mapping
// ---------------------------------------------------------------------------

const STATUS_COLOR: Record<string, string> = {
  running: FG.green,
  starting: FG.cyan,
  stopping: FG.yellow,
  stopped: FG.gray,
  crashed: FG.red,
};

export function levelForEvent(event: ServerEvent): LogLevel {
  switch (event.type) {
    case 'log_line':
      return 'debug';
    case 'crash':
      return 'error';
    case 'warn':
    case 'important_log':
      return 'warn';
    case 'health':
      return event.data['health'] === 'ok' ? 'info' : 'warn';
    default:
      return 'info';
  }
}

// ---------------------------------------------------------------------------
// ConsoleObserver
// ---------------------------------------------------------------------------

export class ConsoleObserver implements IObserver {
  private readonly minLevel: number;

  constructor(logLevel: LogLevel = 'info') {
    this.minLevel = LEVEL_RANK[logLevel];
  }

  // ---- helpers ------------------------------------------------------------

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.minLevel;
  }

  private timestamp(): string {
    return new Date().toISOString();
  }

  private tag(label: string, color: string): string {
    return `${color}${BOLD}[${label}]${RESET}`;
  }

  private formatDuration(ms: number): string {
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    return `${(ms / 1000).toFixed(2)}s`;
  }

  private write(level: LogLevel, line: string): void {
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  }

  private describe(event: ServerEvent): string {
    const data = event.data;
    switch (event.type) {
      case 'status': {
        const status = String(data['status']);
        const color = STATUS_COLOR[status] ?? FG.white;
        const reason = data['reason'] ? ` ${DIM}reason=${RESET}${String(data['reason'])}` : '';
        const error = data['error'] ? ` ${DIM}error=${RESET}${String(data['error'])}` : '';
        return `${color}${status}${RESET}${reason}${error}`;
      }
      case 'crash':
        return `${FG.red}CRASH${RESET} ${DIM}exit_code=${RESET}${String(data['exit_code'])}`;
      case 'health':
        return data['health'] === 'ok'
          ? `${FG.green}healthy${RESET}`
          : `${FG.red}unhealthy${RESET}`;
      case 'log_line':
        return `${DIM}${String(data['line'])}${RESET}`;
      case 'important_log':
        return `${FG.yellow}${String(data['keyword'])}${RESET} ${String(data['line'])}`;
      case 'warn':
      case 'info':
        return String(data['msg'] ?? JSON.stringify(data));
      default:
        return `${FG.magenta}${event.type}${RESET} ${JSON.stringify(data)}`;
    }
  }

  // ---- IObserver ----------------------------------------------------------

  onServerEvent(event: ServerEvent): void {
    const level = levelForEvent(event);
    if (!this.shouldLog(level)) return;
    const label = event.type === 'log_line' || event.type === 'important_log' ? 'LOG' : 'SERVER';
    const color = level === 'error' ? FG.red : level === 'warn' ? FG.yellow : FG.cyan;
    this.write(
      level,
      `${DIM}${this.timestamp()}${RESET} ${this.tag(label, color)}` +
        (event.server_id ? ` ${BOLD}${event.server_id}${RESET}` : '') +
        ` ${this.describe(event)}`,
    );
  }

  onControlRequest(event: ControlRequestEvent): void {
    const level: LogLevel = event.status >= 500 ? 'error' : event.status >= 400 ? 'warn' : 'debug';
    if (!this.shouldLog(level)) return;
    const statusColor = event.status >= 400 ? FG.red : FG.green;
    this.write(
      level,
      `${DIM}${this.timestamp()}${RESET} ${this.tag('HTTP', FG.blue)} ` +
        `${event.method} ${event.path} ${statusColor}${event.status}${RESET}` +
        ` ${DIM}duration=${RESET}${this.formatDuration(event.duration)}` +
        (event.serverId ? ` ${DIM}server=${RESET}${event.serverId}` : '') +
        (event.error ? ` ${DIM}error=${RESET}${event.error}` : ''),
    );
  }

  onRelayConnection(event: RelayConnectionEvent): void {
    const level: LogLevel =
      event.state === 'disconnected' ? 'warn' : event.state === 'message' ? 'debug' : 'info';
    if (!this.shouldLog(level)) return;
    const color = event.state === 'connected' ? FG.green : event.state === 'disconnected' ? FG.yellow : FG.gray;
    this.write(
      level,
      `${DIM}${this.timestamp()}${RESET} ${this.tag('RELAY', FG.magenta)} ${color}${event.state}${RESET}` +
        ` ${DIM}url=${RESET}${event.url}` +
        (event.attempt !== undefined ? ` ${DIM}attempt=${RESET}${event.attempt}` : '') +
        (event.retryInMs !== undefined ? ` ${DIM}retry_in=${RESET}${this.formatDuration(event.retryInMs)}` : '') +
        (event.detail ? ` ${DIM}detail=${RESET}${event.detail}` : ''),
    );
  }

  onError(error: Error, context: Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    const ctx = Object.keys(context).length > 0 ? ` ${DIM}${JSON.stringify(context)}${RESET}` : '';
    console.error(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('ERROR', FG.red)} ${error.message}${ctx}`,
    );
  }

  async flush(): Promise<void> {
    // Console writes are synchronous.
  }
}
