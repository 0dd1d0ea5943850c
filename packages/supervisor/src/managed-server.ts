/**
 * ManagedServer — lifecycle state machine for one configured server.
 *
 * Owns a single ProcessRunner. start/stop are serialized by an AsyncLock;
 * restart releases the lock between its stop and start phases, so an
 * operator action during the settle delay may interleave.
 *
 * The periodic ticks are unlocked. tickSupervisor only acts on a server in
 * `running` status whose process has exited: a stop in flight has already
 * moved the status to `stopping`, and a handled crash sits in `crashed`, so
 * neither is reported twice.
 *
 * Every observable change is published as a ServerEvent through the
 * `publish` callback handed in by the Supervisor.
 */

import {
  sleep,
  toError,
  type HealthState,
  type ProbeError,
  type ServerConfig,
  type ServerEvent,
  type ServerEventType,
  type ServerStatus,
  type ServerSummary,
} from '@hostwarden/core';
import { AsyncLock } from './lock.js';
import { RestartWindow } from './restart-window.js';
import { ProcessHandle, type ProcessRunner } from './process-handle.js';
import { DEFAULT_PROBE_HOST, defaultProber, type HealthProber } from './health.js';

// ── Types ────────────────────────────────────────────────────────────────

export type EventPublisher = (event: ServerEvent) => void;

export interface ManagedServerOptions {
  publish: EventPublisher;
  /** Factory for the process runner. Defaults to a real ProcessHandle. */
  createProcess?: () => ProcessRunner;
  prober?: HealthProber;
  /** Clock in epoch milliseconds. Default Date.now. */
  now?: () => number;
  /** Pause between the stop and start phases of restart(). Default 200. */
  restartDelayMs?: number;
  /** SIGTERM grace period for the default ProcessHandle. */
  stopGraceMs?: number;
  /** Errors that are recovered locally (forced kills, throwing callbacks). */
  onError?: (error: Error, context: Record<string, unknown>) => void;
}

export const DEFAULT_RESTART_DELAY_MS = 200;

export const AUTO_RESTART_REASON = 'auto_restart';

// ── ManagedServer ────────────────────────────────────────────────────────

export class ManagedServer {
  private _status: ServerStatus = 'stopped';
  private _health: HealthState = 'ok';
  private readonly lock = new AsyncLock();
  private readonly restarts: RestartWindow;
  private readonly proc: ProcessRunner;
  private readonly prober: HealthProber;
  private readonly now: () => number;
  private readonly restartDelayMs: number;

  constructor(
    readonly config: ServerConfig,
    private readonly options: ManagedServerOptions,
  ) {
    this.restarts = new RestartWindow(config.maxRestartPerMinute);
    this.prober = options.prober ?? defaultProber;
    this.now = options.now ?? Date.now;
    this.restartDelayMs = options.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS;
    this.proc = options.createProcess
      ? options.createProcess()
      : new ProcessHandle({
          graceMs: options.stopGraceMs,
          onTimeout: (err) => this.reportError(err, { phase: 'stop' }),
          onError: (err) => this.reportError(err, { phase: 'process' }),
        });
  }

  // ── Accessors ──────────────────────────────────────────────────────────

  get id(): string {
    return this.config.id;
  }

  get status(): ServerStatus {
    return this._status;
  }

  get health(): HealthState {
    return this._health;
  }

  get pid(): number | undefined {
    return this.proc.pid;
  }

  isRunning(): boolean {
    return this.proc.isRunning();
  }

  summary(): ServerSummary {
    return {
      name: this.config.name,
      status: this._status,
      health: this._health,
      priority: this.config.priority,
    };
  }

  // ── Lifecycle ──────────────────────────────────────────────────────────

  /**
   * Spawn the server's process. No-op when it is already running.
   * Spawn failures leave the server `crashed` and are rethrown.
   */
  async start(reason: string): Promise<void> {
    await this.lock.runExclusive(() => this.startLocked(reason));
  }

  async stop(reason: string): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (!this.proc.isRunning()) {
        this.setStatus('stopped', reason);
        return;
      }

      this.setStatus('stopping', reason);
      if (this.config.stopCmd && this.config.stopCmd.length > 0) {
        this.emit('info', { msg: 'stop_cmd not implemented yet', stop_cmd: this.config.stopCmd });
      }
      await this.proc.stop();
      this.setStatus('stopped', reason);
    });
  }

  async restart(reason: string): Promise<void> {
    await this.stop(reason);
    await sleep(this.restartDelayMs);
    await this.start(reason);
  }

  // ── Periodic checks ────────────────────────────────────────────────────

  /** Detect an unexpected exit and apply the restart policy. */
  async tickSupervisor(): Promise<void> {
    if (this._status !== 'running' || this.proc.isRunning()) return;

    const exitCode = this.proc.exitCode() ?? 0;
    if (exitCode === 0) {
      this.setStatus('stopped', 'exited');
      return;
    }

    this._status = 'crashed';
    this.emit('crash', { exit_code: exitCode });

    if (this.config.restartPolicy === 'never') return;

    await this.lock.runExclusive(async () => {
      // An operator stop that got the lock first wins, and uses no restart slot.
      if (this._status !== 'crashed') return;

      if (!this.restarts.tryRecord(this.now())) {
        this.emit('warn', {
          msg: 'restart rate limited',
          restarts_last_minute: this.restarts.count,
          max_restart_per_minute: this.config.maxRestartPerMinute,
        });
        return;
      }

      await this.startLocked(AUTO_RESTART_REASON);
    });
  }

  /** Run the configured probes; publishes `health` only when the state changes. */
  async tickHealth(): Promise<void> {
    const { healthPort, healthHttpUrl, healthTimeoutMs } = this.config;

    const failures: string[] = [];
    const onFailure = (err: ProbeError) => {
      failures.push(err.message);
    };

    let healthy = true;
    if (healthPort !== undefined) {
      const ok = await this.prober.tcp(DEFAULT_PROBE_HOST, healthPort, healthTimeoutMs, onFailure);
      healthy = healthy && ok;
    }
    if (healthHttpUrl) {
      const ok = await this.prober.http(healthHttpUrl, healthTimeoutMs, onFailure);
      healthy = healthy && ok;
    }

    const next: HealthState = healthy ? 'ok' : 'fail';
    if (next === this._health) return;

    this._health = next;
    const detail = failures[0];
    this.emit('health', detail !== undefined ? { health: next, detail } : { health: next });
  }

  /** Classify one line of process output. */
  handleLine(line: string): void {
    this.emit('log_line', { line });
    const keyword = this.config.logImportantKeywords.find((k) => k.length > 0 && line.includes(k));
    if (keyword !== undefined) {
      this.emit('important_log', { line, keyword });
    }
  }

  // ── Internal ───────────────────────────────────────────────────────────

  /** Caller must hold the lock. */
  private async startLocked(reason: string): Promise<void> {
    if (this.proc.isRunning()) return;

    this.setStatus('starting', reason);
    try {
      await this.proc.start(this.config.startCmd, this.config.workdir, this.config.env, (line) =>
        this.handleLine(line),
      );
    } catch (err) {
      const error = toError(err);
      this.setStatus('crashed', reason, { error: error.message });
      throw error;
    }
    this.setStatus('running', reason);
  }

  private setStatus(status: ServerStatus, reason: string, extra: Record<string, unknown> = {}): void {
    this._status = status;
    this.emit('status', { status, reason, ...extra });
  }

  private emit(type: ServerEventType, data: Record<string, unknown>): void {
    this.options.publish({
      type,
      ts: this.now() / 1000,
      server_id: this.config.id,
      data,
    });
  }

  private reportError(error: Error, context: Record<string, unknown>): void {
    this.options.onError?.(error, { serverId: this.config.id, ...context });
  }
}
