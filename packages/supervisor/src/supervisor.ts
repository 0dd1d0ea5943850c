/**
 * Supervisor — owns the fleet of ManagedServers and drives their ticks.
 *
 * Constructed once from validated configuration and handed to every
 * consumer (gateway, relay, CLI). All events from every server funnel into
 * one EventBus and, when an observer is attached, into the observer too.
 *
 * The loop runs one pass per interval: for each server in configuration
 * order, tickSupervisor then tickHealth. A failing server is reported and
 * skipped; the rest of the pass continues.
 */

import { EventEmitter } from 'node:events';
import {
  ConfigError,
  NotFoundError,
  sleep,
  toError,
  type FleetSnapshot,
  type IObserver,
  type InjectedEventInput,
  type ServerConfig,
  type ServerEvent,
} from '@hostwarden/core';
import { EventBus } from './event-bus.js';
import { ManagedServer } from './managed-server.js';
import { assertNever, parseAction } from './actions.js';
import type { ProcessRunner } from './process-handle.js';
import type { HealthProber } from './health.js';

// ── Types ────────────────────────────────────────────────────────────────

export interface SupervisorOptions {
  clientId: string;
  servers: readonly ServerConfig[];
  /** Servers beyond this count are ignored. Default 25. */
  maxServers?: number;
  bus?: EventBus;
  observer?: IObserver;
  /** Pause between loop passes. Default 1 000. */
  tickIntervalMs?: number;
  /** Clock in epoch milliseconds. Default Date.now. */
  now?: () => number;
  createProcess?: (config: ServerConfig) => ProcessRunner;
  prober?: HealthProber;
  restartDelayMs?: number;
  stopGraceMs?: number;
}

export interface SupervisorEvents {
  'loop:started': [];
  'loop:stopped': [];
  'tick:completed': [durationMs: number];
  'tick:failed': [serverId: string, error: Error];
}

export const DEFAULT_MAX_SERVERS = 25;
export const DEFAULT_TICK_INTERVAL_MS = 1_000;

// ── Supervisor ───────────────────────────────────────────────────────────

export class Supervisor extends EventEmitter<SupervisorEvents> {
  readonly clientId: string;
  private readonly servers = new Map<string, ManagedServer>();
  private readonly _bus: EventBus;
  private readonly observer: IObserver | undefined;
  private readonly tickIntervalMs: number;
  private readonly now: () => number;

  private loop: Promise<void> | null = null;
  private loopController: AbortController | null = null;

  constructor(options: SupervisorOptions) {
    super();
    this.clientId = options.clientId;
    this._bus = options.bus ?? new EventBus();
    this.observer = options.observer;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.now = options.now ?? Date.now;

    const maxServers = options.maxServers ?? DEFAULT_MAX_SERVERS;
    const configs = options.servers.slice(0, maxServers);

    for (const config of configs) {
      if (this.servers.has(config.id)) {
        throw new ConfigError(`Duplicate server id "${config.id}"`, { serverId: config.id });
      }
      const createProcess = options.createProcess;
      this.servers.set(
        config.id,
        new ManagedServer(config, {
          publish: (event) => this.publish(event),
          createProcess: createProcess ? () => createProcess(config) : undefined,
          prober: options.prober,
          now: this.now,
          restartDelayMs: options.restartDelayMs,
          stopGraceMs: options.stopGraceMs,
          onError: (error, context) => this.notify((o) => o.onError(error, context)),
        }),
      );
    }

    if (options.servers.length > maxServers) {
      this.publish({
        type: 'warn',
        ts: this.now() / 1000,
        data: {
          msg: 'server list truncated',
          configured: options.servers.length,
          max: maxServers,
        },
      });
    }
  }

  // ── Queries ──────────────────────────────────────────────────────────

  get bus(): EventBus {
    return this._bus;
  }

  get isLooping(): boolean {
    return this.loop !== null;
  }

  getServer(id: string): ManagedServer | undefined {
    return this.servers.get(id);
  }

  getServers(): ManagedServer[] {
    return [...this.servers.values()];
  }

  snapshot(): FleetSnapshot {
    const servers: FleetSnapshot['servers'] = {};
    for (const [id, server] of this.servers) {
      servers[id] = server.summary();
    }
    return { client_id: this.clientId, servers };
  }

  // ── Fleet operations ─────────────────────────────────────────────────

  /** Start every server in configuration order. One failure does not stop the rest. */
  async startAll(reason = 'boot'): Promise<void> {
    for (const server of this.servers.values()) {
      try {
        await server.start(reason);
      } catch (err) {
        this.notify((o) => o.onError(toError(err), { serverId: server.id, phase: 'start' }));
      }
    }
  }

  async stopAll(reason = 'shutdown'): Promise<void> {
    for (const server of this.servers.values()) {
      try {
        await server.stop(reason);
      } catch (err) {
        this.notify((o) => o.onError(toError(err), { serverId: server.id, phase: 'stop' }));
      }
    }
  }

  /**
   * Dispatch an operator action. Throws NotFoundError for an unknown id and
   * InvalidArgumentError for an unknown action; start failures propagate.
   */
  async doAction(serverId: string, action: string, reason: string): Promise<void> {
    const server = this.servers.get(serverId);
    if (!server) {
      throw new NotFoundError(`Unknown server_id "${serverId}"`, { serverId });
    }

    const parsed = parseAction(action);
    switch (parsed) {
      case 'start':
        await server.start(reason);
        return;
      case 'stop':
        await server.stop(reason);
        return;
      case 'restart':
        await server.restart(reason);
        return;
      default:
        assertNever(parsed);
    }
  }

  /** Stamp an externally originated event and put it on the bus. */
  injectEvent(input: InjectedEventInput): ServerEvent {
    const event: ServerEvent = {
      type: input.type,
      ts: this.now() / 1000,
      data: input.data ?? {},
    };
    if (input.server_id !== undefined) event.server_id = input.server_id;
    this.publish(event);
    return event;
  }

  // ── Loop ─────────────────────────────────────────────────────────────

  /** One supervision pass over every server. */
  async tick(): Promise<void> {
    const started = Date.now();
    for (const server of this.servers.values()) {
      try {
        await server.tickSupervisor();
      } catch (err) {
        this.reportTickFailure(server.id, 'supervise', err);
      }
      try {
        await server.tickHealth();
      } catch (err) {
        this.reportTickFailure(server.id, 'health', err);
      }
    }
    this.emit('tick:completed', Date.now() - started);
  }

  /**
   * Run passes until stop() is called. Resolves once the loop has exited.
   * Calling run() while the loop is active returns the same promise.
   */
  run(): Promise<void> {
    if (this.loop) return this.loop;

    const controller = new AbortController();
    this.loopController = controller;
    this.loop = this.runLoop(controller.signal).finally(() => {
      this.loop = null;
      this.loopController = null;
      this.emit('loop:stopped');
    });
    return this.loop;
  }

  /**
   * Ask the loop to exit. A pass in progress and the sleep after it both
   * finish first, so this can take up to one tick interval.
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    this.loopController?.abort();
    if (loop) await loop;
  }

  // ── Internal ─────────────────────────────────────────────────────────

  private async runLoop(signal: AbortSignal): Promise<void> {
    this.emit('loop:started');
    while (!signal.aborted) {
      await this.tick();
      await sleep(this.tickIntervalMs);
    }
  }

  private publish(event: ServerEvent): void {
    this._bus.publish(event);
    this.notify((o) => o.onServerEvent(event));
  }

  /** Observer failures are contained here and never reach the caller. */
  private notify(fn: (observer: IObserver) => void): void {
    if (!this.observer) return;
    try {
      fn(this.observer);
    } catch (err) {
      console.error('[Supervisor] observer threw:', err);
    }
  }

  private reportTickFailure(serverId: string, phase: string, err: unknown): void {
    const error = toError(err);
    this.notify((o) => o.onError(error, { serverId, phase: `tick:${phase}` }));
    this.emit('tick:failed', serverId, error);
  }
}
