/**
 * EventRelay — forwards supervisor events to a remote control plane.
 *
 * Holds one outbound WebSocket at a time. After connecting it announces
 * itself with a `hello` frame, then drains the EventBus in order, one JSON
 * frame per event. A dropped connection is retried with exponential
 * backoff; an event whose send failed is kept and goes out first on the
 * next connection, so ordering survives reconnects.
 *
 * Inbound frames are only reported to the observer. The remote side cannot
 * issue commands through this channel.
 */

import { WebSocket, type RawData } from 'ws';
import {
  RelayError,
  backoffDelay,
  sleep,
  toError,
  type IObserver,
  type RelayConnectionEvent,
  type ServerEvent,
} from '@hostwarden/core';
import type { EventBus } from '@hostwarden/supervisor';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface EventRelayOptions {
  /** ws:// or wss:// endpoint of the control plane. */
  url: string;
  /** Sent as `Authorization: Bearer <token>`. */
  token: string;
  clientId: string;
  bus: EventBus;
  observer?: IObserver;
  /** First reconnect delay. Default 1 000. */
  reconnectBaseMs?: number;
  /** Reconnect delay ceiling. Default 30 000. */
  reconnectMaxMs?: number;
  /** Keepalive ping interval while connected. Default 20 000. */
  pingIntervalMs?: number;
}

export const DEFAULT_RECONNECT_BASE_MS = 1_000;
export const DEFAULT_RECONNECT_MAX_MS = 30_000;
export const DEFAULT_PING_INTERVAL_MS = 20_000;

// ---------------------------------------------------------------------------
// EventRelay
// ---------------------------------------------------------------------------

export class EventRelay {
  private readonly url: string;
  private readonly token: string;
  private readonly clientId: string;
  private readonly bus: EventBus;
  private readonly observer: IObserver | undefined;
  private readonly reconnectBaseMs: number;
  private readonly reconnectMaxMs: number;
  private readonly pingIntervalMs: number;

  private socket: WebSocket | null = null;
  private loop: Promise<void> | null = null;
  private controller: AbortController | null = null;
  /** Taken from the bus but not yet confirmed sent. */
  private pending: ServerEvent | null = null;

  constructor(options: EventRelayOptions) {
    this.url = options.url;
    this.token = options.token;
    this.clientId = options.clientId;
    this.bus = options.bus;
    this.observer = options.observer;
    this.reconnectBaseMs = options.reconnectBaseMs ?? DEFAULT_RECONNECT_BASE_MS;
    this.reconnectMaxMs = options.reconnectMaxMs ?? DEFAULT_RECONNECT_MAX_MS;
    this.pingIntervalMs = options.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS;
  }

  get isConnected(): boolean {
    return this.socket?.readyState === WebSocket.OPEN;
  }

  /**
   * Run the connect/drain/reconnect loop until stop(). Resolves when the
   * loop exits; calling start() again while it runs returns the same promise.
   */
  start(): Promise<void> {
    if (this.loop) return this.loop;

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).finally(() => {
      this.loop = null;
      this.controller = null;
    });
    return this.loop;
  }

  /** Close the socket and wait for the loop to exit. */
  async stop(): Promise<void> {
    const loop = this.loop;
    this.controller?.abort();
    this.socket?.close(1000, 'shutdown');
    if (loop) await loop;
  }

  // ---------------------------------------------------------------------------
  // Loop
  // ---------------------------------------------------------------------------

  private async run(signal: AbortSignal): Promise<void> {
    let attempt = 0;

    while (!signal.aborted) {
      this.report({ state: 'connecting', url: this.url, attempt });
      try {
        const ws = await this.connect();
        attempt = 0;
        this.report({ state: 'connected', url: this.url });
        await this.session(ws);
      } catch (err) {
        if (!signal.aborted) this.reportError(toError(err));
      } finally {
        this.socket = null;
      }

      if (signal.aborted) break;

      const delay = backoffDelay(attempt, this.reconnectBaseMs, this.reconnectMaxMs);
      attempt += 1;
      this.report({ state: 'disconnected', url: this.url, attempt, retryInMs: delay });
      try {
        await sleep(delay, signal);
      } catch {
        break;
      }
    }

    this.report({ state: 'disconnected', url: this.url });
  }

  private connect(): Promise<WebSocket> {
    return new Promise<WebSocket>((resolve, reject) => {
      const ws = new WebSocket(this.url, {
        headers: { Authorization: `Bearer ${this.token}` },
      });
      this.socket = ws;

      const onOpen = () => {
        ws.off('error', onError);
        resolve(ws);
      };
      const onError = (err: Error) => {
        ws.off('open', onOpen);
        ws.terminate();
        reject(new RelayError(`Relay connection to ${this.url} failed: ${err.message}`, { url: this.url }));
      };

      ws.once('open', onOpen);
      ws.once('error', onError);
    });
  }

  /** Resolves when the socket closes, for whatever reason. */
  private session(ws: WebSocket): Promise<void> {
    return new Promise<void>((resolve) => {
      const sessionController = new AbortController();
      const ping = setInterval(() => ws.ping(), this.pingIntervalMs);
      ping.unref();

      ws.on('message', (data: RawData) => {
        this.report({ state: 'message', url: this.url, detail: rawToString(data) });
      });
      ws.on('error', (err) => {
        this.reportError(new RelayError(`Relay socket error: ${err.message}`, { url: this.url }));
      });
      ws.once('close', () => {
        clearInterval(ping);
        sessionController.abort();
        resolve();
      });

      this.pump(ws, sessionController.signal).catch((err: unknown) => {
        if (sessionController.signal.aborted) return;
        this.reportError(toError(err));
        ws.terminate();
      });
    });
  }

  /** Send hello, then every bus event in order until the session ends. */
  private async pump(ws: WebSocket, signal: AbortSignal): Promise<void> {
    await this.send(ws, JSON.stringify({ type: 'hello', client_id: this.clientId }));

    while (!signal.aborted) {
      const event = this.pending ?? (await this.bus.next(signal));
      this.pending = event;
      await this.send(ws, JSON.stringify(event));
      this.pending = null;
    }
  }

  private send(ws: WebSocket, frame: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      ws.send(frame, (err) => {
        if (err) reject(new RelayError(`Relay send failed: ${err.message}`, { url: this.url }));
        else resolve();
      });
    });
  }

  // ---------------------------------------------------------------------------
  // Reporting
  // ---------------------------------------------------------------------------

  private report(event: RelayConnectionEvent): void {
    this.observer?.onRelayConnection(event);
  }

  private reportError(error: Error): void {
    this.observer?.onError(error, { component: 'relay', url: this.url });
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}
