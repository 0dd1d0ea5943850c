/**
 * IObserver — observability contract
 *
 * Structured logging hooks for every subsystem: supervisor events, control
 * requests, relay connectivity, and errors that are recovered rather than
 * surfaced.
 */

import type { ServerEvent } from '../types/event.js';

export interface ControlRequestEvent {
  method: string;
  path: string;
  status: number;
  duration: number;
  serverId?: string;
  error?: string;
}

export interface RelayConnectionEvent {
  state: 'connecting' | 'connected' | 'disconnected' | 'message';
  url: string;
  attempt?: number;
  retryInMs?: number;
  detail?: string;
}

export interface IObserver {
  onServerEvent(event: ServerEvent): void;
  onControlRequest(event: ControlRequestEvent): void;
  onRelayConnection(event: RelayConnectionEvent): void;
  onError(error: Error, context: Record<string, unknown>): void;
  flush?(): Promise<void>;
}
