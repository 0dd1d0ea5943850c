/**
 * Wire shapes exposed to the control plane and the relay.
 *
 * Field names are snake_case because these objects are serialized as-is.
 */

import type { HealthState, ServerStatus } from './server.js';

export type ServerEventType =
  | 'status'
  | 'crash'
  | 'health'
  | 'warn'
  | 'info'
  | 'log_line'
  | 'important_log';

export const SERVER_EVENT_TYPES: readonly ServerEventType[] = [
  'status',
  'crash',
  'health',
  'warn',
  'info',
  'log_line',
  'important_log',
];

export interface ServerEvent {
  /** One of ServerEventType for events the supervisor emits; free-form for injected ones. */
  type: string;
  /** Epoch seconds. */
  ts: number;
  server_id?: string;
  data: Record<string, unknown>;
}

/** An externally originated event before it is stamped and enqueued. */
export interface InjectedEventInput {
  type: string;
  server_id?: string;
  data?: Record<string, unknown>;
}

export interface ServerSummary {
  name: string;
  status: ServerStatus;
  health: HealthState;
  priority: number;
}

export interface FleetSnapshot {
  client_id: string;
  servers: Record<string, ServerSummary>;
}

export function isKnownEventType(type: string): type is ServerEventType {
  return (SERVER_EVENT_TYPES as readonly string[]).includes(type);
}
