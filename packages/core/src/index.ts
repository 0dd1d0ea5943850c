/**
 * @hostwarden/core — shared types, contracts, errors and small utilities.
 */

export * from './errors/index.js';

export type {
  IObserver,
  ControlRequestEvent,
  RelayConnectionEvent,
} from './interfaces/observer.js';

export type {
  RestartPolicyName,
  ServerStatus,
  HealthState,
  ServerAction,
  ServerConfig,
} from './types/server.js';
export { RESTART_POLICIES, SERVER_ACTIONS, SERVER_CONFIG_DEFAULTS } from './types/server.js';

export type {
  ServerEventType,
  ServerEvent,
  InjectedEventInput,
  ServerSummary,
  FleetSnapshot,
} from './types/event.js';
export { SERVER_EVENT_TYPES, isKnownEventType } from './types/event.js';

export { backoffDelay, sleep } from './utils/backoff.js';
