/**
 * @hostwarden/relay — WebSocket forwarding of supervisor events.
 */

export {
  EventRelay,
  DEFAULT_RECONNECT_BASE_MS,
  DEFAULT_RECONNECT_MAX_MS,
  DEFAULT_PING_INTERVAL_MS,
} from './event-relay.js';
export type { EventRelayOptions } from './event-relay.js';
