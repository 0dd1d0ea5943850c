/**
 * NoopObserver — silent observer that discards all events.
 *
 * Used when observability is explicitly disabled and as the default in
 * library code that was not handed an observer.
 */

import type {
  IObserver,
  ServerEvent,
  ControlRequestEvent,
  RelayConnectionEvent,
} from '@hostwarden/core';

export class NoopObserver implements IObserver {
  onServerEvent(_event: ServerEvent): void {
    // intentionally empty
  }

  onControlRequest(_event: ControlRequestEvent): void {
    // intentionally empty
  }

  onRelayConnection(_event: RelayConnectionEvent): void {
    // intentionally empty
  }

  onError(_error: Error, _context: Record<string, unknown>): void {
    // intentionally empty
  }

  async flush(): Promise<void> {
    // intentionally empty
  }
}
