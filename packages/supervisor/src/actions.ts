/**
 * Boundary parsing for control actions.
 */

import { InvalidArgumentError, SERVER_ACTIONS, type ServerAction } from '@hostwarden/core';

export function isServerAction(value: unknown): value is ServerAction {
  return typeof value === 'string' && SERVER_ACTIONS.some((action) => action === value);
}

/** Parse an action name received from outside; throws InvalidArgumentError otherwise. */
export function parseAction(value: unknown): ServerAction {
  if (isServerAction(value)) return value;
  throw new InvalidArgumentError(`Unknown action: ${String(value)}`, {
    action: value,
    allowed: [...SERVER_ACTIONS],
  });
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled case: ${String(value)}`);
}
