/**
 * Error hierarchy shared by every hostwarden package.
 *
 * Control-surface errors (NotFound, InvalidArgument, AlreadyRunning) are
 * meant to reach the caller. The rest are recovered or folded locally and
 * only show up in logs and emitted events.
 */

export class HostwardenError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'HostwardenError';
    this.code = code;
    this.context = context;
  }
}

/** Unknown server id passed to a control operation. */
export class NotFoundError extends HostwardenError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', context);
    this.name = 'NotFoundError';
  }
}

/** Unrecognized action name or malformed request payload. */
export class InvalidArgumentError extends HostwardenError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_ARGUMENT', context);
    this.name = 'InvalidArgumentError';
  }
}

/** A process handle was asked to start while its previous process is alive. */
export class AlreadyRunningError extends HostwardenError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ALREADY_RUNNING', context);
    this.name = 'AlreadyRunningError';
  }
}

/** Graceful termination did not finish inside the grace period. */
export class ProcessTimeoutError extends HostwardenError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, context?: Record<string, unknown>) {
    super(message, 'TIMEOUT', context);
    this.name = 'ProcessTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ProbeError extends HostwardenError {
  readonly target: string;

  constructor(message: string, target: string, context?: Record<string, unknown>) {
    super(message, 'PROBE_FAILURE', context);
    this.name = 'ProbeError';
    this.target = target;
  }
}

export class ConfigError extends HostwardenError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

export class RelayError extends HostwardenError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RELAY_ERROR', context);
    this.name = 'RelayError';
  }
}

/** Normalize anything thrown into an Error instance. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
