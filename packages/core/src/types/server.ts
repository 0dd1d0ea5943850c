/**
 * Server configuration and lifecycle vocabulary.
 */

export type RestartPolicyName = 'always' | 'on-failure' | 'never';

export const RESTART_POLICIES: readonly RestartPolicyName[] = ['always', 'on-failure', 'never'];

/**
 * Lifecycle states. `degraded` and `updating` are reserved: nothing in the
 * supervisor enters them today, but snapshots and events may carry them.
 */
export type ServerStatus =
  | 'stopped'
  | 'starting'
  | 'running'
  | 'stopping'
  | 'crashed'
  | 'degraded'
  | 'updating';

export type HealthState = 'ok' | 'warn' | 'fail';

export type ServerAction = 'start' | 'stop' | 'restart';

export const SERVER_ACTIONS: readonly ServerAction[] = ['start', 'stop', 'restart'];

export interface ServerConfig {
  id: string;
  name: string;
  /** Working directory the process is spawned in. */
  workdir: string;
  /** Argument vector; the first entry is the executable. */
  startCmd: string[];
  /** Accepted but not executed; stopping emits an info event instead. */
  stopCmd?: string[];
  /** Overlaid onto the supervisor's own environment. */
  env: Record<string, string>;
  restartPolicy: RestartPolicyName;
  maxRestartPerMinute: number;
  priority: number;
  healthPort?: number;
  healthHttpUrl?: string;
  healthTimeoutMs: number;
  /** Checked in order; the first substring match classifies the line. */
  logImportantKeywords: string[];
}

export const SERVER_CONFIG_DEFAULTS = {
  env: {},
  restartPolicy: 'on-failure',
  maxRestartPerMinute: 6,
  priority: 50,
  healthTimeoutMs: 2_000,
  logImportantKeywords: ['ERROR', 'FATAL', 'panic', 'Exception'],
} as const satisfies Partial<ServerConfig>;
