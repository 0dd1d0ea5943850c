/**
 * Liveness probes for supervised servers.
 *
 * Both probes resolve to a boolean and never reject: every failure (refused
 * connection, timeout, bad status, malformed URL) is folded into `false`.
 * Callers that want the reason pass `onFailure`, which receives a ProbeError.
 */

import { createConnection, type Socket } from 'node:net';
import { ProbeError, toError } from '@hostwarden/core';

// ── Types ────────────────────────────────────────────────────────────────

export type ProbeFailureHandler = (error: ProbeError) => void;

export interface HealthProber {
  tcp(host: string, port: number, timeoutMs: number, onFailure?: ProbeFailureHandler): Promise<boolean>;
  http(url: string, timeoutMs: number, onFailure?: ProbeFailureHandler): Promise<boolean>;
}

// ── Constants ────────────────────────────────────────────────────────────

export const DEFAULT_PROBE_HOST = '127.0.0.1';

/** Extra slack on top of a probe's own timeout before the outer deadline fires. */
export const PROBE_DEADLINE_SLACK_MS = 200;

// ── Probes ───────────────────────────────────────────────────────────────

/** True iff a TCP connection to host:port succeeds within `timeoutMs`. */
export async function checkPortOpen(
  host: string,
  port: number,
  timeoutMs: number,
  onFailure?: ProbeFailureHandler,
): Promise<boolean> {
  const target = `${host}:${port}`;
  const attempt = new Promise<boolean>((resolve) => {
    let settled = false;
    let socket: Socket | null = null;

    const finish = (ok: boolean, reason?: string) => {
      if (settled) return;
      settled = true;
      socket?.destroy();
      if (!ok && reason) onFailure?.(new ProbeError(reason, target));
      resolve(ok);
    };

    // Invalid ports and hosts throw synchronously rather than emitting 'error'.
    let conn: Socket;
    try {
      conn = createConnection({ host, port });
    } catch (err) {
      finish(false, `TCP connect to ${target} failed: ${toError(err).message}`);
      return;
    }
    socket = conn;

    conn.setTimeout(timeoutMs);
    conn.once('connect', () => finish(true));
    conn.once('timeout', () => finish(false, `TCP connect to ${target} timed out after ${timeoutMs}ms`));
    conn.once('error', (err) => finish(false, `TCP connect to ${target} failed: ${err.message}`));
  });

  return withDeadline(attempt, timeoutMs + PROBE_DEADLINE_SLACK_MS, () =>
    onFailure?.(new ProbeError(`TCP probe of ${target} exceeded its deadline`, target)),
  );
}

/**
 * True iff a GET of `url` answers with a status in [200, 400) within
 * `timeoutMs`. Redirects are followed.
 */
export async function checkHttp(
  url: string,
  timeoutMs: number,
  onFailure?: ProbeFailureHandler,
): Promise<boolean> {
  const attempt = (async (): Promise<boolean> => {
    try {
      const res = await fetch(url, {
        method: 'GET',
        redirect: 'follow',
        signal: AbortSignal.timeout(timeoutMs),
      });
      // Only the status matters; release the connection.
      await res.body?.cancel();
      if (res.status >= 200 && res.status < 400) return true;
      onFailure?.(new ProbeError(`GET ${url} answered ${res.status}`, url, { status: res.status }));
      return false;
    } catch (err) {
      onFailure?.(new ProbeError(`GET ${url} failed: ${toError(err).message}`, url));
      return false;
    }
  })();

  return withDeadline(attempt, timeoutMs + PROBE_DEADLINE_SLACK_MS, () =>
    onFailure?.(new ProbeError(`HTTP probe of ${url} exceeded its deadline`, url)),
  );
}

export const defaultProber: HealthProber = {
  tcp: checkPortOpen,
  http: checkHttp,
};

// ── Internal ─────────────────────────────────────────────────────────────

function withDeadline(
  probe: Promise<boolean>,
  deadlineMs: number,
  onExpired: () => void,
): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => {
      onExpired();
      resolve(false);
    }, deadlineMs);
    void probe.then(
      (ok) => {
        clearTimeout(timer);
        resolve(ok);
      },
      () => {
        clearTimeout(timer);
        resolve(false);
      },
    );
  });
}
