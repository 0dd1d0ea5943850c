/**
 * Thin HTTP client for the local gateway control surface.
 */

import { HostwardenError, toError } from '@hostwarden/core';
import type { GatewayConfig } from '../config.js';

export class GatewayRequestError extends HostwardenError {
  /** HTTP status, or 0 when the gateway could not be reached. */
  readonly status: number;

  constructor(message: string, status: number, context?: Record<string, unknown>) {
    super(message, 'GATEWAY_REQUEST', context);
    this.name = 'GatewayRequestError';
    this.status = status;
  }
}

const REQUEST_TIMEOUT_MS = 10_000;

/**
 * Base URL for reaching a gateway bound to `gateway.bind`. Wildcard binds
 * are reached over loopback.
 */
export function gatewayBaseUrl(gateway: Pick<GatewayConfig, 'bind' | 'port'>): string {
  let host = gateway.bind;
  if (host === '0.0.0.0' || host === '') host = '127.0.0.1';
  if (host === '::') host = '::1';
  if (host.includes(':')) host = `[${host}]`;
  return `http://${host}:${gateway.port}`;
}

/**
 * Send a JSON request and return the parsed body. Non-2xx responses throw
 * a GatewayRequestError carrying the gateway's `error` message.
 */
export async function requestGateway(
  baseUrl: string,
  method: 'GET' | 'POST',
  path: string,
  body?: Record<string, unknown>,
): Promise<unknown> {
  const url = `${baseUrl}${path}`;

  let res: Response;
  try {
    res = await fetch(url, {
      method,
      headers: body ? { 'content-type': 'application/json' } : undefined,
      body: body ? JSON.stringify(body) : undefined,
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  } catch (err) {
    throw new GatewayRequestError(`Cannot reach gateway at ${baseUrl}: ${toError(err).message}`, 0, { url });
  }

  const text = await res.text();
  let parsed: unknown = null;
  if (text.length > 0) {
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new GatewayRequestError(`Gateway returned a non-JSON response (${res.status})`, res.status, { url });
    }
  }

  if (!res.ok) {
    const message =
      typeof parsed === 'object' && parsed !== null && 'error' in parsed && typeof parsed.error === 'string'
        ? parsed.error
        : `HTTP ${res.status}`;
    throw new GatewayRequestError(message, res.status, { url });
  }

  return parsed;
}
