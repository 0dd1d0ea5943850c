/**
 * GatewayServer -- HTTP control surface for the supervisor.
 *
 * Uses the Node.js built-in `http` module. Every handled request is
 * reported to the observer as a ControlRequestEvent.
 *
 * Routes:
 *   GET    /health             - liveness probe
 *   GET    /v1/status          - fleet snapshot
 *   POST   /v1/start           - start a server      { server_id, reason? }
 *   POST   /v1/stop            - stop a server       { server_id, reason? }
 *   POST   /v1/restart         - restart a server    { server_id, reason? }
 *   POST   /v1/plugin/event    - inject an event     { type, server_id?, data? }
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import { timingSafeEqual } from 'node:crypto';
import {
  AlreadyRunningError,
  InvalidArgumentError,
  NotFoundError,
  toError,
  type IObserver,
  type ServerAction,
} from '@hostwarden/core';
import type { Supervisor } from '@hostwarden/supervisor';

export interface GatewayServerOptions {
  /** Bind address. Default 127.0.0.1. */
  host?: string;
  /** 0 picks an ephemeral port; read it back from `port` after start(). */
  port: number;
  supervisor: Supervisor;
  observer?: IObserver;
  /** When set, POST /v1/plugin/event requires a matching x-hostwarden-secret header. */
  sharedSecret?: string;
}

export const SECRET_HEADER = 'x-hostwarden-secret';

/** Upper bound on accepted request bodies. */
const MAX_BODY_BYTES = 1024 * 1024;

const ACTION_ROUTES = new Map<string, ServerAction>([
  ['/v1/start', 'start'],
  ['/v1/stop', 'stop'],
  ['/v1/restart', 'restart'],
]);

interface RequestContext {
  serverId?: string;
  error?: string;
}

class UnauthorizedError extends Error {}

export class GatewayServer {
  private server: Server | null = null;
  private readonly host: string;
  private readonly requestedPort: number;
  private readonly supervisor: Supervisor;
  private readonly observer: IObserver | undefined;
  private readonly sharedSecret: string | undefined;

  constructor(options: GatewayServerOptions) {
    this.host = options.host ?? '127.0.0.1';
    this.requestedPort = options.port;
    this.supervisor = options.supervisor;
    this.observer = options.observer;
    this.sharedSecret = options.sharedSecret;
  }

  /** The bound port once listening, otherwise the configured one. */
  get port(): number {
    const addr = this.server?.address();
    return typeof addr === 'object' && addr ? addr.port : this.requestedPort;
  }

  get url(): string {
    return `http://${this.host}:${this.port}`;
  }

  /** Start listening on the configured address. */
  async start(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.server = createServer((req, res) => {
        this.dispatch(req, res);
      });

      this.server.once('error', reject);

      this.server.listen(this.requestedPort, this.host, () => {
        this.server?.off('error', reject);
        resolve();
      });
    });
  }

  /** Gracefully close the server. */
  async stop(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.closeIdleConnections();
      this.server.close((err) => {
        this.server = null;
        if (err) reject(err);
        else resolve();
      });
    });
  }

  // ---------------------------------------------------------------------------
  // Request handling
  // ---------------------------------------------------------------------------

  private dispatch(req: IncomingMessage, res: ServerResponse): void {
    const started = Date.now();
    const method = req.method ?? 'GET';
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    const ctx: RequestContext = {};

    this.handleRequest(method, path, req, res, ctx)
      .catch((err: unknown) => {
        const { status, message } = this.describeError(err);
        ctx.error = message;
        this.sendJson(res, status, { error: message });
      })
      .finally(() => {
        this.observer?.onControlRequest({
          method,
          path,
          status: res.statusCode,
          duration: Date.now() - started,
          serverId: ctx.serverId,
          error: ctx.error,
        });
      })
      .catch((err: unknown) => {
        console.error('[GatewayServer] observer threw:', err);
      });
  }

  private async handleRequest(
    method: string,
    path: string,
    req: IncomingMessage,
    res: ServerResponse,
    ctx: RequestContext,
  ): Promise<void> {
    // GET /health
    if (method === 'GET' && path === '/health') {
      this.sendJson(res, 200, { status: 'ok', timestamp: new Date().toISOString() });
      return;
    }

    // GET /v1/status
    if (method === 'GET' && path === '/v1/status') {
      this.sendJson(res, 200, this.supervisor.snapshot());
      return;
    }

    // POST /v1/start | /v1/stop | /v1/restart
    const action = ACTION_ROUTES.get(path);
    if (method === 'POST' && action) {
      const payload = await this.readJson(req);
      const serverId = payload['server_id'];
      if (typeof serverId !== 'string' || serverId.length === 0) {
        throw new InvalidArgumentError('Missing "server_id" in request body');
      }
      ctx.serverId = serverId;
      const reason = typeof payload['reason'] === 'string' ? payload['reason'] : 'api';

      await this.supervisor.doAction(serverId, action, reason);
      this.sendJson(res, 200, { ok: true });
      return;
    }

    // POST /v1/plugin/event
    if (method === 'POST' && path === '/v1/plugin/event') {
      this.authorize(req);
      const payload = await this.readJson(req);

      const type = payload['type'];
      if (typeof type !== 'string' || type.length === 0) {
        throw new InvalidArgumentError('Missing "type" in request body');
      }
      const serverId = payload['server_id'];
      if (serverId !== undefined && typeof serverId !== 'string') {
        throw new InvalidArgumentError('"server_id" must be a string');
      }
      const data = payload['data'];
      if (data !== undefined && !isRecord(data)) {
        throw new InvalidArgumentError('"data" must be an object');
      }
      if (serverId !== undefined) ctx.serverId = serverId;

      this.supervisor.injectEvent({ type, server_id: serverId, data });
      this.sendJson(res, 200, { ok: true });
      return;
    }

    // Fallback: 404
    this.sendJson(res, 404, { error: 'Not found' });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private authorize(req: IncomingMessage): void {
    if (!this.sharedSecret) return;
    const provided = req.headers[SECRET_HEADER];
    if (typeof provided !== 'string' || !secretsMatch(provided, this.sharedSecret)) {
      throw new UnauthorizedError('Unauthorized');
    }
  }

  private describeError(err: unknown): { status: number; message: string } {
    const error = toError(err);
    if (error instanceof UnauthorizedError) return { status: 401, message: error.message };
    if (error instanceof InvalidArgumentError) return { status: 400, message: error.message };
    if (error instanceof NotFoundError) return { status: 404, message: error.message };
    if (error instanceof AlreadyRunningError) return { status: 409, message: error.message };
    return { status: 500, message: error.message || 'Internal server error' };
  }

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    const body = JSON.stringify(data);
    res.writeHead(status, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(body),
    });
    res.end(body);
  }

  private async readJson(req: IncomingMessage): Promise<Record<string, unknown>> {
    const body = await this.readBody(req);
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new InvalidArgumentError('Invalid JSON body');
    }
    if (!isRecord(parsed)) {
      throw new InvalidArgumentError('Request body must be a JSON object');
    }
    return parsed;
  }

  private readBody(req: IncomingMessage): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      req.on('data', (chunk: Buffer) => {
        size += chunk.length;
        if (size > MAX_BODY_BYTES) {
          reject(new InvalidArgumentError('Request body too large'));
          req.destroy();
          return;
        }
        chunks.push(chunk);
      });
      req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
      req.on('error', reject);
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function secretsMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}
