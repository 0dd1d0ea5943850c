import { vi } from 'vitest';
import { createServer as createTcpServer, type Server as TcpServer } from 'node:net';
import { createServer as createHttpServer, type Server as HttpServer } from 'node:http';
import { ProbeError } from '@hostwarden/core';
import { checkHttp, checkPortOpen, defaultProber } from './health.js';

function listen(server: TcpServer | HttpServer): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      resolve(typeof addr === 'object' && addr ? addr.port : 0);
    });
  });
}

function close(server: TcpServer | HttpServer): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe('checkPortOpen', () => {
  it('returns true for a listening port', async () => {
    const server = createTcpServer((socket) => socket.destroy());
    const port = await listen(server);
    try {
      await expect(checkPortOpen('127.0.0.1', port, 1_000)).resolves.toBe(true);
    } finally {
      await close(server);
    }
  });

  it('returns false and reports a ProbeError for a closed port', async () => {
    const server = createTcpServer();
    const port = await listen(server);
    await close(server);

    const onFailure = vi.fn();
    await expect(checkPortOpen('127.0.0.1', port, 1_000, onFailure)).resolves.toBe(false);
    expect(onFailure).toHaveBeenCalledTimes(1);
    const err = onFailure.mock.calls[0]![0];
    expect(err).toBeInstanceOf(ProbeError);
    expect(err.target).toBe(`127.0.0.1:${port}`);
    expect(err.code).toBe('PROBE_FAILURE');
  });

  it('returns false for an out-of-range port without rejecting', async () => {
    const unhandled = vi.fn();
    process.on('unhandledRejection', unhandled);
    try {
      const onFailure = vi.fn();
      await expect(checkPortOpen('127.0.0.1', 70_000, 100, onFailure)).resolves.toBe(false);
      await new Promise((resolve) => setImmediate(resolve));

      expect(unhandled).not.toHaveBeenCalled();
      expect(onFailure).toHaveBeenCalledTimes(1);
      const err = onFailure.mock.calls[0]![0];
      expect(err).toBeInstanceOf(ProbeError);
      expect(err.message).toMatch(/^TCP connect to 127\.0\.0\.1:70000 failed: /);
    } finally {
      process.off('unhandledRejection', unhandled);
    }
  });
});

describe('checkHttp', () => {
  let server: HttpServer;
  let base: string;

  beforeAll(async () => {
    server = createHttpServer((req, res) => {
      switch (req.url) {
        case '/ok':
          res.writeHead(200, { 'Content-Type': 'text/plain' });
          res.end('ok');
          break;
        case '/moved':
          res.writeHead(302, { Location: '/ok' });
          res.end();
          break;
        case '/slow':
          setTimeout(() => {
            res.writeHead(200);
            res.end();
          }, 1_000);
          break;
        default:
          res.writeHead(503);
          res.end('unavailable');
      }
    });
    const port = await listen(server);
    base = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await close(server);
  });

  it('returns true for a 200 response', async () => {
    await expect(checkHttp(`${base}/ok`, 1_000)).resolves.toBe(true);
  });

  it('follows redirects', async () => {
    await expect(checkHttp(`${base}/moved`, 1_000)).resolves.toBe(true);
  });

  it('returns false for a 5xx response and reports the status', async () => {
    const onFailure = vi.fn();
    await expect(checkHttp(`${base}/down`, 1_000, onFailure)).resolves.toBe(false);
    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure.mock.calls[0]![0].message).toBe(`GET ${base}/down answered 503`);
    expect(onFailure.mock.calls[0]![0].context).toEqual({ status: 503 });
  });

  it('returns false when the response is slower than the timeout', async () => {
    await expect(checkHttp(`${base}/slow`, 100)).resolves.toBe(false);
  });

  it('returns false for a malformed URL', async () => {
    await expect(checkHttp('not a url', 100)).resolves.toBe(false);
  });
});

describe('defaultProber', () => {
  it('exposes both probes', () => {
    expect(defaultProber.tcp).toBe(checkPortOpen);
    expect(defaultProber.http).toBe(checkHttp);
  });
});
