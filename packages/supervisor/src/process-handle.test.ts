/**
 * ProcessHandle tests run real, short-lived node child processes.
 */

import { vi } from 'vitest';
import { chmodSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AlreadyRunningError, InvalidArgumentError, ProcessTimeoutError } from '@hostwarden/core';
import { ProcessHandle, resolveExecutable, signalExitCode } from './process-handle.js';

const NODE = process.execPath;

function nodeScript(source: string): string[] {
  return [NODE, '-e', source];
}

const LONG_RUNNING = "console.log('ready'); setInterval(() => {}, 1000);";

describe('ProcessHandle', () => {
  let handle: ProcessHandle;

  beforeEach(() => {
    handle = new ProcessHandle({ graceMs: 2_000 });
  });

  afterEach(async () => {
    await handle.stop();
  });

  describe('before start', () => {
    it('is not running and has no exit code', () => {
      expect(handle.isRunning()).toBe(false);
      expect(handle.exitCode()).toBeNull();
      expect(handle.pid).toBeUndefined();
    });

    it('wait() resolves to 0', async () => {
      await expect(handle.wait()).resolves.toBe(0);
    });

    it('stop() is a no-op', async () => {
      await expect(handle.stop()).resolves.toBeUndefined();
    });
  });

  describe('start', () => {
    it('streams stdout and stderr lines to the callback', async () => {
      const lines: string[] = [];
      await handle.start(
        nodeScript("console.log('out one'); console.error('err one'); console.log('out two');"),
        process.cwd(),
        {},
        (line) => lines.push(line),
      );

      await handle.wait();
      await vi.waitFor(() => expect(lines).toHaveLength(3));

      expect(lines.filter((l) => l.startsWith('out'))).toEqual(['out one', 'out two']);
      expect(lines).toContain('err one');
    });

    it.skipIf(process.platform === 'win32')('keeps the write order across stdout and stderr', async () => {
      const lines: string[] = [];
      await handle.start(
        nodeScript(
          "const { writeSync } = require('node:fs');" +
            'for (let i = 0; i < 200; i++) writeSync(i % 2 === 0 ? 1 : 2, `L${i}\\n`);',
        ),
        process.cwd(),
        {},
        (line) => lines.push(line),
      );

      await handle.wait();
      await vi.waitFor(() => expect(lines).toHaveLength(200));

      expect(lines).toEqual(Array.from({ length: 200 }, (_, i) => `L${i}`));
    });

    it('overlays configured env onto the ambient environment', async () => {
      const lines: string[] = [];
      await handle.start(
        nodeScript("console.log(process.env.HW_TEST_VALUE + '|' + (process.env.PATH ? 'path' : 'nopath'))"),
        process.cwd(),
        { HW_TEST_VALUE: 'from-config' },
        (line) => lines.push(line),
      );

      await handle.wait();
      await vi.waitFor(() => expect(lines).toEqual(['from-config|path']));
    });

    it('runs in the configured working directory', async () => {
      const lines: string[] = [];
      const dir = realpathSync(tmpdir());
      await handle.start(nodeScript('console.log(process.cwd())'), dir, {}, (line) => lines.push(line));

      await handle.wait();
      await vi.waitFor(() => expect(lines).toHaveLength(1));
      expect(realpathSync(lines[0]!)).toBe(dir);
    });

    it('replaces undecodable bytes instead of failing', async () => {
      const lines: string[] = [];
      await handle.start(
        nodeScript('process.stdout.write(Buffer.from([0x66, 0xff, 0x6f, 0x0a]))'),
        process.cwd(),
        {},
        (line) => lines.push(line),
      );

      await handle.wait();
      await vi.waitFor(() => expect(lines).toEqual(['f�o']));
    });

    it('rejects a second start while the process is alive', async () => {
      await handle.start(nodeScript(LONG_RUNNING), process.cwd(), {}, () => {});
      expect(handle.isRunning()).toBe(true);
      expect(handle.pid).toBeTypeOf('number');

      await expect(
        handle.start(nodeScript(LONG_RUNNING), process.cwd(), {}, () => {}),
      ).rejects.toBeInstanceOf(AlreadyRunningError);
    });

    it('rejects an empty argument vector', async () => {
      await expect(handle.start([], process.cwd(), {}, () => {})).rejects.toBeInstanceOf(
        InvalidArgumentError,
      );
    });

    it('propagates spawn failures', async () => {
      await expect(
        handle.start(['/nonexistent/hostwarden-binary'], process.cwd(), {}, () => {}),
      ).rejects.toThrow('ENOENT');
      expect(handle.isRunning()).toBe(false);
    });

    it('propagates spawn failures for a bare command not on PATH', async () => {
      await expect(
        handle.start(['hostwarden-no-such-command'], process.cwd(), {}, () => {}),
      ).rejects.toMatchObject({ code: 'ENOENT', syscall: 'spawn' });
      expect(handle.isRunning()).toBe(false);
    });

    it('can start again after the previous process exited', async () => {
      await handle.start(nodeScript('process.exit(2)'), process.cwd(), {}, () => {});
      await expect(handle.wait()).resolves.toBe(2);

      await handle.start(nodeScript('process.exit(0)'), process.cwd(), {}, () => {});
      await expect(handle.wait()).resolves.toBe(0);
      expect(handle.exitCode()).toBe(0);
    });

    it('reports errors thrown by the line callback without crashing', async () => {
      const onError = vi.fn();
      handle = new ProcessHandle({ onError });
      await handle.start(nodeScript("console.log('boom')"), process.cwd(), {}, () => {
        throw new Error('handler failed');
      });

      await handle.wait();
      await vi.waitFor(() => expect(onError).toHaveBeenCalledTimes(1));
      expect(onError.mock.calls[0]![0]).toBeInstanceOf(Error);
    });
  });

  describe('exit tracking', () => {
    it('records a non-zero exit code', async () => {
      await handle.start(nodeScript('process.exit(3)'), process.cwd(), {}, () => {});
      await expect(handle.wait()).resolves.toBe(3);
      expect(handle.isRunning()).toBe(false);
      expect(handle.exitCode()).toBe(3);
      expect(handle.pid).toBeUndefined();
    });
  });

  describe('stop', () => {
    it('terminates with SIGTERM', async () => {
      const lines: string[] = [];
      await handle.start(nodeScript(LONG_RUNNING), process.cwd(), {}, (line) => lines.push(line));
      await vi.waitFor(() => expect(lines).toEqual(['ready']));

      await handle.stop();

      expect(handle.isRunning()).toBe(false);
      expect(handle.exitCode()).toBe(signalExitCode('SIGTERM'));
    });

    it('escalates to SIGKILL after the grace period', async () => {
      const onTimeout = vi.fn();
      handle = new ProcessHandle({ graceMs: 200, onTimeout });
      const lines: string[] = [];
      await handle.start(
        nodeScript("process.on('SIGTERM', () => {}); console.log('ready'); setInterval(() => {}, 1000);"),
        process.cwd(),
        {},
        (line) => lines.push(line),
      );
      await vi.waitFor(() => expect(lines).toEqual(['ready']));

      await handle.stop();

      expect(handle.isRunning()).toBe(false);
      expect(handle.exitCode()).toBe(signalExitCode('SIGKILL'));
      expect(onTimeout).toHaveBeenCalledTimes(1);
      const err = onTimeout.mock.calls[0]![0];
      expect(err).toBeInstanceOf(ProcessTimeoutError);
      expect(err.timeoutMs).toBe(200);
    });

    it('is idempotent once stopped', async () => {
      await handle.start(nodeScript(LONG_RUNNING), process.cwd(), {}, () => {});
      await handle.stop();
      await expect(handle.stop()).resolves.toBeUndefined();
    });
  });
});

describe('signalExitCode', () => {
  it('follows the 128+N convention', () => {
    expect(signalExitCode('SIGTERM')).toBe(143);
    expect(signalExitCode('SIGKILL')).toBe(137);
  });

  it('falls back to 1 when no signal is known', () => {
    expect(signalExitCode(null)).toBe(1);
  });
});

describe.skipIf(process.platform === 'win32')('resolveExecutable', () => {
  let dir: string;

  beforeEach(() => {
    dir = realpathSync(mkdtempSync(join(tmpdir(), 'hostwarden-exec-')));
    writeFileSync(join(dir, 'run.sh'), '#!/bin/sh\n');
    chmodSync(join(dir, 'run.sh'), 0o755);
    writeFileSync(join(dir, 'notes.txt'), 'plain');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('resolves a relative path against the working directory', () => {
    expect(resolveExecutable('./run.sh', dir, '')).toBe(join(dir, 'run.sh'));
  });

  it('searches PATH for a bare name', () => {
    expect(resolveExecutable('run.sh', '/', `/nonexistent-dir:${dir}`)).toBe(join(dir, 'run.sh'));
  });

  it('skips files without the execute bit', () => {
    expect(resolveExecutable('notes.txt', '/', dir)).toBeNull();
    expect(resolveExecutable(join(dir, 'notes.txt'), '/', '')).toBeNull();
  });

  it('returns null when nothing matches', () => {
    expect(resolveExecutable('run.sh', '/', undefined)).toBeNull();
  });
});
