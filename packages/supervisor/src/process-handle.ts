/**
 * ProcessHandle — owns at most one live OS process at a time.
 *
 * Spawns via child_process.spawn, overlays the configured environment on the
 * supervisor's own, and turns stdout and stderr into a single stream of
 * lines delivered to one callback. On POSIX the child is exec'd through
 * /bin/sh with `2>&1`, so both descriptors share one pipe and lines arrive
 * in write order. On Windows the two pipes are read separately and only
 * keep their order within each stream.
 *
 * Termination is SIGTERM first, then SIGKILL once the grace period runs out.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { accessSync, constants as fsConstants, statSync } from 'node:fs';
import { createInterface } from 'node:readline';
import { constants } from 'node:os';
import { delimiter, isAbsolute, join, resolve } from 'node:path';
import {
  AlreadyRunningError,
  InvalidArgumentError,
  ProcessTimeoutError,
  toError,
} from '@hostwarden/core';

// ── Types ────────────────────────────────────────────────────────────────

export type LineHandler = (line: string) => void;

/**
 * What ManagedServer needs from a process. ProcessHandle is the real
 * implementation; tests substitute in-memory fakes.
 */
export interface ProcessRunner {
  readonly pid: number | undefined;
  start(
    argv: readonly string[],
    workdir: string,
    env: Record<string, string>,
    onLine: LineHandler,
  ): Promise<void>;
  isRunning(): boolean;
  /** Last observed exit code; null if never started or still running. */
  exitCode(): number | null;
  stop(): Promise<void>;
  /** Resolves with the exit code once the process exits; 0 if never started. */
  wait(): Promise<number>;
}

export interface ProcessHandleOptions {
  /** How long stop() waits after SIGTERM before SIGKILL. Default 10 000. */
  graceMs?: number;
  /** Called when the grace period ran out and the process was force-killed. */
  onTimeout?: (error: ProcessTimeoutError) => void;
  /** Called for errors that do not affect the lifecycle (kill failures, throwing line handlers). */
  onError?: (error: Error) => void;
}

export const DEFAULT_STOP_GRACE_MS = 10_000;

/** Replaces the shell with the target, keeping its pid, after folding fd 2 into fd 1. */
const MERGE_STREAMS_SCRIPT = 'exec "$0" "$@" 2>&1';

/** Exit code for a signal-terminated process, following the shell's 128+N convention. */
export function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  const signo: unknown = entry?.[1];
  return 128 + (typeof signo === 'number' ? signo : 0);
}

// ── ProcessHandle ────────────────────────────────────────────────────────

export class ProcessHandle implements ProcessRunner {
  private proc: ChildProcess | null = null;
  private exited: Promise<number> | null = null;
  private running = false;
  private lastExitCode: number | null = null;
  private readonly graceMs: number;

  constructor(private readonly options: ProcessHandleOptions = {}) {
    this.graceMs = options.graceMs ?? DEFAULT_STOP_GRACE_MS;
  }

  get pid(): number | undefined {
    return this.running ? this.proc?.pid : undefined;
  }

  isRunning(): boolean {
    return this.running;
  }

  exitCode(): number | null {
    return this.running ? null : this.lastExitCode;
  }

  async start(
    argv: readonly string[],
    workdir: string,
    env: Record<string, string>,
    onLine: LineHandler,
  ): Promise<void> {
    if (this.running) {
      throw new AlreadyRunningError(
        `Process ${this.proc?.pid ?? '?'} is still running`,
        { pid: this.proc?.pid },
      );
    }

    const [command, ...args] = argv;
    if (!command) {
      throw new InvalidArgumentError('Cannot start a process from an empty command');
    }

    const childEnv = { ...process.env, ...env };
    const proc = spawnMerged(command, args, workdir, childEnv);

    // Attach before awaiting spawn so an instant exit is never missed.
    const exited = new Promise<number>((resolve) => {
      proc.once('exit', (code, signal) => {
        const exitCode = code ?? signalExitCode(signal);
        this.lastExitCode = exitCode;
        if (this.proc === proc) this.running = false;
        resolve(exitCode);
      });
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        cleanup();
        resolve();
      };
      const onError = (err: Error) => {
        cleanup();
        reject(err);
      };
      const cleanup = () => {
        proc.off('spawn', onSpawn);
        proc.off('error', onError);
      };
      proc.once('spawn', onSpawn);
      proc.once('error', onError);
    });

    // Post-spawn errors (e.g. a failed kill) must not become uncaught.
    proc.on('error', (err) => {
      this.options.onError?.(err);
    });

    this.proc = proc;
    this.exited = exited;
    this.lastExitCode = null;
    this.running = proc.exitCode === null && proc.signalCode === null;

    this.pipeLines(proc, onLine);
  }

  async stop(): Promise<void> {
    const proc = this.proc;
    const exited = this.exited;
    if (!proc || !exited || !this.running) return;

    proc.kill('SIGTERM');
    if (await this.exitsWithin(exited, this.graceMs)) return;

    this.options.onTimeout?.(
      new ProcessTimeoutError(
        `Process ${proc.pid ?? '?'} ignored SIGTERM for ${this.graceMs}ms; sending SIGKILL`,
        this.graceMs,
        { pid: proc.pid },
      ),
    );
    proc.kill('SIGKILL');
    await exited;
  }

  async wait(): Promise<number> {
    if (!this.exited) return 0;
    return this.exited;
  }

  // ── Internal ───────────────────────────────────────────────────────────

  private pipeLines(proc: ChildProcess, onLine: LineHandler): void {
    for (const stream of [proc.stdout, proc.stderr]) {
      if (!stream) continue;
      const rl = createInterface({ input: stream, crlfDelay: Infinity });
      rl.on('line', (line) => {
        try {
          onLine(line);
        } catch (err) {
          this.options.onError?.(toError(err));
        }
      });
    }
  }

  private exitsWithin(exited: Promise<number>, ms: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), ms);
      void exited.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }
}

// ── Spawning ─────────────────────────────────────────────────────────────

function spawnMerged(
  command: string,
  args: readonly string[],
  workdir: string,
  env: NodeJS.ProcessEnv,
): ChildProcess {
  if (process.platform === 'win32') {
    return spawn(command, args, { cwd: workdir, env, stdio: ['ignore', 'pipe', 'pipe'] });
  }

  // A missing binary fails the spawn here, not as a shell exit 127.
  const executable = resolveExecutable(command, workdir, env.PATH);
  if (!executable) throw spawnError(command, 'ENOENT');

  return spawn('/bin/sh', ['-c', MERGE_STREAMS_SCRIPT, executable, ...args], {
    cwd: workdir,
    env,
    stdio: ['ignore', 'pipe', 'pipe'],
  });
}

/** Path lookup the way execvp does it: names with a slash are taken relative to `workdir`. */
export function resolveExecutable(command: string, workdir: string, pathEnv: string | undefined): string | null {
  if (command.includes('/')) {
    const candidate = isAbsolute(command) ? command : resolve(workdir, command);
    return isExecutableFile(candidate) ? candidate : null;
  }
  for (const dir of (pathEnv ?? '').split(delimiter)) {
    if (!dir) continue;
    const candidate = join(isAbsolute(dir) ? dir : resolve(workdir, dir), command);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
}

function isExecutableFile(path: string): boolean {
  try {
    accessSync(path, fsConstants.X_OK);
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

function spawnError(command: string, code: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`spawn ${command} ${code}`);
  err.code = code;
  err.syscall = 'spawn';
  err.path = command;
  return err;
}
