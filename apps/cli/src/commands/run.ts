/**
 * Run command -- start the supervisor daemon in the foreground.
 *
 * Usage:
 *   hostwarden run
 *   hostwarden run --config ./hostwarden.json
 *
 * Boots every configured server, serves the control API on the configured
 * gateway address, and (when enabled) relays events upstream. SIGINT or
 * SIGTERM stops the loop, the relay and the gateway, then every server.
 */

import { toError, type IObserver } from '@hostwarden/core';
import { GatewayServer } from '@hostwarden/gateway';
import { createObserver } from '@hostwarden/observability';
import { EventRelay } from '@hostwarden/relay';
import { Supervisor, type SupervisorOptions } from '@hostwarden/supervisor';
import { loadConfig, resolveConfigPath, type HostwardenConfig } from '../config.js';
import { BOLD, CYAN, DIM, GREEN, RED, RESET, YELLOW, kvRow, separator } from '../ui.js';
import { parseCommandArgs } from './args.js';

// ---------------------------------------------------------------------------
// Daemon assembly
// ---------------------------------------------------------------------------

export interface Daemon {
  supervisor: Supervisor;
  gateway: GatewayServer;
  relay: EventRelay | null;
  observer: IObserver;
  /** Resolves once the supervisor loop and the relay have both exited. */
  done: Promise<void>;
  /** Idempotent; resolves when everything is stopped and flushed. */
  shutdown(): Promise<void>;
}

/** Test seams passed through to the Supervisor. */
export type DaemonOverrides = Pick<SupervisorOptions, 'createProcess' | 'prober' | 'now'> & {
  observer?: IObserver;
};

export async function startDaemon(config: HostwardenConfig, overrides: DaemonOverrides = {}): Promise<Daemon> {
  const observer = overrides.observer ?? createObserver(config.observability);

  const supervisor = new Supervisor({
    clientId: config.clientId,
    servers: config.servers,
    maxServers: config.maxServers,
    tickIntervalMs: config.tickIntervalMs,
    observer,
    createProcess: overrides.createProcess,
    prober: overrides.prober,
    now: overrides.now,
  });

  const gateway = new GatewayServer({
    host: config.gateway.bind,
    port: config.gateway.port,
    supervisor,
    observer,
    sharedSecret: config.gateway.sharedSecret,
  });

  const { url, token } = config.relay;
  const relay =
    config.relay.enabled && url !== undefined && token !== undefined
      ? new EventRelay({
          url,
          token,
          clientId: config.clientId,
          bus: supervisor.bus,
          observer,
          reconnectBaseMs: config.relay.reconnectBaseMs,
          reconnectMaxMs: config.relay.reconnectMaxMs,
        })
      : null;

  await gateway.start();
  const relayLoop = relay ? relay.start() : Promise.resolve();

  await supervisor.startAll('boot');

  const supervisorLoop = supervisor.run();
  const done = Promise.all([supervisorLoop, relayLoop]).then(() => undefined);

  let stopping: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    stopping ??= (async () => {
      await supervisor.stop();
      if (relay) await relay.stop();
      await gateway.stop();
      await supervisor.stopAll('shutdown');
      await done;
      await observer.flush?.();
    })();
    return stopping;
  };

  return { supervisor, gateway, relay, observer, done, shutdown };
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

export async function run(args: string[]): Promise<void> {
  const parsed = parseCommandArgs(args);
  const configPath = resolveConfigPath(parsed.config ?? undefined);

  let config: HostwardenConfig;
  try {
    config = loadConfig(configPath);
  } catch (err) {
    console.error(`\n  ${RED}Failed to load config:${RESET} ${toError(err).message}\n`);
    process.exitCode = 1;
    return;
  }

  let daemon: Daemon;
  try {
    daemon = await startDaemon(config);
  } catch (err) {
    console.error(`\n  ${RED}Failed to start:${RESET} ${toError(err).message}\n`);
    process.exitCode = 1;
    return;
  }

  const relayState = daemon.relay
    ? `${GREEN}${config.relay.url ?? ''}${RESET}`
    : `${DIM}disabled${RESET}`;

  console.log(`\n  ${CYAN}${BOLD}hostwarden${RESET} ${DIM}(${config.clientId})${RESET}`);
  console.log(separator());
  console.log(kvRow('Config', configPath));
  console.log(kvRow('Gateway', daemon.gateway.url));
  console.log(kvRow('Relay', relayState));
  console.log(kvRow('Servers', String(daemon.supervisor.getServers().length)));
  console.log(`\n  ${DIM}Press Ctrl+C to stop.${RESET}\n`);

  const onSignal = (signal: NodeJS.Signals): void => {
    console.log(`\n  ${YELLOW}Received ${signal}, shutting down...${RESET}`);
    daemon.shutdown().catch((err: unknown) => {
      console.error(`  ${RED}Shutdown failed:${RESET} ${toError(err).message}`);
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    await daemon.done;
    await daemon.shutdown();
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
  console.log(`  ${DIM}Stopped.${RESET}\n`);
}
