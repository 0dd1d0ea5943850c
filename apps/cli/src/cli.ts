/**
 * Command dispatch for the `hostwarden` CLI.
 */

import { control } from './commands/control.js';
import { run } from './commands/run.js';
import { status } from './commands/status.js';
import { BOLD, CYAN, DIM, RED, RESET } from './ui.js';

export const USAGE = [
  `  ${CYAN}${BOLD}hostwarden${RESET} ${DIM}- process supervisor${RESET}`,
  '',
  `  ${BOLD}Usage:${RESET} hostwarden <command> [options]`,
  '',
  `  ${BOLD}Commands:${RESET}`,
  '    run                         Start the supervisor in the foreground',
  '    status                      Show the fleet through the local gateway',
  '    start <server-id>           Start a server',
  '    stop <server-id>            Stop a server',
  '    restart <server-id>         Restart a server',
  '    help                        Show this help',
  '',
  `  ${BOLD}Options:${RESET}`,
  '    -c, --config <path>         Config file (default ~/.hostwarden/config.json)',
  '    -r, --reason <text>         Reason recorded with start/stop/restart',
].join('\n');

export async function main(argv: readonly string[]): Promise<void> {
  const [command, ...rest] = argv;

  switch (command) {
    case 'run':
      await run(rest);
      return;
    case 'status':
      await status(rest);
      return;
    case 'start':
    case 'stop':
    case 'restart':
      await control(command, rest);
      return;
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      console.log(`\n${USAGE}\n`);
      return;
    default:
      console.error(`\n  ${RED}Unknown command:${RESET} ${command}\n`);
      console.error(`${USAGE}\n`);
      process.exitCode = 1;
  }
}
