/**
 * Argument parsing shared by the CLI commands.
 *
 * Recognized flags:
 *   -c, --config <path>   config file (overrides HOSTWARDEN_CONFIG)
 *   -r, --reason <text>   reason attached to start/stop/restart
 *
 * Both `--flag value` and `--flag=value` are accepted. Anything that is
 * not a flag is collected as a positional.
 */

export interface CommandArgs {
  config: string | null;
  reason: string | null;
  positionals: string[];
  /** Flags we did not recognize, reported by the caller. */
  unknown: string[];
}

const FLAG_ALIASES: ReadonlyMap<string, 'config' | 'reason'> = new Map([
  ['-c', 'config'],
  ['--config', 'config'],
  ['-r', 'reason'],
  ['--reason', 'reason'],
]);

export function parseCommandArgs(args: readonly string[]): CommandArgs {
  const parsed: CommandArgs = { config: null, reason: null, positionals: [], unknown: [] };

  let i = 0;
  while (i < args.length) {
    const arg = args[i] ?? '';
    i++;

    if (!arg.startsWith('-') || arg === '-') {
      parsed.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const key = FLAG_ALIASES.get(flag);
    if (!key) {
      parsed.unknown.push(arg);
      continue;
    }

    if (eq !== -1) {
      parsed[key] = arg.slice(eq + 1);
    } else {
      parsed[key] = args[i] ?? null;
      i++;
    }
  }

  return parsed;
}
