import { vi } from 'vitest';
import { USAGE, main } from './cli.js';

const strip = (text: string): string => text.replace(/\x1b\[[0-9;]*m/g, '');

describe('main', () => {
  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('prints usage for help and no command', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await main(['help']);
    await main([]);
    await main(['--help']);

    expect(log).toHaveBeenCalledTimes(3);
    expect(log.mock.calls[0]?.[0]).toBe(`\n${USAGE}\n`);
    expect(process.exitCode).toBeUndefined();
  });

  it('lists every command in the usage text', () => {
    const text = strip(USAGE);
    for (const command of ['run', 'status', 'start <server-id>', 'stop <server-id>', 'restart <server-id>']) {
      expect(text).toContain(`    ${command} `);
    }
  });

  it('rejects unknown commands with usage and exit code 1', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    await main(['deploy']);

    expect(strip(String(error.mock.calls[0]?.[0]))).toBe('\n  Unknown command: deploy\n');
    expect(error.mock.calls[1]?.[0]).toBe(`${USAGE}\n`);
    expect(process.exitCode).toBe(1);
  });

  it('routes control commands with their arguments', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    await main(['restart']);

    expect(strip(String(error.mock.calls[1]?.[0]))).toBe(
      '  Usage: hostwarden restart <server-id> [--reason text]\n',
    );
    expect(process.exitCode).toBe(1);
  });
});
