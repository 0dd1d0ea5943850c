import { parseCommandArgs } from './args.js';

describe('parseCommandArgs', () => {
  it('returns empty defaults for no arguments', () => {
    expect(parseCommandArgs([])).toEqual({ config: null, reason: null, positionals: [], unknown: [] });
  });

  it('reads short and long flags with separate values', () => {
    const parsed = parseCommandArgs(['-c', '/etc/hw.json', 'lobby', '--reason', 'deploy']);
    expect(parsed).toEqual({
      config: '/etc/hw.json',
      reason: 'deploy',
      positionals: ['lobby'],
      unknown: [],
    });
  });

  it('accepts the --flag=value form', () => {
    const parsed = parseCommandArgs(['--config=./hw.json', '-r=maintenance window', 'a']);
    expect(parsed.config).toBe('./hw.json');
    expect(parsed.reason).toBe('maintenance window');
    expect(parsed.positionals).toEqual(['a']);
  });

  it('keeps an empty value after "="', () => {
    expect(parseCommandArgs(['--reason=']).reason).toBe('');
  });

  it('treats a trailing flag without a value as null', () => {
    expect(parseCommandArgs(['lobby', '--reason']).reason).toBeNull();
  });

  it('collects unknown flags separately', () => {
    const parsed = parseCommandArgs(['--force', 'lobby', '-x=1']);
    expect(parsed.unknown).toEqual(['--force', '-x=1']);
    expect(parsed.positionals).toEqual(['lobby']);
  });

  it('treats a lone dash as a positional', () => {
    expect(parseCommandArgs(['-']).positionals).toEqual(['-']);
  });

  it('lets the last occurrence win', () => {
    expect(parseCommandArgs(['-c', 'a.json', '-c', 'b.json']).config).toBe('b.json');
  });
});
