/**
 * Shared CLI styling: ANSI colors, indicators and small rendering helpers.
 *
 * Every function returns a string; printing is left to the commands.
 */

// ---------------------------------------------------------------------------
// Colors
// ---------------------------------------------------------------------------

export const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';
export const RED = '\x1b[31m';
export const GREEN = '\x1b[32m';
export const YELLOW = '\x1b[33m';
export const CYAN = '\x1b[36m';

// ---------------------------------------------------------------------------
// Indicators
// ---------------------------------------------------------------------------

export const CHECK = `${GREEN}✓${RESET}`;
export const CROSS = `${RED}✗${RESET}`;
export const WARN = `${YELLOW}⚠${RESET}`;

export const HORIZONTAL = '─';

// ---------------------------------------------------------------------------
// Layout helpers
// ---------------------------------------------------------------------------

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

/** Length of a string as displayed, ignoring ANSI escapes. */
export function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

/** Right-pad to `width` visible columns. */
export function padVisible(text: string, width: number): string {
  const gap = width - visibleLength(text);
  return gap > 0 ? text + ' '.repeat(gap) : text;
}

export function sectionHeader(title: string, width = 50): string {
  return `  ${CYAN}${BOLD}${title}${RESET}\n  ${DIM}${HORIZONTAL.repeat(width)}${RESET}`;
}

export function kvRow(label: string, value: string, labelWidth = 14): string {
  return `  ${BOLD}${label.padEnd(labelWidth)}${RESET}${value}`;
}

export function separator(width = 50): string {
  return `  ${DIM}${HORIZONTAL.repeat(width)}${RESET}`;
}

/** Render rows as left-aligned columns; the first row is the header. */
export function table(rows: readonly (readonly string[])[]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, visibleLength(cell));
    });
  }
  return rows.map((row, rowIndex) => {
    const cells = row.map((cell, i) => {
      const last = i === row.length - 1;
      return last ? cell : padVisible(cell, (widths[i] ?? 0) + 2);
    });
    const line = `  ${cells.join('')}`;
    return rowIndex === 0 ? `${BOLD}${line}${RESET}` : line;
  });
}

// ---------------------------------------------------------------------------
// Status coloring
// ---------------------------------------------------------------------------

export function colorStatus(status: string): string {
  switch (status) {
    case 'running':
      return `${GREEN}${status}${RESET}`;
    case 'starting':
    case 'stopping':
    case 'updating':
    case 'degraded':
      return `${YELLOW}${status}${RESET}`;
    case 'crashed':
      return `${RED}${status}${RESET}`;
    default:
      return `${DIM}${status}${RESET}`;
  }
}

export function colorHealth(health: string): string {
  switch (health) {
    case 'ok':
      return `${GREEN}${health}${RESET}`;
    case 'warn':
      return `${YELLOW}${health}${RESET}`;
    default:
      return `${RED}${health}${RESET}`;
  }
}
