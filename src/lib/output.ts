const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const BLUE = '\x1b[34m';
const CYAN = '\x1b[36m';
const GRAY = '\x1b[90m';

export const colors = {
  bold: BOLD,
  dim: DIM,
  red: RED,
  green: GREEN,
  yellow: YELLOW,
  blue: BLUE,
  cyan: CYAN,
  gray: GRAY,
} as const;

export type Color = keyof typeof colors;

export function paint(text: string, color: Color): string {
  return `${colors[color]}${text}${RESET}`;
}

export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

let verbose = process.env.ADECK_DEBUG === '1';

export function setVerbose(value: boolean): void {
  verbose = value || process.env.ADECK_DEBUG === '1';
}

export function output(data: unknown, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(data);
  }
}

export function outputError(error: unknown, json: boolean): void {
  const message = error instanceof Error ? error.message : String(error);
  if (json) {
    const code = error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? error.code
      : 'UNKNOWN';
    console.error(JSON.stringify({ error: message, code }));
  } else {
    console.error(`${RED}Error:${RESET} ${message}`);
  }
}

export interface Column {
  header: string;
  key: string;
  width?: number;
  format?: (value: unknown) => string;
}

export function formatTable(rows: Record<string, unknown>[], columns: Column[]): string {
  if (rows.length === 0) return 'No results.';

  const render = (col: Column, row: Record<string, unknown>): string =>
    col.format ? col.format(row[col.key]) : String(row[col.key] ?? '');

  const widths = columns.map((col) => {
    const maxDataLen = rows.reduce(
      (max, row) => Math.max(max, stripAnsi(render(col, row)).length),
      0,
    );
    return col.width ?? Math.max(col.header.length, maxDataLen);
  });

  const header = columns
    .map((col, i) => `${BOLD}${col.header.padEnd(widths[i])}${RESET}`)
    .join('  ');

  const separator = widths.map((w) => DIM + '─'.repeat(w) + RESET).join('  ');

  const body = rows.map((row) =>
    columns
      .map((col, i) => {
        const val = render(col, row);
        const padding = Math.max(0, widths[i] - stripAnsi(val).length);
        return val + ' '.repeat(padding);
      })
      .join('  '),
  ).join('\n');

  return `${header}\n${separator}\n${body}`;
}

export function info(message: string): void {
  console.log(`${CYAN}▸${RESET} ${message}`);
}

export function success(message: string): void {
  console.log(`${GREEN}✓${RESET} ${message}`);
}

export function warn(message: string): void {
  console.log(`${YELLOW}⚠${RESET} ${message}`);
}

/** Diagnostic detail, printed only with --verbose or ADECK_DEBUG=1. */
export function debug(message: string): void {
  if (!verbose) return;
  console.error(`${GRAY}· ${message}${RESET}`);
}
