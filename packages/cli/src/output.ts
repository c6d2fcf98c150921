/**
 * CLI Output Utilities
 *
 * Structured output for JSON and human-readable formats.
 * @module @tidewater/cli/output
 */

import chalk from 'chalk';

export type OutputFormat = 'json' | 'table';

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'table';
}

let globalOutputFormat: OutputFormat = 'table';

export function setOutputFormat(format: OutputFormat): void {
  globalOutputFormat = format;
}

export function getOutputFormat(): OutputFormat {
  return globalOutputFormat;
}

export function success(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ success: true, message }));
  } else {
    console.log(chalk.green('✓') + ' ' + message);
  }
}

export function error(message: string, details?: unknown): void {
  if (globalOutputFormat === 'json') {
    console.error(JSON.stringify({ success: false, error: message, details }));
  } else {
    console.error(chalk.red('✗') + ' ' + message);
    if (details) {
      console.error(chalk.gray(JSON.stringify(details, null, 2)));
    }
  }
}

export function warn(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ warning: message }));
  } else {
    console.log(chalk.yellow('⚠') + ' ' + message);
  }
}

export function info(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ info: message }));
  } else {
    console.log(chalk.blue('ℹ') + ' ' + message);
  }
}

export interface Column<T> {
  key: keyof T & string;
  header: string;
  /** Renders the cell; defaults to String(value) */
  format?: (value: T[keyof T & string], row: T) => string;
}

/**
 * Render rows as an aligned table. Widths ignore colour escapes.
 */
export function formatTable<T extends object>(data: T[], columns: Column<T>[]): string[] {
  if (data.length === 0) {
    return [chalk.gray('No data to display')];
  }

  const cells = data.map((row) =>
    columns.map((col) => (col.format ? col.format(row[col.key], row) : String(row[col.key] ?? ''))),
  );
  const widths = columns.map((col, i) =>
    Math.max(col.header.length, ...cells.map((line) => visibleLength(line[i] ?? ''))),
  );
  const pad = (value: string, i: number): string => value + ' '.repeat(Math.max(0, (widths[i] ?? 0) - visibleLength(value)));

  return [
    chalk.bold(columns.map((col, i) => pad(col.header, i)).join('  ')),
    widths.map((w) => '─'.repeat(w)).join('──'),
    ...cells.map((line) => line.map(pad).join('  ')),
  ];
}

export function table<T extends object>(data: T[], columns: Column<T>[]): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }
  for (const line of formatTable(data, columns)) {
    console.log(line);
  }
}

export function keyValue(data: Record<string, unknown>): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));
  for (const [key, value] of Object.entries(data)) {
    console.log(`${chalk.bold(key.padEnd(maxKeyLength))}  ${formatValue(value)}`);
  }
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'boolean') {
    return value ? chalk.green('true') : chalk.red('false');
  }
  if (typeof value === 'number') {
    return chalk.cyan(String(value));
  }
  if (typeof value === 'object') {
    return chalk.gray(JSON.stringify(value));
  }
  return String(value);
}

/**
 * Coloured badge for environment status
 */
export function statusBadge(status: string): string {
  switch (status.toLowerCase()) {
    case 'up':
    case 'active':
      return chalk.green('●') + ' ' + chalk.green(status);
    case 'down':
      return chalk.red('●') + ' ' + chalk.red(status);
    case 'closing':
      return chalk.yellow('◐') + ' ' + chalk.yellow(status);
    default:
      return chalk.gray('○') + ' ' + chalk.gray(status);
  }
}

/**
 * Formats a date relative to `now`
 */
export function relativeTime(date: Date | string, now: Date = new Date()): string {
  const d = typeof date === 'string' ? new Date(date) : date;
  const diffSec = Math.floor((now.getTime() - d.getTime()) / 1000);
  const diffMin = Math.floor(diffSec / 60);
  const diffHour = Math.floor(diffMin / 60);
  const diffDay = Math.floor(diffHour / 24);

  if (diffSec < 60) return 'just now';
  if (diffMin < 60) return `${diffMin}m ago`;
  if (diffHour < 24) return `${diffHour}h ago`;
  if (diffDay < 7) return `${diffDay}d ago`;
  return d.toISOString().slice(0, 10);
}

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

function visibleLength(value: string): number {
  return value.replace(ANSI_PATTERN, '').length;
}
