/**
 * Output formatting utilities
 */

import chalk from 'chalk';

export type OutputFormat = 'json' | 'table';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table'];

let outputFormat: OutputFormat = 'table';
let quietMode = false;
let verboseMode = false;

export function setOutputFormat(format: OutputFormat): void {
  outputFormat = format;
}

export function getOutputFormat(): OutputFormat {
  return outputFormat;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'json' || value === 'table';
}

export function setQuietMode(quiet: boolean): void {
  quietMode = quiet;
}

export function setVerboseMode(verbose: boolean): void {
  verboseMode = verbose;
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Lay out rows under headers, each column as wide as its widest cell
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const columnWidths = headers.map((header, i) =>
    Math.max(stripAnsi(header).length, ...rows.map((row) => stripAnsi(row[i] ?? '').length))
  );

  const lines = [
    headers.map((header, i) => chalk.bold(padRight(header, columnWidths[i] ?? 0))).join('  '),
    columnWidths.map((width) => '-'.repeat(width)).join('  '),
  ];
  for (const row of rows) {
    lines.push(headers.map((_, i) => padRight(row[i] ?? '', columnWidths[i] ?? 0)).join('  ').trimEnd());
  }
  return lines;
}

export function printTable(headers: string[], rows: string[][]): void {
  for (const line of formatTable(headers, rows)) {
    console.log(line);
  }
}

/**
 * Strip ANSI escape codes for width calculation
 */
function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes use control characters
  return str.replace(/\x1B\[[0-9;]*[a-zA-Z]/g, '');
}

function padRight(str: string, width: number): string {
  const padding = Math.max(0, width - stripAnsi(str).length);
  return str + ' '.repeat(padding);
}

export interface TableConfig<T> {
  headers: string[];
  getRow: (item: T) => string[];
}

/**
 * Print items in the current format
 */
export function printData<T>(items: T[], tableConfig: TableConfig<T>): void {
  if (outputFormat === 'json') {
    printJson(items);
    return;
  }
  printTable(tableConfig.headers, items.map(tableConfig.getRow));
}

export function success(message: string): void {
  if (!quietMode) {
    console.log(chalk.green('✓'), message);
  }
}

export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function warn(message: string): void {
  if (!quietMode) {
    console.warn(chalk.yellow('⚠'), message);
  }
}

export function info(message: string): void {
  if (!quietMode) {
    console.log(chalk.blue('ℹ'), message);
  }
}

/**
 * Print verbose message (only if verbose mode)
 */
export function verbose(message: string): void {
  if (verboseMode) {
    console.log(chalk.gray('▸'), chalk.gray(message));
  }
}
