/**
 * @fileoverview Progress and tabular output for CLI commands
 */

import cliProgress from 'cli-progress';

export interface ProgressBarHandle {
  update(current: number, payload?: Record<string, unknown>): void;
  increment(delta?: number, payload?: Record<string, unknown>): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  format?: string;
  etaBuffer?: number;
}

/**
 * Progress bar on stderr, so stdout stays machine-readable.
 */
export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const { total, etaBuffer = 10 } = options;

  const format = options.format || '{bar} {percentage}% | {value}/{total} | {task}';

  const bar = new cliProgress.SingleBar(
    {
      format,
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true,
      etaBuffer,
      stream: process.stderr,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(total, 0, { task: 'Starting...' });

  return {
    update(current: number, payload?: Record<string, unknown>): void {
      bar.update(current, payload);
    },

    increment(delta = 1, payload?: Record<string, unknown>): void {
      bar.increment(delta, payload);
    },

    stop(): void {
      bar.stop();
    },
  };
}

/**
 * Format milliseconds into a human-readable duration
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Display a simple table in the terminal
 */
export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length)),
  );
  const pad = (cells: readonly string[]): string =>
    cells.map((cell, i) => cell.padEnd(widths[i] ?? cell.length)).join(' | ').trimEnd();

  console.log(pad(headers));
  console.log(widths.map((w) => '-'.repeat(w)).join('-+-'));
  for (const row of rows) {
    console.log(pad(row));
  }
}

/**
 * Print a key-value list
 */
export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  const maxKeyLength = Math.max(...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}
