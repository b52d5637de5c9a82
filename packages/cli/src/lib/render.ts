/**
 * Text rendering of entries, names and map statistics
 *
 * Renderers return the lines to print; `createPrinter` decides whether
 * they reach stdout.
 */

import type { DataMapStats, DataRow } from "@datamap/sdk";

export function renderRow(row: DataRow, options: { raw?: boolean } = {}): string[] {
  return [options.raw ? JSON.stringify(row) : JSON.stringify(row, null, 2)];
}

/**
 * One name per line, or a JSON array. Reads every name before returning,
 * so a missing translation fails even when nothing is printed.
 */
export function renderNames(names: Iterable<string>, options: { json?: boolean } = {}): string[] {
  const list = [...names];
  return options.json ? [JSON.stringify(list, null, 2)] : list;
}

export function renderStats(stats: DataMapStats, options: { json?: boolean } = {}): string[] {
  if (options.json) {
    return [JSON.stringify(stats)];
  }
  return [
    `Entries: ${stats.entries}`,
    `Names: ${stats.names}`,
    `Languages: ${stats.languages.length > 0 ? stats.languages.join(", ") : "(none)"}`,
  ];
}

export type Printer = (lines: string[]) => void;

/**
 * Printer that writes each line to stdout, or nothing under --quiet
 */
export function createPrinter(quiet: boolean): Printer {
  return (lines) => {
    if (quiet) return;
    for (const line of lines) {
      console.log(line);
    }
  };
}
