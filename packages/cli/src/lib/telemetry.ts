/**
 * Per-command metrics: timing plus the entries loaded and the name
 * lookups made while the command ran
 */

import { metrics, type MetricsSnapshot } from "@datamap/sdk";

export interface CommandMetrics {
  durationMs: number;
  success: boolean;
  entriesLoaded: number;
  lookupHits: number;
  lookupMisses: number;
}

function lookupTotals(snapshot: MetricsSnapshot): { hits: number; misses: number } {
  let hits = 0;
  let misses = snapshot.unknownLanguageLookups;
  for (const counters of Object.values(snapshot.lookups)) {
    hits += counters.hitCount;
    misses += counters.missCount;
  }
  return { hits, misses };
}

export function formatMetricLine(command: string, result: CommandMetrics): string {
  return (
    `metric cli.${command.replace(/\s+/g, "_")}` +
    ` duration_ms=${result.durationMs}` +
    ` success=${result.success}` +
    ` entries=${result.entriesLoaded}` +
    ` hits=${result.lookupHits}` +
    ` misses=${result.lookupMisses}`
  );
}

/**
 * Run a command and, when verbose, write its metric line to stderr
 */
export async function withCommandMetrics<T>(
  command: string,
  verbose: boolean,
  fn: () => Promise<T>
): Promise<T> {
  const before = metrics.getMetrics();
  const beforeLookups = lookupTotals(before);
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    if (verbose) {
      const after = metrics.getMetrics();
      const afterLookups = lookupTotals(after);
      const line = formatMetricLine(command, {
        durationMs: Date.now() - start,
        success,
        entriesLoaded: after.inserts - before.inserts,
        lookupHits: afterLookups.hits - beforeLookups.hits,
        lookupMisses: afterLookups.misses - beforeLookups.misses,
      });
      process.stderr.write(line + "\n");
    }
  }
}
