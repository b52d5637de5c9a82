/**
 * Metrics tracking for name lookups
 *
 * Per-language counters exist only for languages present in a map's
 * reverse index; lookups in any other language share one counter.
 */

export interface LookupMetrics {
  hitCount: number;
  missCount: number;
}

export interface MetricsSnapshot {
  inserts: number;
  removals: number;
  unknownLanguageLookups: number;
  lookups: Record<string, LookupMetrics>;
}

class MetricsCollector {
  #lookups = new Map<string, LookupMetrics>();
  #inserts = 0;
  #removals = 0;
  #unknownLanguageLookups = 0;

  #getLookup(language: string): LookupMetrics {
    let metrics = this.#lookups.get(language);
    if (!metrics) {
      metrics = { hitCount: 0, missCount: 0 };
      this.#lookups.set(language, metrics);
    }
    return metrics;
  }

  recordHit(language: string): void {
    this.#getLookup(language).hitCount++;
  }

  recordMiss(language: string): void {
    this.#getLookup(language).missCount++;
  }

  recordUnknownLanguage(): void {
    this.#unknownLanguageLookups++;
  }

  recordInsert(): void {
    this.#inserts++;
  }

  recordRemoval(): void {
    this.#removals++;
  }

  /**
   * Hit rate for a language (0 when nothing was looked up)
   */
  hitRate(language: string): number {
    const metrics = this.#lookups.get(language);
    if (!metrics) return 0;
    const total = metrics.hitCount + metrics.missCount;
    return total === 0 ? 0 : metrics.hitCount / total;
  }

  /**
   * Copy of all counters
   */
  getMetrics(): MetricsSnapshot {
    const lookups: Record<string, LookupMetrics> = {};
    for (const [language, metrics] of this.#lookups) {
      lookups[language] = { ...metrics };
    }
    return {
      inserts: this.#inserts,
      removals: this.#removals,
      unknownLanguageLookups: this.#unknownLanguageLookups,
      lookups,
    };
  }

  /**
   * Reset all metrics
   */
  reset(): void {
    this.#lookups.clear();
    this.#inserts = 0;
    this.#removals = 0;
    this.#unknownLanguageLookups = 0;
  }
}

/**
 * Global metrics collector
 */
export const metrics = new MetricsCollector();
