/**
 * In-memory counters and gauges describing the collector itself
 * (ticks run, unavailable reads, failures). Distinct from the executor
 * metrics it collects.
 */

export interface CollectorStatsSnapshot {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  timestamp: number;
}

export interface CollectorStats {
  increment(name: string, delta?: number): void;
  gauge(name: string, value: number): void;
  getSnapshot(): CollectorStatsSnapshot;
  reset(): void;
}

export const CollectorStat = {
  TICKS: "collector.ticks",
  TICK_ERRORS: "collector.tick_errors",
  PEAK_UPDATES: "collector.peak_updates",
  CPU_SAMPLES: "collector.cpu_samples",
  CPU_SAMPLES_SKIPPED: "collector.cpu_samples_skipped",
  EXECUTORS: "collector.executors",
} as const;

/** Counter name for unavailable reads of one metric kind. */
export function unavailableStat(metricName: string): string {
  return `source.unavailable.${metricName}`;
}

export function createCollectorStats(): CollectorStats {
  const counters = new Map<string, number>();
  const gauges = new Map<string, number>();

  return {
    increment(name: string, delta = 1): void {
      counters.set(name, (counters.get(name) ?? 0) + delta);
    },

    gauge(name: string, value: number): void {
      gauges.set(name, value);
    },

    getSnapshot(): CollectorStatsSnapshot {
      return {
        counters: Object.fromEntries(counters),
        gauges: Object.fromEntries(gauges),
        timestamp: Date.now(),
      };
    },

    reset(): void {
      counters.clear();
      gauges.clear();
    },
  };
}
