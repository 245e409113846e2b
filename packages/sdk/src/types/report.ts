import type { MetricKindName } from "./metric.js";

/** Peak values keyed by metric name. Holds one entry per registered kind. */
export type NamedPeaks = Partial<Record<MetricKindName, number>>;

/** Point-in-time view of one executor's aggregates, for reporting code. */
export interface ExecutorMetricsReport {
  executorId: string;
  /** Null until the executor has recorded its first snapshot. */
  peaks: NamedPeaks | null;
  cpu: {
    samples: number[];
    average: number;
  };
  timestamp: number;
}

/** Outcome of one collection tick for one executor. */
export interface CollectionResult {
  executorId: string;
  snapshot: number[];
  unavailable: MetricKindName[];
  peaksUpdated: boolean;
  /** The CPU sample pushed into the window, if the sampler produced one. */
  cpuSample?: number;
}
