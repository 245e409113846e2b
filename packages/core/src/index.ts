// Metric sources
export { METRIC_TABLE } from "./metrics/catalog.js";
export type { MetricExtractor, MetricTableEntry } from "./metrics/catalog.js";
export { createMetricSourceRegistry, getMetricSourceRegistry } from "./metrics/registry.js";
export type { MetricSourceRegistry } from "./metrics/registry.js";
export { captureSnapshot, assertSnapshot } from "./metrics/snapshot.js";
export type { CapturedSnapshot } from "./metrics/snapshot.js";

// Aggregation
export {
  newPeakState,
  compareAndUpdate,
  resetPeakState,
  hasRecordedPeaks,
} from "./aggregation/peak-metrics.js";
export { createPeakMetricsRegistry } from "./aggregation/peak-registry.js";
export {
  createCpuUsageTracker,
  CPU_WINDOW_CAPACITY,
  CPU_WARMUP_USAGE,
} from "./aggregation/cpu-usage-tracker.js";

// Instrumentation
export {
  computeCpuUsage,
  createProcessCpuSampler,
  createReportedCpuSampler,
  createCpuUsageSampler,
  DEFAULT_CPU_SCALE_DIVISOR,
} from "./instrumentation/cpu-sampler.js";
export type { CpuSamplerOptions } from "./instrumentation/cpu-sampler.js";
export { createNodeMetricContext, createNodeProcessCpuSource } from "./instrumentation/node-context.js";
export type { NodeMetricContextOptions } from "./instrumentation/node-context.js";

// Collection
export { createExecutorMetricsCollector } from "./collector/executor-metrics-collector.js";
export type {
  ExecutorMetricsCollector,
  ExecutorMetricsCollectorDeps,
  ExecutorSource,
  MetricContextProvider,
} from "./collector/executor-metrics-collector.js";

// EventBus
export { createEventBus, executorOf } from "./bus/index.js";

// Configuration
export { loadCollectorConfig, CONFIG_ENV } from "./config/collector-config.js";

// Observability
export { createCollectorStats, CollectorStat, unavailableStat } from "./observability/index.js";
export type { CollectorStats, CollectorStatsSnapshot } from "./observability/index.js";
