// Types
export type {
  MetricCapabilityValue,
  MetricKindName,
  MetricKind,
  Snapshot,
  PeakState,
} from "./types/metric.js";

export { MetricCapability, PEAK_NOT_RECORDED } from "./types/metric.js";

export type {
  MemoryManagerCounters,
  HeapUsageSource,
  BufferPoolName,
  BufferPoolSource,
  ProcessCpuSource,
  MetricContext,
} from "./types/context.js";

export type {
  CpuReading,
  CpuSamplerSource,
  ICpuUsageSampler,
  IReportedCpuUsageSampler,
} from "./types/cpu.js";

export { isReportedCpuUsageSampler } from "./types/cpu.js";

export type {
  NamedPeaks,
  ExecutorMetricsReport,
  CollectionResult,
} from "./types/report.js";

export type {
  EventHandler,
  EventBus,
  MetricsEvent,
  MetricsEventTypeValue,
} from "./types/events.js";

export { MetricsEventType } from "./types/events.js";

// Errors
export {
  MetricsError,
  MetricUnavailableError,
  ExecutorNotFoundError,
  SnapshotMismatchError,
  SnapshotValueError,
  CpuSampleError,
  ConfigError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";

// Interfaces
export type { IPeakMetricsRegistry } from "./interfaces/peaks.js";
export type { ICpuUsageTracker } from "./interfaces/cpu-usage.js";
