/**
 * Metric identity types.
 */

/** Which abstract instrumentation capability a metric kind reads from. */
export const MetricCapability = {
  MEMORY_MANAGER_COUNTER: "memory-manager-counter",
  RUNTIME_HEAP_BEAN: "runtime-heap-bean",
  RUNTIME_BUFFER_POOL_BEAN: "runtime-buffer-pool-bean",
  OS_PROCESS_CPU: "os-process-cpu",
} as const;

export type MetricCapabilityValue = (typeof MetricCapability)[keyof typeof MetricCapability];

export type MetricKindName =
  | "JVMHeapMemory"
  | "JVMOffHeapMemory"
  | "OnHeapExecutionMemory"
  | "OffHeapExecutionMemory"
  | "OnHeapStorageMemory"
  | "OffHeapStorageMemory"
  | "OnHeapUnifiedMemory"
  | "OffHeapUnifiedMemory"
  | "DirectPoolMemory"
  | "MappedPoolMemory"
  | "CpuTime";

/** A registered metric source. `index` is its fixed offset in every snapshot. */
export interface MetricKind {
  readonly name: MetricKindName;
  readonly index: number;
  readonly capability: MetricCapabilityValue;
}

/**
 * One reading per registered kind, aligned with the registry order.
 * Values are non-negative safe integers.
 */
export type Snapshot = readonly number[];

/**
 * Per-executor peak values, aligned with the registry order.
 * Slot 0 holds -1 until a snapshot has been recorded.
 */
export type PeakState = number[];

/** Sentinel held by slot 0 of a PeakState that has never recorded a snapshot. */
export const PEAK_NOT_RECORDED = -1;
