/**
 * Instrumentation capabilities a metric kind may read from.
 *
 * A MetricContext bundles whichever capabilities the host process can
 * provide. Missing members make the corresponding kinds unavailable.
 */

/** Execution/storage pool accounting maintained by the executor's memory manager. */
export interface MemoryManagerCounters {
  readonly onHeapExecutionMemoryUsed: number;
  readonly offHeapExecutionMemoryUsed: number;
  readonly onHeapStorageMemoryUsed: number;
  readonly offHeapStorageMemoryUsed: number;
}

/** Runtime heap usage, in bytes. */
export interface HeapUsageSource {
  heapUsed(): number;
  nonHeapUsed(): number;
}

export type BufferPoolName = "direct" | "mapped";

/** Runtime buffer pools. Returns undefined for a pool this platform does not expose. */
export interface BufferPoolSource {
  memoryUsed(pool: BufferPoolName): number | undefined;
}

/** Cumulative process CPU accounting. */
export interface ProcessCpuSource {
  /** Total CPU time consumed by the process, in nanoseconds. */
  processCpuTimeNs(): number;
  /** Process uptime, in milliseconds. */
  uptimeMs(): number;
  availableProcessors(): number;
}

export interface MetricContext {
  memoryManager?: MemoryManagerCounters;
  heap?: HeapUsageSource;
  bufferPools?: BufferPoolSource;
  processCpu?: ProcessCpuSource;
}
