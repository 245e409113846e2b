/**
 * MetricContext backed by the current Node.js process.
 *
 * Node exposes no separate non-heap pool, so off-heap usage is approximated
 * as resident memory outside the V8 heap. ArrayBuffer allocations stand in
 * for the direct buffer pool; there is no mapped pool.
 */

import os from "node:os";
import type { MemoryManagerCounters, MetricContext, ProcessCpuSource } from "@execmon/sdk";

export interface NodeMetricContextOptions {
  /** Execution/storage accounting kept by the host; omitted kinds read as unavailable. */
  memoryManager?: MemoryManagerCounters;
  processCpu?: ProcessCpuSource;
}

export function createNodeProcessCpuSource(): ProcessCpuSource {
  return {
    processCpuTimeNs(): number {
      const { user, system } = process.cpuUsage();
      return (user + system) * 1000;
    },
    uptimeMs(): number {
      return Math.round(process.uptime() * 1000);
    },
    availableProcessors(): number {
      return os.availableParallelism();
    },
  };
}

export function createNodeMetricContext(options: NodeMetricContextOptions = {}): MetricContext {
  return {
    memoryManager: options.memoryManager,
    heap: {
      heapUsed: () => process.memoryUsage().heapUsed,
      nonHeapUsed: () => {
        const { rss, heapTotal } = process.memoryUsage();
        return Math.max(0, rss - heapTotal);
      },
    },
    bufferPools: {
      memoryUsed: (pool) => (pool === "direct" ? process.memoryUsage().arrayBuffers : undefined),
    },
    processCpu: options.processCpu ?? createNodeProcessCpuSource(),
  };
}
