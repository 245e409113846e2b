/**
 * Metric kind catalog.
 *
 * One ordered table maps each kind to the capability it reads from and the
 * function extracting its value. Table order is the snapshot order.
 */

import { MetricCapability } from "@execmon/sdk";
import type {
  BufferPoolName,
  MemoryManagerCounters,
  MetricCapabilityValue,
  MetricContext,
  MetricKindName,
} from "@execmon/sdk";

/** Returns undefined when the context lacks what the kind needs. */
export type MetricExtractor = (ctx: MetricContext) => number | undefined;

export interface MetricTableEntry {
  name: MetricKindName;
  capability: MetricCapabilityValue;
  extract: MetricExtractor;
}

function counter(f: (m: MemoryManagerCounters) => number): MetricExtractor {
  return (ctx) => (ctx.memoryManager ? f(ctx.memoryManager) : undefined);
}

function bufferPool(pool: BufferPoolName): MetricExtractor {
  return (ctx) => ctx.bufferPools?.memoryUsed(pool);
}

export const METRIC_TABLE: readonly MetricTableEntry[] = [
  {
    name: "JVMHeapMemory",
    capability: MetricCapability.RUNTIME_HEAP_BEAN,
    extract: (ctx) => ctx.heap?.heapUsed(),
  },
  {
    name: "JVMOffHeapMemory",
    capability: MetricCapability.RUNTIME_HEAP_BEAN,
    extract: (ctx) => ctx.heap?.nonHeapUsed(),
  },
  {
    name: "OnHeapExecutionMemory",
    capability: MetricCapability.MEMORY_MANAGER_COUNTER,
    extract: counter((m) => m.onHeapExecutionMemoryUsed),
  },
  {
    name: "OffHeapExecutionMemory",
    capability: MetricCapability.MEMORY_MANAGER_COUNTER,
    extract: counter((m) => m.offHeapExecutionMemoryUsed),
  },
  {
    name: "OnHeapStorageMemory",
    capability: MetricCapability.MEMORY_MANAGER_COUNTER,
    extract: counter((m) => m.onHeapStorageMemoryUsed),
  },
  {
    name: "OffHeapStorageMemory",
    capability: MetricCapability.MEMORY_MANAGER_COUNTER,
    extract: counter((m) => m.offHeapStorageMemoryUsed),
  },
  {
    name: "OnHeapUnifiedMemory",
    capability: MetricCapability.MEMORY_MANAGER_COUNTER,
    extract: counter((m) => m.onHeapExecutionMemoryUsed + m.onHeapStorageMemoryUsed),
  },
  {
    name: "OffHeapUnifiedMemory",
    capability: MetricCapability.MEMORY_MANAGER_COUNTER,
    extract: counter((m) => m.offHeapExecutionMemoryUsed + m.offHeapStorageMemoryUsed),
  },
  {
    name: "DirectPoolMemory",
    capability: MetricCapability.RUNTIME_BUFFER_POOL_BEAN,
    extract: bufferPool("direct"),
  },
  {
    name: "MappedPoolMemory",
    capability: MetricCapability.RUNTIME_BUFFER_POOL_BEAN,
    extract: bufferPool("mapped"),
  },
  {
    name: "CpuTime",
    capability: MetricCapability.OS_PROCESS_CPU,
    extract: (ctx) => ctx.processCpu?.processCpuTimeNs(),
  },
];
