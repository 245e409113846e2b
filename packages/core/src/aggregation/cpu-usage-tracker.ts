/**
 * CpuUsageTracker — rolling CPU utilization windows keyed by executor id.
 *
 * Each window holds the last CPU_WINDOW_CAPACITY samples, oldest first.
 * New windows start full of CPU_WARMUP_USAGE so a fresh executor does not
 * report as idle before real samples arrive.
 */

import { CpuSampleError, ExecutorNotFoundError } from "@execmon/sdk";
import type { ICpuUsageTracker } from "@execmon/sdk";

export const CPU_WINDOW_CAPACITY = 5;
export const CPU_WARMUP_USAGE = 100;

const STORE = "cpu usage";

export function createCpuUsageTracker(): ICpuUsageTracker {
  const windows = new Map<string, number[]>();

  function windowOf(executorId: string): number[] {
    const window = windows.get(executorId);
    if (!window) {
      throw new ExecutorNotFoundError(executorId, STORE);
    }
    return window;
  }

  const tracker: ICpuUsageTracker = {
    capacity: CPU_WINDOW_CAPACITY,

    init(executorId: string): void {
      if (windows.has(executorId)) return;
      windows.set(executorId, new Array<number>(CPU_WINDOW_CAPACITY).fill(CPU_WARMUP_USAGE));
    },

    update(executorId: string, sample: number): void {
      if (!Number.isFinite(sample)) {
        throw new CpuSampleError(executorId, sample);
      }
      tracker.init(executorId);
      const window = windowOf(executorId);

      for (let i = 0; i < window.length - 1; i++) {
        window[i] = window[i + 1];
      }
      window[window.length - 1] = sample;
    },

    clear(executorId: string): boolean {
      return windows.delete(executorId);
    },

    has(executorId: string): boolean {
      return windows.has(executorId);
    },

    get(executorId: string): number[] {
      return [...windowOf(executorId)];
    },

    average(executorId: string): number {
      const window = windowOf(executorId);
      let sum = 0;
      for (const sample of window) {
        sum += sample;
      }
      return sum / window.length;
    },

    executors(): string[] {
      return Array.from(windows.keys());
    },
  };

  return tracker;
}
