/**
 * PeakMetricsRegistry — peak states keyed by executor id.
 *
 * Lifecycle: register on executor add, compareAndUpdate per collected
 * snapshot, reset on metrics epoch rollover, deregister on executor removal.
 * Every operation runs synchronously, so each one is atomic with respect to
 * the others.
 */

import { ExecutorNotFoundError } from "@execmon/sdk";
import type { IPeakMetricsRegistry, NamedPeaks, PeakState, Snapshot } from "@execmon/sdk";
import { createLogger } from "@execmon/shared";
import type { MetricSourceRegistry } from "../metrics/registry.js";
import { getMetricSourceRegistry } from "../metrics/registry.js";
import {
  compareAndUpdate,
  hasRecordedPeaks,
  newPeakState,
  resetPeakState,
} from "./peak-metrics.js";

const logger = createLogger("PeakMetricsRegistry");

const STORE = "peak metrics";

export function createPeakMetricsRegistry(
  sources: MetricSourceRegistry = getMetricSourceRegistry(),
): IPeakMetricsRegistry {
  const states = new Map<string, PeakState>();

  function stateOf(executorId: string): PeakState {
    const state = states.get(executorId);
    if (!state) {
      throw new ExecutorNotFoundError(executorId, STORE);
    }
    return state;
  }

  return {
    register(executorId: string): void {
      if (states.has(executorId)) {
        logger.debug("Executor already registered", { executorId });
        return;
      }
      states.set(executorId, newPeakState(sources.size));
    },

    deregister(executorId: string): boolean {
      return states.delete(executorId);
    },

    has(executorId: string): boolean {
      return states.has(executorId);
    },

    compareAndUpdate(executorId: string, snapshot: Snapshot): boolean {
      return compareAndUpdate(stateOf(executorId), snapshot);
    },

    reset(executorId: string): void {
      resetPeakState(stateOf(executorId));
    },

    resetAll(): void {
      for (const state of states.values()) {
        resetPeakState(state);
      }
    },

    get(executorId: string): PeakState {
      return [...stateOf(executorId)];
    },

    getNamed(executorId: string): NamedPeaks | null {
      const state = stateOf(executorId);
      if (!hasRecordedPeaks(state)) return null;

      const named: NamedPeaks = {};
      for (const kind of sources.listKinds()) {
        named[kind.name] = state[kind.index];
      }
      return named;
    },

    executors(): string[] {
      return Array.from(states.keys());
    },
  };
}
