/**
 * Peak registry interface — per-executor high-water marks.
 */

import type { PeakState, Snapshot } from "../types/metric.js";
import type { NamedPeaks } from "../types/report.js";

export interface IPeakMetricsRegistry {
  /** Create the executor's peak state if absent. Existing state is kept. */
  register(executorId: string): void;

  /** Drop the executor's peak state. Returns false if it was not tracked. */
  deregister(executorId: string): boolean;

  has(executorId: string): boolean;

  /**
   * Fold a snapshot into the executor's peaks.
   * @returns true if any slot reached a new peak
   */
  compareAndUpdate(executorId: string, snapshot: Snapshot): boolean;

  /** Restore the executor's "never recorded" state. */
  reset(executorId: string): void;

  resetAll(): void;

  /** Copy of the executor's peak state. */
  get(executorId: string): PeakState;

  /** Peaks keyed by metric name, or null before the first recorded snapshot. */
  getNamed(executorId: string): NamedPeaks | null;

  executors(): string[];
}
