/**
 * Rolling CPU utilization windows keyed by executor.
 */

export interface ICpuUsageTracker {
  readonly capacity: number;

  /** Create a warm-up window if absent. Existing windows are left as-is. */
  init(executorId: string): void;

  /** Push a sample, evicting the oldest. Initializes the window first if needed. */
  update(executorId: string, sample: number): void;

  /** Remove the executor's window. Returns false if it was not tracked. */
  clear(executorId: string): boolean;

  has(executorId: string): boolean;

  /** Oldest-first copy of the window. */
  get(executorId: string): number[];

  /** Mean over every slot of the window. */
  average(executorId: string): number;

  executors(): string[];
}
