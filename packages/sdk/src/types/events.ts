/**
 * Event system types and constants.
 */

/** Handler function for events. */
export type EventHandler = (event: MetricsEvent) => void | Promise<void>;

/** EventBus interface for pub/sub communication. */
export interface EventBus {
  on(type: MetricsEventTypeValue, handler: EventHandler): () => void;
  once(type: MetricsEventTypeValue, handler: EventHandler): () => void;
  onAny(handler: EventHandler): () => void;
  /** Receive every event whose payload names this executor. */
  onExecutor(executorId: string, handler: EventHandler): () => void;
  emit(event: MetricsEvent): void;
}

export interface MetricsEvent {
  type: MetricsEventTypeValue;
  timestamp: number;
  payload?: unknown;
}

export const MetricsEventType = {
  // Collector lifecycle
  COLLECTOR_STARTED: "collector:started",
  COLLECTOR_STOPPED: "collector:stopped",
  COLLECTOR_TICK_ERROR: "collector:tick_error",

  // Executor lifecycle
  EXECUTOR_REGISTERED: "executor:registered",
  EXECUTOR_DEREGISTERED: "executor:deregistered",

  // Aggregates
  PEAKS_UPDATED: "peaks:updated",
  PEAKS_RESET: "peaks:reset",
  CPU_SAMPLED: "cpu:sampled",

  // Sources
  METRIC_UNAVAILABLE: "metric:unavailable",
} as const;

export type MetricsEventTypeValue = (typeof MetricsEventType)[keyof typeof MetricsEventType];
