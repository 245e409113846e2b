/**
 * Error hierarchy for executor metrics collection.
 */

import { ErrorCode } from "./codes.js";
import type { MetricCapabilityValue, MetricKindName } from "../types/metric.js";

export class MetricsError extends Error {
  constructor(
    message: string,
    public readonly code: string = ErrorCode.METRICS_ERROR,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "MetricsError";
  }
}

/**
 * Thrown when the capability a metric kind reads from is missing.
 * Snapshot capture recovers by substituting 0.
 */
export class MetricUnavailableError extends MetricsError {
  constructor(
    public readonly metricName: MetricKindName,
    public readonly capability: MetricCapabilityValue,
    options?: { cause?: Error },
  ) {
    super(
      `Metric "${metricName}" unavailable: capability "${capability}" not provided`,
      ErrorCode.METRIC_UNAVAILABLE,
      options,
    );
    this.name = "MetricUnavailableError";
  }
}

export class ExecutorNotFoundError extends MetricsError {
  constructor(
    public readonly executorId: string,
    public readonly store: string,
  ) {
    super(`Executor "${executorId}" has no ${store} state`, ErrorCode.EXECUTOR_NOT_FOUND);
    this.name = "ExecutorNotFoundError";
  }
}

export class SnapshotMismatchError extends MetricsError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(
      `Snapshot length ${actual} does not match registry size ${expected}`,
      ErrorCode.SNAPSHOT_MISMATCH,
    );
    this.name = "SnapshotMismatchError";
  }
}

export class SnapshotValueError extends MetricsError {
  constructor(
    public readonly index: number,
    public readonly value: number,
  ) {
    super(
      `Snapshot slot ${index} holds ${String(value)}, expected a non-negative safe integer`,
      ErrorCode.SNAPSHOT_INVALID_VALUE,
    );
    this.name = "SnapshotValueError";
  }
}

export class CpuSampleError extends MetricsError {
  constructor(
    public readonly executorId: string,
    public readonly sample: number,
  ) {
    super(
      `CPU sample ${String(sample)} for executor "${executorId}" is not a finite number`,
      ErrorCode.CPU_SAMPLE_INVALID,
    );
    this.name = "CpuSampleError";
  }
}

export class ConfigError extends MetricsError {
  constructor(
    message: string,
    options?: { cause?: Error; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}
