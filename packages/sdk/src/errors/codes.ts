/**
 * Error code constants shared by every package.
 */

export const ErrorCode = {
  METRICS_ERROR: "METRICS_ERROR",
  METRIC_UNAVAILABLE: "METRIC_UNAVAILABLE",
  EXECUTOR_NOT_FOUND: "EXECUTOR_NOT_FOUND",
  SNAPSHOT_MISMATCH: "SNAPSHOT_MISMATCH",
  SNAPSHOT_INVALID_VALUE: "SNAPSHOT_INVALID_VALUE",
  CPU_SAMPLE_INVALID: "CPU_SAMPLE_INVALID",
  CONFIG_ERROR: "CONFIG_ERROR",
  CONFIG_VALIDATION_ERROR: "CONFIG_VALIDATION_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
