/**
 * CPU utilization sampling types.
 */

/** A cumulative CPU reading taken at one instant. */
export interface CpuReading {
  /** Cumulative process CPU time, in nanoseconds. */
  cpuTimeNs: number;
  /** Process uptime, in milliseconds. */
  uptimeMs: number;
  processors: number;
}

export type CpuSamplerSource = "process" | "reported";

/** Produces one CPU utilization percentage per call. */
export interface ICpuUsageSampler {
  readonly source: CpuSamplerSource;
  /** Percentage since the previous call, or undefined if no wall time has elapsed. */
  sample(): number | undefined;
}

/** Sampler fed with readings pushed from outside the process (e.g. heartbeats). */
export interface IReportedCpuUsageSampler extends ICpuUsageSampler {
  readonly source: "reported";
  record(reading: CpuReading): void;
}

export function isReportedCpuUsageSampler(
  sampler: ICpuUsageSampler,
): sampler is IReportedCpuUsageSampler {
  return sampler.source === "reported" && "record" in sampler && typeof sampler.record === "function";
}
