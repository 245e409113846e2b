/**
 * CPU usage samplers.
 *
 * Both variants turn two cumulative readings into a utilization percentage:
 *
 *   elapsedCpuNs / (elapsedUptimeMs × processors × scaleDivisor)
 *
 * The default divisor of 10 000 converts ns over ms into a percentage
 * (÷ 1 000 000 for ns→ms, × 100 for percent). It is configurable because
 * readings from other sources may use other units.
 */

import type {
  CpuReading,
  ICpuUsageSampler,
  IReportedCpuUsageSampler,
  ProcessCpuSource,
} from "@execmon/sdk";
import { createLogger } from "@execmon/shared";
import type { CollectorConfig, Logger } from "@execmon/shared";
import { createNodeProcessCpuSource } from "./node-context.js";

export const DEFAULT_CPU_SCALE_DIVISOR = 10_000;

export interface CpuSamplerOptions {
  scaleDivisor?: number;
  logger?: Logger;
}

/** Utilization between two readings, or undefined when no wall time elapsed. */
export function computeCpuUsage(
  previous: CpuReading,
  current: CpuReading,
  scaleDivisor: number = DEFAULT_CPU_SCALE_DIVISOR,
): number | undefined {
  const elapsedCpuNs = current.cpuTimeNs - previous.cpuTimeNs;
  const elapsedUptimeMs = current.uptimeMs - previous.uptimeMs;
  const totalElapsedMs = elapsedUptimeMs * current.processors;
  if (totalElapsedMs <= 0) return undefined;
  return elapsedCpuNs / (totalElapsedMs * scaleDivisor);
}

function logComputation(
  logger: Logger,
  previous: CpuReading,
  current: CpuReading,
  usage: number | undefined,
): void {
  logger.debug("CPU usage computed", {
    prevCpuTimeNs: previous.cpuTimeNs,
    curCpuTimeNs: current.cpuTimeNs,
    elapsedCpuTimeNs: current.cpuTimeNs - previous.cpuTimeNs,
    prevUptimeMs: previous.uptimeMs,
    curUptimeMs: current.uptimeMs,
    elapsedUptimeMs: current.uptimeMs - previous.uptimeMs,
    processors: current.processors,
    cpuUsage: usage,
  });
}

/**
 * Samples a ProcessCpuSource on every call. The baseline starts at zero, so
 * the first sample is the average utilization since the process started.
 */
export function createProcessCpuSampler(
  source: ProcessCpuSource,
  options: CpuSamplerOptions = {},
): ICpuUsageSampler {
  const scaleDivisor = options.scaleDivisor ?? DEFAULT_CPU_SCALE_DIVISOR;
  const logger = options.logger ?? createLogger("CpuSampler:process");
  let previous: CpuReading = { cpuTimeNs: 0, uptimeMs: 0, processors: 0 };

  return {
    source: "process",

    sample(): number | undefined {
      const current: CpuReading = {
        cpuTimeNs: source.processCpuTimeNs(),
        uptimeMs: source.uptimeMs(),
        processors: source.availableProcessors(),
      };
      const usage = computeCpuUsage(previous, current, scaleDivisor);
      logComputation(logger, previous, current, usage);
      if (usage !== undefined) {
        previous = current;
      }
      return usage;
    },
  };
}

/**
 * Samples readings pushed in from elsewhere, e.g. a worker's heartbeat.
 * A sample spans from the reading the previous sample ended on to the
 * newest one recorded; with nothing recorded since, it yields undefined.
 */
export function createReportedCpuSampler(
  options: CpuSamplerOptions = {},
): IReportedCpuUsageSampler {
  const scaleDivisor = options.scaleDivisor ?? DEFAULT_CPU_SCALE_DIVISOR;
  const logger = options.logger ?? createLogger("CpuSampler:reported");
  // Only sample() advances the baseline; record() replaces the newest reading.
  let baseline: CpuReading | undefined;
  let latest: CpuReading | undefined;

  return {
    source: "reported",

    record(reading: CpuReading): void {
      if (
        !Number.isFinite(reading.cpuTimeNs) ||
        !Number.isFinite(reading.uptimeMs) ||
        !Number.isFinite(reading.processors)
      ) {
        logger.warn("Ignoring non-finite CPU reading", { ...reading });
        return;
      }
      if (baseline === undefined) {
        baseline = { ...reading };
      } else {
        latest = { ...reading };
      }
    },

    sample(): number | undefined {
      if (!baseline || !latest) return undefined;
      const usage = computeCpuUsage(baseline, latest, scaleDivisor);
      logComputation(logger, baseline, latest, usage);
      baseline = latest;
      latest = undefined;
      return usage;
    },
  };
}

/** Pick the sampler variant named by configuration. */
export function createCpuUsageSampler(
  config: CollectorConfig["cpu"],
  source: ProcessCpuSource = createNodeProcessCpuSource(),
): ICpuUsageSampler {
  const options: CpuSamplerOptions = { scaleDivisor: config.scaleDivisor };
  switch (config.source) {
    case "process":
      return createProcessCpuSampler(source, options);
    case "reported":
      return createReportedCpuSampler(options);
  }
}
