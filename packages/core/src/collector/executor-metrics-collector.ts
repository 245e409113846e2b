/**
 * ExecutorMetricsCollector — drives periodic collection for every
 * registered executor.
 *
 * Each tick obtains the executor's MetricContext, captures a snapshot,
 * folds it into the executor's peaks and pushes a CPU utilization sample
 * into its rolling window. Ticks for one executor are serialized through a
 * keyed lock, so snapshots are applied in the order they were requested
 * even when obtaining the context is asynchronous.
 */

import { ExecutorNotFoundError, MetricsEventType } from "@execmon/sdk";
import type {
  CollectionResult,
  EventBus,
  ExecutorMetricsReport,
  ICpuUsageSampler,
  ICpuUsageTracker,
  IPeakMetricsRegistry,
  MetricContext,
  MetricsEventTypeValue,
} from "@execmon/sdk";
import { createKeyedLock, createLogger, generateId } from "@execmon/shared";
import type { CollectorConfig, Logger } from "@execmon/shared";
import { createEventBus } from "../bus/index.js";
import { createCpuUsageTracker } from "../aggregation/cpu-usage-tracker.js";
import { createPeakMetricsRegistry } from "../aggregation/peak-registry.js";
import { createCpuUsageSampler } from "../instrumentation/cpu-sampler.js";
import { getMetricSourceRegistry } from "../metrics/registry.js";
import type { MetricSourceRegistry } from "../metrics/registry.js";
import { captureSnapshot } from "../metrics/snapshot.js";
import {
  CollectorStat,
  createCollectorStats,
  unavailableStat,
} from "../observability/metrics.js";
import type { CollectorStats, CollectorStatsSnapshot } from "../observability/metrics.js";

const STORE = "collector";

export type MetricContextProvider = () => MetricContext | Promise<MetricContext>;

export interface ExecutorSource {
  /** Called once per tick; may suspend on instrumentation reads. */
  context: MetricContextProvider;
  /** Defaults to a sampler built from the collector's cpu config. */
  cpu?: ICpuUsageSampler;
}

export interface ExecutorMetricsCollectorDeps {
  bus?: EventBus;
  sources?: MetricSourceRegistry;
  peaks?: IPeakMetricsRegistry;
  cpu?: ICpuUsageTracker;
  stats?: CollectorStats;
  logger?: Logger;
}

export interface ExecutorMetricsCollector {
  readonly id: string;
  readonly running: boolean;
  readonly bus: EventBus;

  /**
   * Start tracking an executor.
   * @returns the CPU sampler in use, so reported samplers can be fed
   */
  addExecutor(executorId: string, source: ExecutorSource): ICpuUsageSampler;

  /** Stop tracking an executor and drop its aggregates. */
  removeExecutor(executorId: string): boolean;

  executors(): string[];

  /** Run one collection tick for one executor. */
  collect(executorId: string): Promise<CollectionResult>;

  /** Run one tick for every executor. Failures are logged and reported as events. */
  collectAll(): Promise<CollectionResult[]>;

  start(): void;
  stop(): void;

  report(executorId: string): ExecutorMetricsReport;

  /** Reset one executor's peaks, or every executor's when no id is given. */
  resetPeaks(executorId?: string): void;

  stats(): CollectorStatsSnapshot;
}

interface TrackedExecutor {
  context: MetricContextProvider;
  sampler: ICpuUsageSampler;
  logger: Logger;
  warnedUnavailable: Set<string>;
}

export function createExecutorMetricsCollector(
  config: CollectorConfig,
  deps: ExecutorMetricsCollectorDeps = {},
): ExecutorMetricsCollector {
  const id = generateId("collector");
  const bus = deps.bus ?? createEventBus();
  const sources = deps.sources ?? getMetricSourceRegistry();
  const peaks = deps.peaks ?? createPeakMetricsRegistry(sources);
  const cpu = deps.cpu ?? createCpuUsageTracker();
  const stats = deps.stats ?? createCollectorStats();
  const logger = deps.logger ?? createLogger("ExecutorMetricsCollector", config.logLevel);
  logger.setContext({ collectorId: id });

  const tracked = new Map<string, TrackedExecutor>();
  const lock = createKeyedLock();
  let timer: ReturnType<typeof setInterval> | undefined;
  let ticking = false;

  function emit(type: MetricsEventTypeValue, payload?: unknown): void {
    bus.emit({ type, timestamp: Date.now(), payload });
  }

  function entryOf(executorId: string): TrackedExecutor {
    const entry = tracked.get(executorId);
    if (!entry) {
      throw new ExecutorNotFoundError(executorId, STORE);
    }
    return entry;
  }

  async function runTick(executorId: string): Promise<CollectionResult> {
    const entry = entryOf(executorId);
    const stop = entry.logger.time("collect");

    const ctx = await entry.context();
    // The executor may have been removed while the context was being read.
    if (tracked.get(executorId) !== entry) {
      throw new ExecutorNotFoundError(executorId, STORE);
    }

    const { values, unavailable } = captureSnapshot(sources, ctx);
    for (const name of unavailable) {
      stats.increment(unavailableStat(name));
      emit(MetricsEventType.METRIC_UNAVAILABLE, { executorId, metric: name });
      if (!entry.warnedUnavailable.has(name)) {
        entry.warnedUnavailable.add(name);
        entry.logger.warn("Metric source unavailable, reporting 0", { metric: name });
      }
    }

    const peaksUpdated = peaks.compareAndUpdate(executorId, values);
    if (peaksUpdated) {
      stats.increment(CollectorStat.PEAK_UPDATES);
      emit(MetricsEventType.PEAKS_UPDATED, { executorId, peaks: peaks.get(executorId) });
    }

    const cpuSample = entry.sampler.sample();
    if (cpuSample === undefined) {
      stats.increment(CollectorStat.CPU_SAMPLES_SKIPPED);
      entry.logger.debug("No CPU sample this tick");
    } else {
      cpu.update(executorId, cpuSample);
      stats.increment(CollectorStat.CPU_SAMPLES);
      emit(MetricsEventType.CPU_SAMPLED, {
        executorId,
        sample: cpuSample,
        average: cpu.average(executorId),
      });
    }

    stats.increment(CollectorStat.TICKS);
    stop();

    const result: CollectionResult = { executorId, snapshot: values, unavailable, peaksUpdated };
    if (cpuSample !== undefined) result.cpuSample = cpuSample;
    return result;
  }

  const collector: ExecutorMetricsCollector = {
    id,
    bus,

    get running(): boolean {
      return timer !== undefined;
    },

    addExecutor(executorId: string, source: ExecutorSource): ICpuUsageSampler {
      const existing = tracked.get(executorId);
      if (existing) {
        logger.warn("Executor already tracked, keeping existing source", { executorId });
        return existing.sampler;
      }

      const executorLogger = logger.child("executor");
      executorLogger.setContext({ executorId });
      const sampler = source.cpu ?? createCpuUsageSampler(config.cpu);

      tracked.set(executorId, {
        context: source.context,
        sampler,
        logger: executorLogger,
        warnedUnavailable: new Set(),
      });
      peaks.register(executorId);
      cpu.init(executorId);
      stats.gauge(CollectorStat.EXECUTORS, tracked.size);

      logger.info("Executor registered", { executorId, cpuSource: sampler.source });
      emit(MetricsEventType.EXECUTOR_REGISTERED, { executorId });
      return sampler;
    },

    removeExecutor(executorId: string): boolean {
      if (!tracked.delete(executorId)) {
        logger.debug("Cannot remove executor", { executorId, reason: "not tracked" });
        return false;
      }
      peaks.deregister(executorId);
      cpu.clear(executorId);
      stats.gauge(CollectorStat.EXECUTORS, tracked.size);

      logger.info("Executor deregistered", { executorId });
      emit(MetricsEventType.EXECUTOR_DEREGISTERED, { executorId });
      return true;
    },

    executors(): string[] {
      return Array.from(tracked.keys());
    },

    collect(executorId: string): Promise<CollectionResult> {
      return lock.run(executorId, () => runTick(executorId));
    },

    async collectAll(): Promise<CollectionResult[]> {
      const ids = collector.executors();
      const settled = await Promise.allSettled(ids.map((executorId) => collector.collect(executorId)));

      const results: CollectionResult[] = [];
      settled.forEach((outcome, i) => {
        if (outcome.status === "fulfilled") {
          results.push(outcome.value);
          return;
        }
        const error = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        stats.increment(CollectorStat.TICK_ERRORS);
        logger.error("Collection failed", { executorId: ids[i], error });
        emit(MetricsEventType.COLLECTOR_TICK_ERROR, { executorId: ids[i], error });
      });
      return results;
    },

    start(): void {
      if (timer) {
        logger.debug("Collector already running");
        return;
      }
      timer = setInterval(() => {
        if (ticking) {
          logger.debug("Previous tick still running, skipping");
          return;
        }
        ticking = true;
        void collector.collectAll().finally(() => {
          ticking = false;
        });
      }, config.intervalMs);
      timer.unref();

      logger.info("Collector started", { intervalMs: config.intervalMs });
      emit(MetricsEventType.COLLECTOR_STARTED, { collectorId: id, intervalMs: config.intervalMs });
    },

    stop(): void {
      if (!timer) return;
      clearInterval(timer);
      timer = undefined;

      logger.info("Collector stopped");
      emit(MetricsEventType.COLLECTOR_STOPPED, { collectorId: id });
    },

    report(executorId: string): ExecutorMetricsReport {
      entryOf(executorId);
      return {
        executorId,
        peaks: peaks.getNamed(executorId),
        cpu: {
          samples: cpu.get(executorId),
          average: cpu.average(executorId),
        },
        timestamp: Date.now(),
      };
    },

    resetPeaks(executorId?: string): void {
      if (executorId === undefined) {
        peaks.resetAll();
      } else {
        entryOf(executorId);
        peaks.reset(executorId);
      }
      logger.info("Peaks reset", { executorId: executorId ?? "*" });
      emit(MetricsEventType.PEAKS_RESET, { executorId: executorId ?? null });
    },

    stats(): CollectorStatsSnapshot {
      return stats.getSnapshot();
    },
  };

  return collector;
}
