import { describe, it, expect } from "vitest";
import { createCollectorStats, CollectorStat, unavailableStat } from "./metrics.js";

describe("CollectorStats", () => {
  it("increment() from zero defaults to 1", () => {
    const stats = createCollectorStats();
    stats.increment(CollectorStat.TICKS);
    expect(stats.getSnapshot().counters[CollectorStat.TICKS]).toBe(1);
  });

  it("increment() accumulates multiple calls", () => {
    const stats = createCollectorStats();
    stats.increment(CollectorStat.CPU_SAMPLES, 3);
    stats.increment(CollectorStat.CPU_SAMPLES, 7);
    stats.increment(CollectorStat.CPU_SAMPLES);
    expect(stats.getSnapshot().counters[CollectorStat.CPU_SAMPLES]).toBe(11);
  });

  it("gauge() overwrites previous value", () => {
    const stats = createCollectorStats();
    stats.gauge(CollectorStat.EXECUTORS, 4);
    stats.gauge(CollectorStat.EXECUTORS, 2);
    expect(stats.getSnapshot().gauges[CollectorStat.EXECUTORS]).toBe(2);
  });

  it("unavailableStat() names a per-metric counter", () => {
    const stats = createCollectorStats();
    stats.increment(unavailableStat("MappedPoolMemory"));
    expect(stats.getSnapshot().counters).toEqual({
      "source.unavailable.MappedPoolMemory": 1,
    });
  });

  it("reset() clears everything", () => {
    const stats = createCollectorStats();
    stats.increment(CollectorStat.TICKS, 5);
    stats.gauge(CollectorStat.EXECUTORS, 1);

    stats.reset();

    const snapshot = stats.getSnapshot();
    expect(snapshot.counters).toEqual({});
    expect(snapshot.gauges).toEqual({});
  });

  it("snapshot timestamp is recent", () => {
    const stats = createCollectorStats();
    const before = Date.now();
    const snapshot = stats.getSnapshot();
    const after = Date.now();

    expect(snapshot.timestamp).toBeGreaterThanOrEqual(before);
    expect(snapshot.timestamp).toBeLessThanOrEqual(after);
  });
});
