import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { isReportedCpuUsageSampler } from "@execmon/sdk";
import type { ProcessCpuSource } from "@execmon/sdk";
import {
  computeCpuUsage,
  createCpuUsageSampler,
  createProcessCpuSampler,
  createReportedCpuSampler,
} from "./cpu-sampler.js";

function createFakeCpuSource(processors = 4): ProcessCpuSource & {
  advance(cpuNs: number, wallMs: number): void;
} {
  let cpuNs = 0;
  let uptime = 0;
  return {
    processCpuTimeNs: () => cpuNs,
    uptimeMs: () => uptime,
    availableProcessors: () => processors,
    advance(deltaCpuNs: number, deltaMs: number): void {
      cpuNs += deltaCpuNs;
      uptime += deltaMs;
    },
  };
}

describe("computeCpuUsage", () => {
  it("divides elapsed cpu time by elapsed wall time across processors", () => {
    const usage = computeCpuUsage(
      { cpuTimeNs: 1_000_000_000, uptimeMs: 1000, processors: 2 },
      { cpuTimeNs: 2_000_000_000, uptimeMs: 2000, processors: 2 },
    );
    expect(usage).toBe(50);
  });

  it("applies a custom scale divisor", () => {
    const usage = computeCpuUsage(
      { cpuTimeNs: 0, uptimeMs: 0, processors: 1 },
      { cpuTimeNs: 500, uptimeMs: 10, processors: 1 },
      1,
    );
    expect(usage).toBe(50);
  });

  it("returns undefined when no wall time elapsed", () => {
    const reading = { cpuTimeNs: 10, uptimeMs: 100, processors: 4 };
    expect(computeCpuUsage(reading, reading)).toBeUndefined();
    expect(computeCpuUsage(reading, { ...reading, uptimeMs: 50 })).toBeUndefined();
  });
});

describe("createProcessCpuSampler", () => {
  it("first sample averages from process start", () => {
    const source = createFakeCpuSource(4);
    source.advance(4_000_000_000, 2000);
    const sampler = createProcessCpuSampler(source);

    expect(sampler.source).toBe("process");
    expect(sampler.sample()).toBe(50);
  });

  it("later samples cover only the interval since the previous one", () => {
    const source = createFakeCpuSource(4);
    const sampler = createProcessCpuSampler(source);
    source.advance(4_000_000_000, 2000);
    sampler.sample();

    source.advance(1_000_000_000, 1000);
    expect(sampler.sample()).toBe(25);
  });

  it("keeps the baseline when no time has elapsed", () => {
    const source = createFakeCpuSource(4);
    const sampler = createProcessCpuSampler(source);
    source.advance(4_000_000_000, 2000);
    sampler.sample();

    expect(sampler.sample()).toBeUndefined();

    source.advance(2_000_000_000, 1000);
    expect(sampler.sample()).toBe(50);
  });

  it("honours the configured divisor", () => {
    const source = createFakeCpuSource(4);
    source.advance(1_000_000_000, 1000);
    const sampler = createProcessCpuSampler(source, { scaleDivisor: 1_000_000 });

    expect(sampler.sample()).toBe(0.25);
  });
});

describe("createReportedCpuSampler", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("needs two readings before producing a sample", () => {
    const sampler = createReportedCpuSampler();
    expect(sampler.sample()).toBeUndefined();

    sampler.record({ cpuTimeNs: 0, uptimeMs: 0, processors: 2 });
    expect(sampler.sample()).toBeUndefined();

    sampler.record({ cpuTimeNs: 1_000_000_000, uptimeMs: 1000, processors: 2 });
    expect(sampler.sample()).toBe(50);
  });

  it("consumes each reading once", () => {
    const sampler = createReportedCpuSampler();
    sampler.record({ cpuTimeNs: 0, uptimeMs: 0, processors: 1 });
    sampler.record({ cpuTimeNs: 500_000_000, uptimeMs: 1000, processors: 1 });
    expect(sampler.sample()).toBe(50);
    expect(sampler.sample()).toBeUndefined();

    sampler.record({ cpuTimeNs: 600_000_000, uptimeMs: 2000, processors: 1 });
    expect(sampler.sample()).toBe(10);
  });

  it("spans every reading recorded since the previous sample", () => {
    const sampler = createReportedCpuSampler();
    sampler.record({ cpuTimeNs: 0, uptimeMs: 0, processors: 1 });
    sampler.record({ cpuTimeNs: 1_000_000_000, uptimeMs: 1000, processors: 1 });
    expect(sampler.sample()).toBe(100);

    // Busy for one second, then idle for one.
    sampler.record({ cpuTimeNs: 2_000_000_000, uptimeMs: 2000, processors: 1 });
    sampler.record({ cpuTimeNs: 2_000_000_000, uptimeMs: 3000, processors: 1 });
    expect(sampler.sample()).toBe(50);
  });

  it("ignores non-finite readings with a warning", () => {
    const sampler = createReportedCpuSampler();
    sampler.record({ cpuTimeNs: 0, uptimeMs: 0, processors: 1 });
    sampler.record({ cpuTimeNs: Number.NaN, uptimeMs: 1000, processors: 1 });

    expect(sampler.sample()).toBeUndefined();
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining("Ignoring non-finite CPU reading"),
    );
  });
});

describe("createCpuUsageSampler", () => {
  it("builds a process sampler for source=process", () => {
    const source = createFakeCpuSource(1);
    source.advance(100_000_000, 100);
    const sampler = createCpuUsageSampler({ source: "process", scaleDivisor: 10_000 }, source);

    expect(sampler.source).toBe("process");
    expect(isReportedCpuUsageSampler(sampler)).toBe(false);
    expect(sampler.sample()).toBe(100);
  });

  it("builds a reported sampler for source=reported", () => {
    const sampler = createCpuUsageSampler({ source: "reported", scaleDivisor: 10_000 });
    expect(isReportedCpuUsageSampler(sampler)).toBe(true);
  });
});
