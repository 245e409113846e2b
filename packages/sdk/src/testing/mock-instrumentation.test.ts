/**
 * MockInstrumentation unit tests.
 */

import { describe, it, expect } from "vitest";
import { MockInstrumentation, createMockInstrumentation } from "./mock-instrumentation.js";

describe("MockInstrumentation", () => {
  it("exposes every capability by default", () => {
    const ctx = new MockInstrumentation().createContext();

    expect(ctx.heap).toBeDefined();
    expect(ctx.memoryManager).toBeDefined();
    expect(ctx.bufferPools).toBeDefined();
    expect(ctx.processCpu).toBeDefined();
  });

  it("omits requested capabilities", () => {
    const ctx = createMockInstrumentation({ omit: ["bufferPools", "processCpu"] }).createContext();

    expect(ctx.heap).toBeDefined();
    expect(ctx.bufferPools).toBeUndefined();
    expect(ctx.processCpu).toBeUndefined();
  });

  it("heap capability reads live values", () => {
    const instr = createMockInstrumentation();
    const ctx = instr.createContext();

    instr.setHeap(2048, 512);

    expect(ctx.heap?.heapUsed()).toBe(2048);
    expect(ctx.heap?.nonHeapUsed()).toBe(512);
  });

  it("memory manager counters merge partial updates", () => {
    const instr = createMockInstrumentation();
    instr.setCounters({ onHeapExecutionMemoryUsed: 10 });
    instr.setCounters({ offHeapStorageMemoryUsed: 30 });

    expect(instr.createContext().memoryManager).toEqual({
      onHeapExecutionMemoryUsed: 10,
      offHeapExecutionMemoryUsed: 0,
      onHeapStorageMemoryUsed: 0,
      offHeapStorageMemoryUsed: 30,
    });
  });

  it("buffer pools return undefined for unset pools", () => {
    const instr = createMockInstrumentation().setPool("direct", 64);
    const ctx = instr.createContext();

    expect(ctx.bufferPools?.memoryUsed("direct")).toBe(64);
    expect(ctx.bufferPools?.memoryUsed("mapped")).toBeUndefined();

    instr.setPool("direct", undefined);
    expect(ctx.bufferPools?.memoryUsed("direct")).toBeUndefined();
  });

  it("advanceCpu() accumulates cpu time and uptime", () => {
    const instr = createMockInstrumentation({ processors: 2 });
    instr.advanceCpu(1_000_000, 10).advanceCpu(3_000_000, 20);
    const cpu = instr.createContext().processCpu;

    expect(cpu?.processCpuTimeNs()).toBe(4_000_000);
    expect(cpu?.uptimeMs()).toBe(30);
    expect(cpu?.availableProcessors()).toBe(2);
  });
});
