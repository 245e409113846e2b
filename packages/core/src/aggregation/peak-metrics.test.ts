import { describe, it, expect } from "vitest";
import { SnapshotMismatchError } from "@execmon/sdk";
import {
  compareAndUpdate,
  hasRecordedPeaks,
  newPeakState,
  resetPeakState,
} from "./peak-metrics.js";

describe("PeakState", () => {
  it("starts with the sentinel in slot 0 and zeros elsewhere", () => {
    expect(newPeakState(4)).toEqual([-1, 0, 0, 0]);
    expect(hasRecordedPeaks(newPeakState(4))).toBe(false);
  });

  it("rejects non-positive sizes", () => {
    expect(() => newPeakState(0)).toThrow(RangeError);
    expect(() => newPeakState(2.5)).toThrow(RangeError);
  });

  it("first compareAndUpdate always reports an update, even for an all-zero snapshot", () => {
    const state = newPeakState(3);
    expect(compareAndUpdate(state, [0, 0, 0])).toBe(true);
    expect(state).toEqual([0, 0, 0]);
    expect(hasRecordedPeaks(state)).toBe(true);
  });

  it("returns false when nothing exceeds the saved peaks", () => {
    const state = newPeakState(3);
    compareAndUpdate(state, [10, 20, 30]);
    expect(compareAndUpdate(state, [10, 5, 30])).toBe(false);
    expect(state).toEqual([10, 20, 30]);
  });

  it("updates slots independently", () => {
    const state = newPeakState(3);
    compareAndUpdate(state, [10, 20, 30]);

    expect(compareAndUpdate(state, [5, 25, 1])).toBe(true);
    expect(state).toEqual([10, 25, 30]);
  });

  it("each slot equals the running maximum of everything seen", () => {
    const snapshots = [
      [3, 9, 0, 4],
      [7, 2, 0, 4],
      [1, 11, 6, 2],
      [7, 0, 5, 8],
      [2, 3, 1, 1],
    ];
    const state = newPeakState(4);
    const max = [0, 0, 0, 0];

    for (const snapshot of snapshots) {
      const before = [...state];
      compareAndUpdate(state, snapshot);
      snapshot.forEach((v, i) => {
        max[i] = Math.max(max[i], v);
      });

      expect(state).toEqual(max);
      state.forEach((v, i) => expect(v).toBeGreaterThanOrEqual(before[i]));
    }
    expect(state).toEqual([7, 11, 6, 8]);
  });

  it("fails fast on a snapshot of the wrong length", () => {
    const state = newPeakState(3);
    expect(() => compareAndUpdate(state, [1, 2])).toThrow(SnapshotMismatchError);
    expect(state).toEqual([-1, 0, 0]);
  });

  it("reset restores the fresh state and is idempotent", () => {
    const state = newPeakState(3);
    compareAndUpdate(state, [4, 5, 6]);

    resetPeakState(state);
    expect(state).toEqual(newPeakState(3));

    resetPeakState(state);
    expect(state).toEqual(newPeakState(3));
    expect(compareAndUpdate(state, [0, 0, 0])).toBe(true);
  });
});
