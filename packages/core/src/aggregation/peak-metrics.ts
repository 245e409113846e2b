/**
 * Peak executor metrics.
 *
 * A PeakState records, per metric index, the highest value seen since the
 * last reset. Slot 0 holds -1 until the first snapshot is recorded; every
 * real reading is >= 0, so the first compareAndUpdate always replaces it.
 */

import { PEAK_NOT_RECORDED } from "@execmon/sdk";
import type { PeakState, Snapshot } from "@execmon/sdk";
import { assertSnapshot } from "../metrics/snapshot.js";

export function newPeakState(size: number): PeakState {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Peak state size must be a positive integer, got ${size}`);
  }
  const state = new Array<number>(size).fill(0);
  state[0] = PEAK_NOT_RECORDED;
  return state;
}

/**
 * Compare a snapshot with the saved peaks and keep the larger value per slot.
 *
 * @returns true if any slot reached a new peak
 */
export function compareAndUpdate(state: PeakState, snapshot: Snapshot): boolean {
  assertSnapshot(snapshot, state.length);

  let updated = false;
  for (let i = 0; i < state.length; i++) {
    if (snapshot[i] > state[i]) {
      state[i] = snapshot[i];
      updated = true;
    }
  }
  return updated;
}

/** Clears the saved peaks back to the "never recorded" state. */
export function resetPeakState(state: PeakState): void {
  state.fill(0);
  state[0] = PEAK_NOT_RECORDED;
}

export function hasRecordedPeaks(state: PeakState): boolean {
  return state[0] !== PEAK_NOT_RECORDED;
}
