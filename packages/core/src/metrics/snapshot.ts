/**
 * Snapshot capture — one reading per registered kind, from one context.
 */

import {
  MetricUnavailableError,
  SnapshotMismatchError,
  SnapshotValueError,
} from "@execmon/sdk";
import type { MetricContext, MetricKindName, Snapshot } from "@execmon/sdk";
import type { MetricSourceRegistry } from "./registry.js";

export interface CapturedSnapshot {
  values: number[];
  /** Kinds whose capability was missing; their slots hold 0. */
  unavailable: MetricKindName[];
}

/**
 * Read every registered kind. An unavailable source is recorded as 0 and
 * does not stop the others; any other failure propagates.
 */
export function captureSnapshot(
  registry: MetricSourceRegistry,
  ctx: MetricContext,
): CapturedSnapshot {
  const values: number[] = [];
  const unavailable: MetricKindName[] = [];

  for (const kind of registry.listKinds()) {
    try {
      values.push(registry.read(kind, ctx));
    } catch (err) {
      if (!(err instanceof MetricUnavailableError)) throw err;
      values.push(0);
      unavailable.push(kind.name);
    }
  }

  return { values, unavailable };
}

/**
 * @throws SnapshotMismatchError when the length differs from the registry size
 * @throws SnapshotValueError when a slot is not a non-negative safe integer
 */
export function assertSnapshot(snapshot: Snapshot, size: number): void {
  if (snapshot.length !== size) {
    throw new SnapshotMismatchError(size, snapshot.length);
  }
  snapshot.forEach((value, index) => {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new SnapshotValueError(index, value);
    }
  });
}
