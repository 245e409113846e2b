/**
 * MetricSourceRegistry — the fixed, ordered catalog of metric sources.
 */

import { MetricUnavailableError } from "@execmon/sdk";
import type { MetricContext, MetricKind, MetricKindName } from "@execmon/sdk";
import { METRIC_TABLE } from "./catalog.js";
import type { MetricExtractor, MetricTableEntry } from "./catalog.js";

export interface MetricSourceRegistry {
  readonly size: number;
  /** Kinds in index order. Never empty. */
  listKinds(): readonly MetricKind[];
  names(): MetricKindName[];
  kindByName(name: string): MetricKind | undefined;
  /**
   * Read one kind from the context.
   * @throws MetricUnavailableError if the context lacks the kind's capability
   */
  read(kind: MetricKind, ctx: MetricContext): number;
}

export function createMetricSourceRegistry(
  table: readonly MetricTableEntry[] = METRIC_TABLE,
): MetricSourceRegistry {
  if (table.length === 0) {
    throw new RangeError("Metric table must contain at least one entry");
  }

  const kinds: readonly MetricKind[] = Object.freeze(
    table.map((entry, index) =>
      Object.freeze({ name: entry.name, index, capability: entry.capability }),
    ),
  );
  const byName = new Map<string, MetricKind>();
  const extractors: MetricExtractor[] = [];

  for (const kind of kinds) {
    if (byName.has(kind.name)) {
      throw new RangeError(`Duplicate metric kind "${kind.name}"`);
    }
    byName.set(kind.name, kind);
    extractors.push(table[kind.index].extract);
  }

  return {
    size: kinds.length,

    listKinds(): readonly MetricKind[] {
      return kinds;
    },

    names(): MetricKindName[] {
      return kinds.map((k) => k.name);
    },

    kindByName(name: string): MetricKind | undefined {
      return byName.get(name);
    },

    read(kind: MetricKind, ctx: MetricContext): number {
      const extract = extractors[kind.index];
      if (!extract || kinds[kind.index].name !== kind.name) {
        throw new RangeError(`Metric kind "${kind.name}" is not registered`);
      }
      const value = extract(ctx);
      if (value === undefined) {
        throw new MetricUnavailableError(kind.name, kind.capability);
      }
      return value;
    },
  };
}

let defaultRegistry: MetricSourceRegistry | undefined;

/** Process-wide registry over the built-in table. */
export function getMetricSourceRegistry(): MetricSourceRegistry {
  defaultRegistry ??= createMetricSourceRegistry();
  return defaultRegistry;
}
