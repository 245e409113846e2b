export { createCollectorStats, CollectorStat, unavailableStat } from "./metrics.js";
export type { CollectorStats, CollectorStatsSnapshot } from "./metrics.js";
