/**
 * Zod schema for collector configuration.
 *
 * Defaults are applied at parse time, so a parsed config is always complete.
 */

import { z } from "zod";

export const CpuConfigSchema = z
  .object({
    source: z.enum(["process", "reported"]).default("process"),
    /**
     * Divisor applied to elapsed CPU ns over elapsed wall ms × processors.
     * 10 000 converts ns/ms to a percentage.
     */
    scaleDivisor: z.number().positive("scaleDivisor must be positive").default(10_000),
  })
  .default({});

export const CollectorConfigSchema = z.object({
  intervalMs: z.number().int().positive("intervalMs must be a positive integer").default(10_000),
  cpu: CpuConfigSchema,
  logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
});

export type CollectorConfig = z.infer<typeof CollectorConfigSchema>;
export type CollectorConfigInput = z.input<typeof CollectorConfigSchema>;
