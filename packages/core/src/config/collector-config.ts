/**
 * Collector configuration loading.
 *
 * Environment overrides are merged over the supplied object before the
 * schema applies defaults and validates.
 */

import { ConfigError, ErrorCode } from "@execmon/sdk";
import { CollectorConfigSchema, validateInput } from "@execmon/shared";
import type { CollectorConfig } from "@execmon/shared";

export const CONFIG_ENV = {
  INTERVAL_MS: "EXECMON_INTERVAL_MS",
  CPU_SOURCE: "EXECMON_CPU_SOURCE",
  CPU_SCALE_DIVISOR: "EXECMON_CPU_SCALE_DIVISOR",
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function applyEnv(input: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...input };

  const interval = env[CONFIG_ENV.INTERVAL_MS];
  if (interval !== undefined && interval !== "") {
    merged.intervalMs = Number(interval);
  }

  const source = env[CONFIG_ENV.CPU_SOURCE];
  const divisor = env[CONFIG_ENV.CPU_SCALE_DIVISOR];
  const hasCpuOverride = Boolean(source) || Boolean(divisor);
  const baseCpu: unknown = merged.cpu ?? {};
  if (hasCpuOverride && isRecord(baseCpu)) {
    const cpu: Record<string, unknown> = { ...baseCpu };
    if (source) cpu.source = source;
    if (divisor) cpu.scaleDivisor = Number(divisor);
    merged.cpu = cpu;
  }

  return merged;
}

/**
 * @throws ConfigError with code CONFIG_VALIDATION_ERROR when validation fails
 */
export function loadCollectorConfig(
  input: unknown = {},
  env: NodeJS.ProcessEnv = process.env,
): CollectorConfig {
  if (!isRecord(input)) {
    throw new ConfigError("Collector config must be an object", {
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
    });
  }

  const result = validateInput(CollectorConfigSchema, applyEnv(input, env));
  if (!result.success || !result.data) {
    throw new ConfigError(`Invalid collector config: ${result.error ?? "unknown error"}`, {
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
    });
  }
  return result.data;
}
