export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { generateId } from "./utils/uuid.js";
export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { CollectorConfigSchema, CpuConfigSchema } from "./utils/config-schema.js";
export type { CollectorConfig, CollectorConfigInput } from "./utils/config-schema.js";

export { createKeyedLock } from "./utils/keyed-lock.js";
export type { KeyedLock } from "./utils/keyed-lock.js";
