export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { CodecConfigSchema, DEFAULT_MAX_DEPTH } from "./utils/config-schema.js";
export type { CodecConfig } from "./utils/config-schema.js";
