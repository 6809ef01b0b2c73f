export * from "./core/progress/index.js";
export type { Config } from "./config/schema.js";
export { configSchema, loadConfig, parallelOptionsFromConfig, progressOptionsFromConfig } from "./config/schema.js";
export type { Logger, LoggingOptions } from "./core/logging/logger.js";
export { configureLogging, createLogger, outputLogHooks } from "./core/logging/logger.js";
