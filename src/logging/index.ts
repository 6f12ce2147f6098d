export { createLogger } from "./logger.js";
export type { JsonValue, LogLevel, Logger, LoggerConfig } from "./logger.js";
