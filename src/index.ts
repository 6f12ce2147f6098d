export * from "./builder/index.js";
export {
	builderConfigSchema,
	ConfigNotFoundError,
	ConfigValidationError,
	defaultConfig,
	loadBuilderConfig,
	resolveBuilderConfig,
} from "./config/index.js";
export type { BuilderConfig } from "./config/index.js";
export { createLogger } from "./logging/index.js";
export type { JsonValue, LogLevel, Logger, LoggerConfig } from "./logging/index.js";
