export { defaultConfig } from "./defaults.js";
export {
	ConfigNotFoundError,
	ConfigValidationError,
	loadBuilderConfig,
	resolveBuilderConfig,
} from "./loader.js";
export { builderConfigSchema } from "./schema.js";
export type { BuilderConfig } from "./schema.js";
