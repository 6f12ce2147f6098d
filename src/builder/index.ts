export { Builder, withSelf } from "./builder.js";
export { conformBuilder, conformValueBuilder } from "./conform.js";
export { createConfigurator, defaultConfigurator } from "./configurator.js";
export type { Configurator, ConfiguratorOptions, CopyPolicy } from "./configurator.js";
export { copy, copyValue, typeNameOf, valueType } from "./copy.js";
export type { Copyable, CopyMode } from "./copy.js";
export { CopyError } from "./errors.js";
export type {
	Configurable,
	ConfigureDraft,
	ConfigureSelf,
	Mutable,
	ValueConfigurable,
} from "./types.js";
export { ValueBuilder, withCopy } from "./value-builder.js";
