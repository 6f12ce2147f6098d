import { defaultConfigurator } from "./configurator.js";
import { valueType } from "./copy.js";
import type { ConfigureDraft, ValueConfigurable } from "./types.js";

/**
 * Configures a copy of a value and returns the copy.
 */
export function withCopy<T extends object>(value: T, configure: ConfigureDraft<T>): T {
	return defaultConfigurator.withCopy(value, configure);
}

/**
 * Base class for value types. Fields are declared `readonly`; `with` hands out
 * a writable copy and returns it as a new instance.
 */
export abstract class ValueBuilder implements ValueConfigurable {
	public with(configure: ConfigureDraft<this>): this {
		return withCopy(this, configure);
	}
}

Object.defineProperty(ValueBuilder.prototype, valueType, { value: true });
