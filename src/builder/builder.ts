import { defaultConfigurator } from "./configurator.js";
import type { Configurable, ConfigureSelf } from "./types.js";

/**
 * Configures a value in place and returns it.
 *
 * ```ts
 * const server = withSelf(new Server(), (self) => {
 * 	self.port = 8080;
 * });
 * ```
 */
export function withSelf<T extends object>(value: T, configure: ConfigureSelf<T>): T {
	return defaultConfigurator.withSelf(value, configure);
}

/**
 * Base class for reference types configured in place through `with`.
 */
export abstract class Builder implements Configurable {
	public with(configure: ConfigureSelf<this>): this {
		return withSelf(this, configure);
	}
}
