import { defaultConfig, type BuilderConfig } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import { copyValue, typeNameOf } from "./copy.js";
import type { ConfigureDraft, ConfigureSelf } from "./types.js";

/**
 * Copy policy applied by `withCopy`.
 */
export type CopyPolicy = BuilderConfig["copy"];

export interface ConfiguratorOptions {
	copy?: Partial<CopyPolicy>;
	logger?: Logger;
}

type Semantics = "reference" | "value";

/**
 * Both configuration variants bound to one copy policy and logger.
 */
export interface Configurator {
	/**
	 * Runs `configure` on a copy of the value and returns the copy. The value is left untouched.
	 */
	withCopy<T extends object>(value: T, configure: ConfigureDraft<T>): T;
	/**
	 * Runs `configure` on the value itself and returns the same instance.
	 */
	withSelf<T extends object>(value: T, configure: ConfigureSelf<T>): T;
}

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Creates a configurator. Failures thrown by a configuration step reach the caller unchanged.
 */
export function createConfigurator(options: ConfiguratorOptions = {}): Configurator {
	const policy: CopyPolicy = { ...defaultConfig.copy, ...options.copy };
	const logger = options.logger;

	const run = <T extends object>(semantics: Semantics, value: T, apply: () => T): T => {
		const fields = { semantics, type: typeNameOf(value) };
		logger?.debug("configure_start", fields);
		let result: T;
		try {
			result = apply();
		} catch (error: unknown) {
			logger?.warn("configure_failed", { ...fields, error: describeError(error) });
			throw error;
		}
		logger?.debug("configure_done", fields);
		return result;
	};

	return {
		withCopy<T extends object>(value: T, configure: ConfigureDraft<T>): T {
			return run("value", value, () => {
				const draft = copyValue(value, policy.mode);
				configure(draft);
				if (policy.freeze) {
					Object.freeze(draft);
				}
				return draft;
			});
		},
		withSelf<T extends object>(value: T, configure: ConfigureSelf<T>): T {
			return run("reference", value, () => {
				configure(value);
				return value;
			});
		},
	};
}

/**
 * Configurator with the default policy and no logger.
 */
export const defaultConfigurator: Configurator = createConfigurator();
