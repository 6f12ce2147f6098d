import { readFileSync } from "node:fs";
import { Value } from "@sinclair/typebox/value";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { defaultConfig } from "./defaults.js";
import type { BuilderConfig } from "./schema.js";
import { builderConfigSchema } from "./schema.js";

/**
 * Error raised when the configuration file does not exist.
 */
export class ConfigNotFoundError extends Error {
	public readonly path: string;

	public constructor(path: string) {
		super(`Configuration file was not found at: ${path}`);
		this.name = "ConfigNotFoundError";
		this.path = path;
	}
}

/**
 * Error raised when configuration content cannot be parsed or validated.
 */
export class ConfigValidationError extends Error {
	public constructor(message: string) {
		super(message);
		this.name = "ConfigValidationError";
	}
}

type JsonObject = { [key: string]: unknown };

function isJsonObject(value: unknown): value is JsonObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Applies defaults to a parsed configuration object and validates it.
 */
export function resolveBuilderConfig(input: unknown): BuilderConfig {
	const root: unknown = input ?? {};
	if (!isJsonObject(root)) {
		throw new ConfigValidationError("Invalid configuration: root value must be an object.");
	}

	const merged: JsonObject = {
		...root,
		copy: {
			...defaultConfig.copy,
			...(isJsonObject(root.copy) ? root.copy : {}),
		},
		logging: {
			...defaultConfig.logging,
			...(isJsonObject(root.logging) ? root.logging : {}),
		},
	};

	const cleaned = Value.Clean(builderConfigSchema, merged);
	const withDefaults = Value.Default(builderConfigSchema, cleaned);

	if (!Value.Check(builderConfigSchema, withDefaults)) {
		const errors = [...Value.Errors(builderConfigSchema, withDefaults)];
		const formatted = errors
			.map((entry) => {
				const pathWithoutSlash = entry.path.startsWith("/") ? entry.path.slice(1) : entry.path;
				return `  - ${pathWithoutSlash.replaceAll("/", ".")}: ${entry.message}`;
			})
			.join("\n");
		throw new ConfigValidationError(`Invalid configuration:\n${formatted}`);
	}

	return withDefaults;
}

/**
 * Loads and validates a builder config from YAML. An empty file yields the defaults.
 */
export function loadBuilderConfig(path: string): BuilderConfig {
	let rawConfig = "";
	try {
		rawConfig = readFileSync(path, "utf8");
	} catch (error: unknown) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			throw new ConfigNotFoundError(path);
		}
		throw error;
	}

	let parsedConfig: unknown;
	try {
		parsedConfig = parseYaml(rawConfig);
	} catch (error: unknown) {
		if (error instanceof YAMLParseError) {
			throw new ConfigValidationError(`Invalid YAML: ${error.message}`);
		}
		throw error;
	}

	return resolveBuilderConfig(parsedConfig);
}
