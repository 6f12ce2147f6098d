import { Type, type Static } from "@sinclair/typebox";

/**
 * Copy policy for value-semantics configuration.
 */
export const copyConfigSchema = Type.Object({
	freeze: Type.Boolean({ default: false }),
	mode: Type.Union([Type.Literal("deep"), Type.Literal("shallow")], { default: "deep" }),
});

/**
 * Logging configuration.
 */
export const loggingConfigSchema = Type.Object({
	file: Type.Optional(Type.String()),
	level: Type.Union(
		[Type.Literal("error"), Type.Literal("warn"), Type.Literal("info"), Type.Literal("debug")],
		{ default: "info" },
	),
	stdout: Type.Boolean({ default: false }),
});

/**
 * Root builder configuration schema.
 */
export const builderConfigSchema = Type.Object({
	copy: copyConfigSchema,
	logging: loggingConfigSchema,
});

/**
 * Fully validated builder configuration.
 */
export type BuilderConfig = Static<typeof builderConfigSchema>;
