import type { BuilderConfig } from "./schema.js";

export const defaultConfig: BuilderConfig = {
	copy: {
		freeze: false,
		mode: "deep",
	},
	logging: {
		level: "info",
		stdout: false,
	},
};
