import { appendFileSync, mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import type { BuilderConfig } from "../config/index.js";

/**
 * Supported log levels in ascending verbosity order.
 */
export type LogLevel = "debug" | "error" | "info" | "warn";

/**
 * JSON value type for structured log fields.
 */
export type JsonValue =
	| Array<JsonValue>
	| boolean
	| null
	| number
	| string
	| { [key: string]: JsonValue };

/**
 * Structured logger methods.
 */
export interface Logger {
	debug(event: string, fields?: Record<string, JsonValue>): void;
	error(event: string, fields?: Record<string, JsonValue>): void;
	info(event: string, fields?: Record<string, JsonValue>): void;
	warn(event: string, fields?: Record<string, JsonValue>): void;
}

/**
 * Runtime logger configuration.
 */
export type LoggerConfig = BuilderConfig["logging"];

interface LoggerDependencies {
	now: () => Date;
	writeStdout: (line: string) => void;
}

const logLevelPriority: Record<LogLevel, number> = {
	debug: 10,
	error: 40,
	info: 20,
	warn: 30,
};

function expandHomePath(path: string): string {
	if (path === "~") {
		return homedir();
	}
	if (path.startsWith("~/")) {
		return join(homedir(), path.slice(2));
	}
	return path;
}

/**
 * Creates a structured JSON-lines logger with level filtering.
 */
export function createLogger(
	moduleName: string,
	config: LoggerConfig,
	dependencies?: Partial<LoggerDependencies>,
): Logger {
	const filePath = config.file === undefined ? undefined : expandHomePath(config.file);
	if (filePath !== undefined) {
		mkdirSync(dirname(filePath), { recursive: true });
	}

	const selectedLevel = config.level;
	const now = dependencies?.now ?? (() => new Date());
	const writeStdout =
		dependencies?.writeStdout ?? ((line: string) => process.stdout.write(`${line}\n`));

	const write = (level: LogLevel, event: string, fields?: Record<string, JsonValue>): void => {
		if (logLevelPriority[level] < logLevelPriority[selectedLevel]) {
			return;
		}

		const line = JSON.stringify({
			...fields,
			event,
			level,
			module: moduleName,
			ts: now().toISOString(),
		});

		if (config.stdout) {
			writeStdout(line);
		}
		if (filePath !== undefined) {
			appendFileSync(filePath, `${line}\n`, "utf8");
		}
	};

	return {
		debug(event: string, fields?: Record<string, JsonValue>): void {
			write("debug", event, fields);
		},
		error(event: string, fields?: Record<string, JsonValue>): void {
			write("error", event, fields);
		},
		info(event: string, fields?: Record<string, JsonValue>): void {
			write("info", event, fields);
		},
		warn(event: string, fields?: Record<string, JsonValue>): void {
			write("warn", event, fields);
		},
	};
}
