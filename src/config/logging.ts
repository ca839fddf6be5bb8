/**
 * Logging Configuration
 * Read from MPRIS_RELAY_LOG_* environment variables
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

// Kept here rather than in utils/Logger so LogWriter can read the config
// without importing the logger
export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	NONE = 4,
}

export interface LoggingConfig {
	level: LogLevel;
	/** Off unless MPRIS_RELAY_LOG_FILE=true; the relay runs inside a host process */
	fileLogging: boolean;
	consoleLogging: boolean;
	/** Bytes before the file is rotated */
	maxFileSize: number;
	maxFiles: number;
	logDir: string;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
	DEBUG: LogLevel.DEBUG,
	INFO: LogLevel.INFO,
	WARN: LogLevel.WARN,
	ERROR: LogLevel.ERROR,
	NONE: LogLevel.NONE,
};

/**
 * Case-insensitive level name; anything unrecognised means INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
	return LEVEL_NAMES[value?.toUpperCase() ?? ""] ?? LogLevel.INFO;
}

const LoggingEnvSchema = z.object({
	MPRIS_RELAY_LOG_LEVEL: z.string().optional().transform(parseLogLevel),
	MPRIS_RELAY_LOG_FILE: z
		.string()
		.optional()
		.transform((value) => value === "true"),
	MPRIS_RELAY_LOG_CONSOLE: z
		.string()
		.optional()
		.transform((value) => value !== "false"),
	MPRIS_RELAY_LOG_DIR: z
		.string()
		.optional()
		.transform((value) => value || join(homedir(), ".mpris-relay", "logs")),
});

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
	const parsed = LoggingEnvSchema.parse(env);
	return {
		level: parsed.MPRIS_RELAY_LOG_LEVEL,
		fileLogging: parsed.MPRIS_RELAY_LOG_FILE,
		consoleLogging: parsed.MPRIS_RELAY_LOG_CONSOLE,
		maxFileSize: 5 * 1024 * 1024,
		maxFiles: 5,
		logDir: parsed.MPRIS_RELAY_LOG_DIR,
	};
}
