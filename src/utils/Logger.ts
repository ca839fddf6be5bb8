/**
 * Logger
 * Leveled, context-tagged logging to the console and, when enabled, the
 * rotating log file
 */

import { getLoggingConfig, LogLevel } from "../config/logging";
import { getLogWriter } from "./LogWriter";

export { LogLevel } from "../config/logging";

export interface LoggerConfig {
	level: LogLevel;
	enableTimestamps: boolean;
	enableColors: boolean;
	enableFileLogging: boolean;
	enableConsoleLogging: boolean;
}

interface LevelStyle {
	label: string;
	color: string;
	write: (line: string) => void;
}

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const GRAY = "\x1b[90m";
const CYAN = "\x1b[36m";

const LEVEL_STYLES: Record<Exclude<LogLevel, LogLevel.NONE>, LevelStyle> = {
	[LogLevel.DEBUG]: { label: "DEBUG", color: GRAY, write: (line) => console.log(line) },
	[LogLevel.INFO]: { label: "INFO", color: "\x1b[34m", write: (line) => console.log(line) },
	[LogLevel.WARN]: { label: "WARN", color: "\x1b[33m", write: (line) => console.warn(line) },
	[LogLevel.ERROR]: { label: "ERROR", color: "\x1b[31m", write: (line) => console.error(line) },
};

function defaultLoggerConfig(): LoggerConfig {
	const logging = getLoggingConfig();
	return {
		level: logging.level,
		enableTimestamps: true,
		enableColors: process.stdout.isTTY === true,
		enableFileLogging: logging.fileLogging,
		enableConsoleLogging: logging.consoleLogging,
	};
}

/**
 * JSON for log data. D-Bus int64 values arrive as BigInt, which
 * `JSON.stringify` rejects; they are written as decimal strings.
 */
export function serializeLogData(data: unknown, indent?: number): string {
	if (typeof data !== "object" || data === null) {
		return String(data);
	}
	return JSON.stringify(
		data,
		(_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value),
		indent,
	);
}

function describeError(error: Error): Record<string, unknown> {
	return { name: error.name, message: error.message, stack: error.stack };
}

export class Logger {
	private config: LoggerConfig;

	constructor(
		private context = "MprisRelay",
		config: Partial<LoggerConfig> = {},
	) {
		this.config = { ...defaultLoggerConfig(), ...config };
	}

	/**
	 * Logger for another context sharing this one's settings
	 */
	child(context: string): Logger {
		return new Logger(context, this.config);
	}

	setLevel(level: LogLevel): void {
		this.config.level = level;
	}

	getLevel(): LogLevel {
		return this.config.level;
	}

	debug(message: string, data?: unknown): void {
		this.log(LogLevel.DEBUG, message, data);
	}

	info(message: string, data?: unknown): void {
		this.log(LogLevel.INFO, message, data);
	}

	warn(message: string, data?: unknown): void {
		this.log(LogLevel.WARN, message, data);
	}

	error(message: string, error?: unknown): void {
		this.log(LogLevel.ERROR, message, error instanceof Error ? describeError(error) : error);
	}

	private log(level: Exclude<LogLevel, LogLevel.NONE>, message: string, data: unknown): void {
		if (level < this.config.level) return;

		const style = LEVEL_STYLES[level];
		if (this.config.enableConsoleLogging) {
			style.write(this.consoleLine(style, message, data));
		}
		if (this.config.enableFileLogging) {
			getLogWriter().write(this.fileLine(style, message, data));
		}
	}

	private paint(color: string, text: string): string {
		return this.config.enableColors ? `${color}${text}${RESET}` : text;
	}

	/**
	 * `[HH:MM:SS.mmm] LEVEL [Context] message`, data indented below
	 */
	private consoleLine(style: LevelStyle, message: string, data: unknown): string {
		const parts: string[] = [];
		if (this.config.enableTimestamps) {
			parts.push(this.paint(GRAY, `[${new Date().toISOString().slice(11, 23)}]`));
		}
		parts.push(this.paint(style.color, style.label.padEnd(5)));
		parts.push(this.paint(CYAN, `[${this.context}]`), message);

		let line = parts.join(" ");
		if (data !== undefined) {
			line += `\n${this.paint(DIM, serializeLogData(data, 2))}`;
		}
		return line;
	}

	/**
	 * One line per record: ISO time, level, context, message, compact data
	 */
	private fileLine(style: LevelStyle, message: string, data: unknown): string {
		const line = `${new Date().toISOString()} [${style.label}] [${this.context}] ${message}`;
		return data === undefined ? line : `${line} ${serializeLogData(data)}`;
	}
}

let rootLogger: Logger | null = null;

/**
 * The root logger, or a child of it bound to `context`
 */
export function getLogger(context?: string): Logger {
	if (!rootLogger) {
		rootLogger = new Logger();
	}
	return context ? rootLogger.child(context) : rootLogger;
}

/**
 * Replace the root logger. Loggers obtained earlier keep their settings.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
	rootLogger = new Logger("MprisRelay", config);
}
