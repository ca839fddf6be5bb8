import { homedir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { LogLevel, getLoggingConfig, parseLogLevel } from "./logging";

describe("logging configuration", () => {
	it("parses level names case-insensitively", () => {
		expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
		expect(parseLogLevel("NONE")).toBe(LogLevel.NONE);
	});

	it("defaults unknown or missing levels to INFO", () => {
		expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
		expect(parseLogLevel("verbose")).toBe(LogLevel.INFO);
	});

	it("keeps file logging off and console logging on by default", () => {
		expect(getLoggingConfig({})).toEqual({
			level: LogLevel.INFO,
			fileLogging: false,
			consoleLogging: true,
			maxFileSize: 5 * 1024 * 1024,
			maxFiles: 5,
			logDir: join(homedir(), ".mpris-relay", "logs"),
		});
	});

	it("reads overrides from the environment", () => {
		const config = getLoggingConfig({
			MPRIS_RELAY_LOG_LEVEL: "warn",
			MPRIS_RELAY_LOG_FILE: "true",
			MPRIS_RELAY_LOG_CONSOLE: "false",
			MPRIS_RELAY_LOG_DIR: "/tmp/relay-logs",
		});

		expect(config.level).toBe(LogLevel.WARN);
		expect(config.fileLogging).toBe(true);
		expect(config.consoleLogging).toBe(false);
		expect(config.logDir).toBe("/tmp/relay-logs");
	});
});
