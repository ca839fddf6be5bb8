import { describe, expect, it, vi } from "vitest";
import { Logger } from "../utils/Logger";
import { ErrorCategory, ErrorSeverity, createErrorHandler } from "./ErrorHandler";

function quietLogger(): Logger {
	return new Logger("Test", { enableConsoleLogging: false, enableFileLogging: false });
}

describe("ErrorHandler", () => {
	it("normalizes non-Error values", () => {
		const handler = createErrorHandler(quietLogger());

		expect(handler.normalizeError("bus gone").message).toBe("bus gone");
		expect(handler.normalizeError(42).message).toBe("42");
		expect(handler.normalizeError({ message: "no reply" }).message).toBe("no reply");
	});

	it("returns Error instances unchanged", () => {
		const handler = createErrorHandler(quietLogger());
		const error = new Error("name taken");

		expect(handler.handleBusError(error, "request name")).toBe(error);
	});

	it("logs by severity with the category and operation", () => {
		const logger = quietLogger();
		const warn = vi.spyOn(logger, "warn");
		const error = vi.spyOn(logger, "error");
		const handler = createErrorHandler(logger);

		handler.handleIconThemeError(new Error("unreadable"), "audio-x-generic");
		handler.handle("failed", {
			category: ErrorCategory.HOST,
			operation: "org.mpris.MediaPlayer2.Raise",
		});

		expect(warn).toHaveBeenCalledWith(
			"[icon-theme] resolve fallback cover art: unreadable",
			{ iconName: "audio-x-generic" },
		);
		expect(error).toHaveBeenCalledWith(
			"[host] org.mpris.MediaPlayer2.Raise: failed",
			expect.any(Error),
		);
	});

	it("lets an explicit severity override the category default", () => {
		const logger = quietLogger();
		const info = vi.spyOn(logger, "info");
		const handler = createErrorHandler(logger);

		handler.handle(new Error("no themes installed"), {
			category: ErrorCategory.ICON_THEME,
			severity: ErrorSeverity.INFO,
		});

		expect(info).toHaveBeenCalledWith(
			"[icon-theme] unknown operation: no themes installed",
			undefined,
		);
	});
});
