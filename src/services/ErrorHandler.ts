import { getLogger, type Logger } from "../utils/Logger";

export enum ErrorSeverity {
	INFO = "info",
	/** Output degraded to defaults; bus clients still get a valid reply */
	WARNING = "warning",
	ERROR = "error",
}

export enum ErrorCategory {
	/** Name requests, exports and sends on the session bus */
	BUS = "bus",
	/** The host player threw while serving a call or an event */
	HOST = "host",
	ICON_THEME = "icon-theme",
	CONFIG = "config",
	UNKNOWN = "unknown",
}

export interface ErrorContext {
	category: ErrorCategory;
	/** Defaults to the category's severity */
	severity?: ErrorSeverity;
	operation?: string;
	metadata?: Record<string, unknown>;
}

const CATEGORY_SEVERITY: Record<ErrorCategory, ErrorSeverity> = {
	[ErrorCategory.BUS]: ErrorSeverity.ERROR,
	[ErrorCategory.HOST]: ErrorSeverity.ERROR,
	[ErrorCategory.ICON_THEME]: ErrorSeverity.WARNING,
	[ErrorCategory.CONFIG]: ErrorSeverity.ERROR,
	[ErrorCategory.UNKNOWN]: ErrorSeverity.ERROR,
};

function hasMessage(value: unknown): value is { message: string } {
	return (
		typeof value === "object" &&
		value !== null &&
		"message" in value &&
		typeof value.message === "string"
	);
}

/**
 * Funnels failures the relay absorbs (missing art, an unreachable theme, a
 * host that threw) into the log, and hands the caller back an Error to rethrow
 * or drop.
 */
export class ErrorHandler {
	constructor(private logger: Logger = getLogger("ErrorHandler")) {}

	handle(error: unknown, context: ErrorContext): Error {
		const normalized = this.normalizeError(error);
		const severity = context.severity ?? CATEGORY_SEVERITY[context.category];
		const line = `[${context.category}] ${context.operation ?? "unknown operation"}: ${normalized.message}`;

		if (severity === ErrorSeverity.ERROR) {
			this.logger.error(line, context.metadata ?? normalized);
		} else if (severity === ErrorSeverity.WARNING) {
			this.logger.warn(line, context.metadata);
		} else {
			this.logger.info(line, context.metadata);
		}
		return normalized;
	}

	/**
	 * Errors pass through untouched; message-bearing objects and other
	 * thrown values become an Error carrying their text
	 */
	normalizeError(error: unknown): Error {
		if (error instanceof Error) return error;
		if (hasMessage(error)) return new Error(error.message);
		return new Error(String(error));
	}

	handleBusError(error: unknown, operation: string): Error {
		return this.handle(error, { category: ErrorCategory.BUS, operation });
	}

	handleHostError(error: unknown, operation: string): Error {
		return this.handle(error, { category: ErrorCategory.HOST, operation });
	}

	/**
	 * Logged as a warning; the caller falls back to the configured art URL
	 */
	handleIconThemeError(error: unknown, iconName: string): Error {
		return this.handle(error, {
			category: ErrorCategory.ICON_THEME,
			operation: "resolve fallback cover art",
			metadata: { iconName },
		});
	}
}

let shared: ErrorHandler | null = null;

export function getErrorHandler(): ErrorHandler {
	shared ??= new ErrorHandler();
	return shared;
}

export function createErrorHandler(logger?: Logger): ErrorHandler {
	return new ErrorHandler(logger);
}
