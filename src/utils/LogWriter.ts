/**
 * Log file writer
 *
 * Lines are buffered and appended by a single chain of async writes, so a
 * bus handler logging a line never waits on the disk. The file is rotated to
 * `<name>.1` … `<name>.<maxFiles>` once it reaches `maxFileSize`.
 */

import { existsSync, mkdirSync, statSync } from "node:fs";
import { appendFile, rename, rm } from "node:fs/promises";
import { join } from "node:path";
import { getLoggingConfig } from "../config/logging";

export interface LogWriterConfig {
	logDir: string;
	filename: string;
	/** Rotate once the file reaches this many bytes */
	maxFileSize: number;
	/** Rotated files kept besides the current one */
	maxFiles: number;
	/** Milliseconds between background flushes */
	flushInterval: number;
	/** Buffered lines that trigger an immediate flush */
	maxBufferedLines: number;
	enabled: boolean;
}

function defaultConfig(): LogWriterConfig {
	const logging = getLoggingConfig();
	return {
		logDir: logging.logDir,
		filename: "mpris-relay.log",
		maxFileSize: logging.maxFileSize,
		maxFiles: logging.maxFiles,
		flushInterval: 1000,
		maxBufferedLines: 100,
		enabled: true,
	};
}

export class LogWriter {
	private config: LogWriterConfig;
	private buffer: string[] = [];
	private fileSize = 0;
	private writes: Promise<void> = Promise.resolve();
	private timer: ReturnType<typeof setInterval> | null = null;

	constructor(config: Partial<LogWriterConfig> = {}) {
		this.config = { ...defaultConfig(), ...config };
		if (this.config.enabled) {
			this.open();
		}
	}

	private get filePath(): string {
		return join(this.config.logDir, this.config.filename);
	}

	private rotatedPath(index: number): string {
		return `${this.filePath}.${index}`;
	}

	private open(): void {
		try {
			mkdirSync(this.config.logDir, { recursive: true });
			this.fileSize = existsSync(this.filePath) ? statSync(this.filePath).size : 0;
		} catch (error) {
			console.error(`Log file disabled, cannot open ${this.config.logDir}:`, error);
			this.config.enabled = false;
			return;
		}

		this.timer = setInterval(() => {
			this.flush().catch((error: unknown) => console.error("Log flush failed:", error));
		}, this.config.flushInterval);
		this.timer.unref();
	}

	/**
	 * Queue one line; a trailing newline is added when missing
	 */
	write(line: string): void {
		if (!this.config.enabled) return;

		this.buffer.push(line.endsWith("\n") ? line : `${line}\n`);
		if (this.buffer.length >= this.config.maxBufferedLines) {
			this.flush().catch((error: unknown) => console.error("Log flush failed:", error));
		}
	}

	/**
	 * Append everything buffered so far. Resolves once it is on disk.
	 */
	flush(): Promise<void> {
		if (!this.config.enabled || this.buffer.length === 0) {
			return this.writes;
		}

		const content = this.buffer.join("");
		this.buffer = [];
		this.writes = this.writes.then(() => this.append(content));
		return this.writes;
	}

	private async append(content: string): Promise<void> {
		try {
			await appendFile(this.filePath, content, "utf-8");
			this.fileSize += Buffer.byteLength(content, "utf-8");
			if (this.fileSize >= this.config.maxFileSize) {
				await this.rotate();
			}
		} catch (error) {
			console.error(`Log write to ${this.filePath} failed:`, error);
		}
	}

	/**
	 * Shift `<name>.N` to `<name>.N+1`, dropping the oldest, then move the
	 * current file to `<name>.1`
	 */
	private async rotate(): Promise<void> {
		await rm(this.rotatedPath(this.config.maxFiles), { force: true });
		for (let index = this.config.maxFiles - 1; index >= 1; index--) {
			if (existsSync(this.rotatedPath(index))) {
				await rename(this.rotatedPath(index), this.rotatedPath(index + 1));
			}
		}
		await rename(this.filePath, this.rotatedPath(1));
		this.fileSize = 0;
	}

	/**
	 * Stop the background flush and write out the buffer
	 */
	async shutdown(): Promise<void> {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
		await this.flush();
	}

	getBufferSize(): number {
		return this.buffer.length;
	}

	getCurrentFileSize(): number {
		return this.fileSize;
	}
}

let sharedWriter: LogWriter | null = null;

export function getLogWriter(config?: Partial<LogWriterConfig>): LogWriter {
	if (!sharedWriter) {
		sharedWriter = new LogWriter(config);
	}
	return sharedWriter;
}

/**
 * Flush and drop the shared writer
 */
export async function resetLogWriter(): Promise<void> {
	const writer = sharedWriter;
	sharedWriter = null;
	await writer?.shutdown();
}
