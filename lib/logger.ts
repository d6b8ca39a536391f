import { PACKAGE_NAME } from "./constants.js";
import { toStringValue } from "./utils.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
	service: string;
	level: LogLevel;
	message: string;
	extra?: Record<string, unknown>;
}

/**
 * Optional sink installed by the host CLI. Its return value is ignored; a
 * rejected promise is reported to the console like a thrown error.
 */
export interface LogClient {
	log?: (entry: LogEntry) => unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

function isLogLevel(value: string): value is LogLevel {
	return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

function parseLogLevel(value: string | undefined): LogLevel {
	if (!value) return "info";
	const normalized = value.toLowerCase().trim();
	return isLogLevel(normalized) ? normalized : "info";
}

export const DEBUG_ENABLED = process.env.HELP_LAYOUT_DEBUG === "1";
export const LOG_LEVEL = parseLogLevel(process.env.HELP_LAYOUT_LOG_LEVEL);
const CONSOLE_LOG_ENABLED = process.env.HELP_LAYOUT_CONSOLE_LOG === "1";

let client: LogClient | null = null;

export function initLogger(newClient: LogClient | null): void {
	client = newClient;
}

function reportSinkFailure(error: unknown): void {
	logToConsole("warn", `[${PACKAGE_NAME}] Log sink failed: ${toStringValue(error)}`);
}

function logToClient(level: LogLevel, message: string, data: unknown, service: string): void {
	const sink = client?.log;
	if (!sink) return;

	const extra =
		data === undefined
			? undefined
			: { data: typeof data === "object" && data !== null ? data : { value: data } };

	try {
		const result = sink({
			service,
			level,
			message: message.replace(/[\r\n]+/g, " "),
			...(extra ? { extra } : {}),
		});
		if (result instanceof Promise) {
			void result.catch(reportSinkFailure);
		}
	} catch (error) {
		reportSinkFailure(error);
	}
}

function logToConsole(level: LogLevel, message: string, data?: unknown): void {
	if (!CONSOLE_LOG_ENABLED) return;
	if (data !== undefined) {
		if (level === "warn") console.warn(message, data);
		else if (level === "error") console.error(message, data);
		else console.log(message, data);
		return;
	}

	if (level === "warn") console.warn(message);
	else if (level === "error") console.error(message);
	else console.log(message);
}

function shouldLog(level: LogLevel): boolean {
	if (level === "error") return true;
	if (!DEBUG_ENABLED) return false;
	return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[LOG_LEVEL];
}

function formatDuration(ms: number): string {
	if (ms < 1000) return `${Math.round(ms)}ms`;
	if (ms < 60000) return `${(ms / 1000).toFixed(2)}s`;
	const minutes = Math.floor(ms / 60000);
	const seconds = ((ms % 60000) / 1000).toFixed(1);
	return `${minutes}m ${seconds}s`;
}

export interface ScopedLogger {
	debug(message: string, data?: unknown): void;
	info(message: string, data?: unknown): void;
	warn(message: string, data?: unknown): void;
	error(message: string, data?: unknown): void;
	/** Starts a timer; the returned function logs and returns the elapsed milliseconds. */
	time(label: string): () => number;
}

export function createLogger(scope: string): ScopedLogger {
	const prefix = `[${PACKAGE_NAME}:${scope}]`;
	const service = `${PACKAGE_NAME}.${scope}`;

	const emit = (level: LogLevel, message: string, data?: unknown): void => {
		if (!shouldLog(level)) return;
		const text = `${prefix} ${message}`;
		logToClient(level, text, data, service);
		logToConsole(level, text, data);
	};

	return {
		debug(message: string, data?: unknown) {
			emit("debug", message, data);
		},
		info(message: string, data?: unknown) {
			emit("info", message, data);
		},
		warn(message: string, data?: unknown) {
			emit("warn", message, data);
		},
		error(message: string, data?: unknown) {
			emit("error", message, data);
		},
		time(label: string): () => number {
			const startTime = performance.now();
			return () => {
				const duration = performance.now() - startTime;
				emit("debug", `${label}: ${formatDuration(duration)}`);
				return duration;
			};
		},
	};
}
