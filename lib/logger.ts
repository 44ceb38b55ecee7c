import { ENV_VARS, PACKAGE_NAME } from "./constants.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
	service: string;
	level: LogLevel;
	message: string;
	extra?: Record<string, unknown>;
}

export interface LogClient {
	log?: (entry: LogEntry) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

function isLogLevel(value: string): value is LogLevel {
	return value in LOG_LEVEL_PRIORITY;
}

function parseLogLevel(value: string | undefined): LogLevel {
	if (!value) return "info";
	const normalized = value.toLowerCase().trim();
	if (isLogLevel(normalized)) return normalized;
	return "info";
}

export const DEBUG_ENABLED = process.env[ENV_VARS.DEBUG] === "1";
export const LOG_LEVEL = parseLogLevel(process.env[ENV_VARS.LOG_LEVEL]);
const CONSOLE_LOG_ENABLED = process.env[ENV_VARS.CONSOLE_LOG] === "1";

let client: LogClient | null = null;

export function initLogger(newClient: LogClient | null): void {
	client = newClient;
}

function logToClient(level: LogLevel, message: string, data: unknown, service: string): void {
	const log = client?.log;
	if (!log) return;

	const extra = data === undefined ? undefined : { data };
	try {
		log({
			service,
			level,
			message: message.replace(/[\r\n]+/g, " "),
			extra,
		});
	} catch (error) {
		if (CONSOLE_LOG_ENABLED) {
			console.error(`[${PACKAGE_NAME}] Log client failed: ${String(error)}`);
		}
	}
}

function logToConsole(level: LogLevel, message: string, data?: unknown): void {
	if (!CONSOLE_LOG_ENABLED) return;
	const args: unknown[] = data === undefined ? [message] : [message, data];
	if (level === "warn") console.warn(...args);
	else if (level === "error") console.error(...args);
	else console.log(...args);
}

if (DEBUG_ENABLED) {
	logToConsole("info", `[${PACKAGE_NAME}] Debug logging ENABLED (level: ${LOG_LEVEL})`);
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
	time(label: string): () => number;
	timeEnd(label: string, startTime: number): void;
}

export function createLogger(scope: string): ScopedLogger {
	const prefix = `[${PACKAGE_NAME}:${scope}]`;
	const service = `${PACKAGE_NAME}.${scope}`;

	const emit = (level: LogLevel, message: string, data?: unknown) => {
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
		timeEnd(label: string, startTime: number): void {
			const duration = performance.now() - startTime;
			emit("debug", `${label}: ${formatDuration(duration)}`);
		},
	};
}

export { formatDuration };
