// =============================================================================
// JSON LOGGER — Structured single-line records for log aggregation
// =============================================================================

import stringify from "safe-stable-stringify";
import type { BeaconLogger } from "../types/config.js";
import { LEVEL_PRIORITY, type LogLevel } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name for structured output. Default: `"beacon-metrics"` */
	service?: string;
	/** Keys redacted in addition to the server UUID and common secrets. */
	redactKeys?: string[];
	/** Line sink. Default: stdout, stderr for warn and error. */
	write?: (line: string, level: LogLevel) => void;
}

function writeToStdio(line: string, level: LogLevel): void {
	const stream = level === "error" || level === "warn" ? process.stderr : process.stdout;
	stream.write(`${line}\n`);
}

/**
 * Create a structured JSON logger implementing `BeaconLogger`.
 *
 * Keys are emitted in a stable order and circular data is cut rather than
 * thrown on, so a log call can never take down a metrics cycle.
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): BeaconLogger {
	const { level = "info", service = "beacon-metrics", write = writeToStdio } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const safeData = redactData(data, redactKeys);
		const entry: Record<string, unknown> = {
			...safeData,
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
		};

		write(stringify(entry) ?? "{}", lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}

/** A logger that drops everything. */
export const silentLogger: BeaconLogger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
