// =============================================================================
// CONSOLE LOGGER — One human-readable line per call, for host consoles
// =============================================================================
// Lines read `<time> <LEVEL> [<prefix>] <message> key=value ...` so a metrics
// warning sits on a single line next to the host's own output.

import pc from "picocolors";
import stringify from "safe-stable-stringify";
import type { BeaconLogger } from "../types/config.js";
import { LEVEL_PRIORITY, type LogLevel } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

interface LevelStyle {
	label: string;
	color: (s: string) => string;
	method: "log" | "warn" | "error";
}

const LEVEL_STYLE: Record<LogLevel, LevelStyle> = {
	debug: { label: "DEBUG", color: pc.gray, method: "log" },
	info: { label: "INFO ", color: pc.cyan, method: "log" },
	warn: { label: "WARN ", color: pc.yellow, method: "warn" },
	error: { label: "ERROR", color: pc.red, method: "error" },
};

const BARE_VALUE = /^[^\s"=]+$/;

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Tag in brackets before each message, usually the plugin name. Default: `"Metrics"` */
	prefix?: string;
	/** Default: `true` */
	timestamps?: boolean;
	/** Keys redacted in addition to the server UUID and common secrets. */
	redactKeys?: string[];
}

/** Render one log field. Strings with spaces, quotes or `=` are JSON-quoted. */
export function formatField(key: string, value: unknown): string {
	if (typeof value === "string") {
		return `${key}=${BARE_VALUE.test(value) ? value : JSON.stringify(value)}`;
	}
	return `${key}=${stringify(value) ?? String(value)}`;
}

/**
 * @example
 * ```ts
 * import { createConsoleLogger } from "@beacon-metrics/core/logger";
 *
 * const logger = createConsoleLogger({ level: "debug", prefix: "MyPlugin" });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): BeaconLogger {
	const { level = "info", prefix = "Metrics", timestamps = true } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const style = LEVEL_STYLE[lvl];
		const parts: string[] = [];
		if (timestamps) parts.push(pc.dim(new Date().toISOString()));
		parts.push(style.color(style.label), `[${prefix}]`, message);

		for (const [key, value] of Object.entries(redactData(data, redactKeys) ?? {})) {
			parts.push(formatField(key, value));
		}

		console[style.method](parts.join(" "));
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
