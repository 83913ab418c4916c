// =============================================================================
// METRICS CONFIG STORE — Opt-in flag and server UUID in <dataDir>/metrics/config.json
// =============================================================================
// Faults here are never fatal: an unreadable file or a mistyped key is logged
// and replaced by its default. A missing server UUID is generated and written
// back so the installation keeps the same identity across restarts.

import { randomUUID } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import {
	type BeaconLogger,
	BeaconError,
	createConsoleLogger,
	errorDetails,
	type MetricsConfig,
	silentLogger,
} from "@beacon-metrics/core";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** On-disk shape. Key names are kept stable for existing installations. */
export interface MetricsConfigFile {
	enabled: boolean;
	serverUuid: string;
	logResponseStatusText: boolean;
	logSentData: boolean;
}

type BooleanKey = "enabled" | "logResponseStatusText" | "logSentData";

const BOOLEAN_DEFAULTS: Record<BooleanKey, boolean> = {
	enabled: true,
	logResponseStatusText: false,
	logSentData: false,
};

const BOOLEAN_KEYS: readonly BooleanKey[] = ["enabled", "logResponseStatusText", "logSentData"];

export interface ConfigStoreOptions {
	/** Root directory. Default: `$BEACON_METRICS_HOME` or `~/.beacon-metrics` */
	dataDir?: string;
	/** Receives config warnings and becomes the engine's logger. Default: console logger */
	logger?: BeaconLogger;
	/** Environment used for overrides. Default: `process.env` */
	env?: NodeJS.ProcessEnv;
}

export function getDataDir(options: ConfigStoreOptions = {}): string {
	const env = options.env ?? process.env;
	return options.dataDir ?? env.BEACON_METRICS_HOME ?? join(homedir(), ".beacon-metrics");
}

export function getConfigPath(options: ConfigStoreOptions = {}): string {
	return join(getDataDir(options), "metrics", "config.json");
}

/**
 * `DO_NOT_TRACK=1|true` or `BEACON_METRICS_DISABLED=1` force telemetry off
 * regardless of the file.
 */
export function isDisabledByEnv(env: NodeJS.ProcessEnv = process.env): boolean {
	const dnt = (env.DO_NOT_TRACK ?? "").toLowerCase();
	return dnt === "1" || dnt === "true" || env.BEACON_METRICS_DISABLED === "1";
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Read and parse the file without logging. `null` when absent or unreadable. */
function peekConfigFile(path: string): Record<string, unknown> | null {
	if (!existsSync(path)) return null;
	try {
		const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
		return isRecord(parsed) ? parsed : null;
	} catch {
		return null;
	}
}

function readRaw(path: string, logger: BeaconLogger): Record<string, unknown> | null {
	if (!existsSync(path)) return null;
	try {
		const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
		if (isRecord(parsed)) return parsed;
		throw BeaconError.configInvalid("Metrics config must be a JSON object");
	} catch (error) {
		const failure =
			error instanceof BeaconError
				? error
				: BeaconError.configInvalid("Failed to read metrics config", error);
		logger.warn("Failed to read metrics config, using defaults", {
			path,
			...errorDetails(failure),
		});
		return null;
	}
}

function readBoolean(
	raw: Record<string, unknown>,
	key: BooleanKey,
	path: string,
	logger: BeaconLogger,
): boolean {
	const value = raw[key];
	if (value === undefined) return BOOLEAN_DEFAULTS[key];
	if (typeof value === "boolean") return value;
	logger.warn("Ignoring invalid metrics config value", { path, key, expected: "boolean" });
	return BOOLEAN_DEFAULTS[key];
}

/**
 * Write the config file, creating its directory.
 * @throws BeaconError `CONFIG_WRITE_FAILED`
 */
export function writeConfigFile(config: MetricsConfigFile, options: ConfigStoreOptions = {}): void {
	const path = getConfigPath(options);
	try {
		mkdirSync(dirname(path), { recursive: true });
		writeFileSync(path, `${JSON.stringify(config, null, 2)}\n`, "utf-8");
	} catch (error) {
		throw BeaconError.configWriteFailed(`Failed to write metrics config at ${path}`, error);
	}
}

/**
 * Load the config file, applying defaults. Generates and persists a server
 * UUID when the file has none (or a malformed one).
 */
export function loadConfigFile(options: ConfigStoreOptions = {}): MetricsConfigFile {
	const logger = options.logger ?? silentLogger;
	const path = getConfigPath(options);
	const raw = readRaw(path, logger) ?? {};

	const rawUuid = raw.serverUuid;
	const validUuid =
		typeof rawUuid === "string" && UUID_PATTERN.test(rawUuid) ? rawUuid : undefined;
	if (rawUuid !== undefined && validUuid === undefined) {
		logger.warn("Ignoring invalid metrics config value", { path, key: "serverUuid" });
	}

	const config: MetricsConfigFile = {
		enabled: readBoolean(raw, "enabled", path, logger),
		serverUuid: validUuid ?? randomUUID(),
		logResponseStatusText: readBoolean(raw, "logResponseStatusText", path, logger),
		logSentData: readBoolean(raw, "logSentData", path, logger),
	};

	if (validUuid === undefined) {
		try {
			writeConfigFile(config, options);
			logger.debug("Generated metrics server UUID", { path });
		} catch (error) {
			logger.warn("Failed to save server UUID", errorDetails(error));
		}
	}

	return config;
}

/**
 * Resolve the engine's configuration snapshot from the file and environment.
 */
export function resolveMetricsConfig(options: ConfigStoreOptions = {}): MetricsConfig {
	const logger = options.logger ?? createConsoleLogger();
	const file = loadConfigFile({ ...options, logger });
	const disabledByEnv = isDisabledByEnv(options.env);

	return {
		enabled: file.enabled && !disabledByEnv,
		serverUuid: file.serverUuid,
		logResponse: file.logResponseStatusText,
		logPayload: file.logSentData,
		logger,
	};
}

/**
 * Read the file as stored, keeping only well-typed keys. Never writes, logs
 * or generates a UUID. `null` when the file is absent or unreadable.
 */
export function readConfigFile(options: ConfigStoreOptions = {}): Partial<MetricsConfigFile> | null {
	const raw = peekConfigFile(getConfigPath(options));
	if (!raw) return null;

	const stored: Partial<MetricsConfigFile> = {};
	for (const key of BOOLEAN_KEYS) {
		const value = raw[key];
		if (typeof value === "boolean") stored[key] = value;
	}
	const serverUuid = raw.serverUuid;
	if (typeof serverUuid === "string" && UUID_PATTERN.test(serverUuid)) {
		stored.serverUuid = serverUuid;
	}
	return stored;
}

/**
 * Live opt-in check: re-reads the file on every call and never writes or logs.
 */
export function isTelemetryEnabled(options: ConfigStoreOptions = {}): boolean {
	if (isDisabledByEnv(options.env)) return false;
	return readConfigFile(options)?.enabled ?? BOOLEAN_DEFAULTS.enabled;
}

export function setTelemetryEnabled(enabled: boolean, options: ConfigStoreOptions = {}): void {
	const config = loadConfigFile(options);
	writeConfigFile({ ...config, enabled }, options);
}

/** Replace the persisted server UUID with a fresh one and return it. */
export function resetServerUuid(options: ConfigStoreOptions = {}): string {
	const config = loadConfigFile(options);
	const serverUuid = randomUUID();
	writeConfigFile({ ...config, serverUuid }, options);
	return serverUuid;
}
