/**
 * Sink for every log line the engine writes. Hosts usually adapt their own
 * logger to this shape; `createConsoleLogger` is the default.
 */
export interface BeaconLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * Resolved, read-only configuration snapshot handed to the engine at startup.
 */
export interface MetricsConfig {
	/** Whether the host owner opted in. Default: `true` */
	readonly enabled: boolean;
	/** Random v4 UUID identifying this installation, persisted by the config store */
	readonly serverUuid: string;
	/** Log the collector's status code and body after each submission. Default: `false` */
	readonly logResponse: boolean;
	/** Log the raw JSON payload before it is compressed. Default: `false` */
	readonly logPayload: boolean;
	readonly logger: BeaconLogger;
}

/**
 * Facts the host supplies about itself. Functions are called once per cycle.
 */
export interface HostEnvironment {
	/** Version of the plugin or module embedding the reporter */
	pluginVersion: string;
	/** Version string of the host platform (e.g. "1.21.1-R0.1-SNAPSHOT") */
	platformVersion: string;
	/** Platform family reported by the built-in platform chart. Default: detected runtime */
	platformName?: string;
	/** Default: `() => 0` */
	playerCount?: () => number;
	/** Default: `() => true` */
	onlineMode?: () => boolean;
}
