// =============================================================================
// METRICS SERVICE — Wires charts, scheduler and delivery together
// =============================================================================
// Creates the reporter a host embeds: one instance per plugin/module, started
// at construction when the owner opted in, stopped with `shutdown()`.

import * as os from "node:os";
import {
	type BeaconLogger,
	errorDetails,
	type HostEnvironment,
	JsonObject,
	type MetricsConfig,
} from "@beacon-metrics/core";
import { platformChart, serviceVersionChart } from "../charts/builtin.js";
import type { Chart } from "../charts/chart.js";
import { ChartRegistry } from "../charts/registry.js";
import { type DeliveryOutcome, METRICS_VERSION, MetricsClient } from "../delivery/client.js";
import { type ConfigStoreOptions, isTelemetryEnabled, resolveMetricsConfig } from "../config/store.js";
import { MetricsScheduler, type SchedulerOptions } from "../scheduler/scheduler.js";

export interface MetricsServiceOptions {
	/** Numeric id of this plugin on the collector */
	serviceId: number;
	host: HostEnvironment;
	config: MetricsConfig;
	/**
	 * Checked before every scheduled cycle. Default: `() => config.enabled`,
	 * i.e. the snapshot taken at startup.
	 */
	isEnabled?: () => boolean;
	/** Collector URL submissions are POSTed to */
	endpoint: string;
	/** Request timeout in ms. Default: 10000 */
	timeoutMs?: number;
	/** Override the scheduling window and period. */
	schedule?: Pick<SchedulerOptions, "initialDelay" | "interval" | "random">;
}

export class MetricsService {
	/** Present only when the service was created enabled. */
	readonly scheduler: MetricsScheduler | null;
	private readonly serviceId: number;
	private readonly host: HostEnvironment;
	private readonly config: MetricsConfig;
	private readonly logger: BeaconLogger;
	private readonly registry = new ChartRegistry();
	private readonly client: MetricsClient;
	private readonly inFlight = new Set<Promise<DeliveryOutcome>>();

	constructor(options: MetricsServiceOptions) {
		this.serviceId = options.serviceId;
		this.host = options.host;
		this.config = options.config;
		this.logger = options.config.logger;
		this.client = new MetricsClient({
			config: options.config,
			endpoint: options.endpoint,
			timeoutMs: options.timeoutMs,
		});

		if (!this.config.enabled) {
			this.scheduler = null;
			this.logger.debug("Metrics disabled, service stays dormant");
			return;
		}

		const { config } = this;
		this.scheduler = new MetricsScheduler({
			...options.schedule,
			isEnabled: options.isEnabled ?? (() => config.enabled),
			logger: this.logger,
		});
		this.scheduler.schedule(() => this.runCycle());

		this.registerChart(platformChart(this.serviceId, this.host.platformName));
		this.registerChart(serviceVersionChart(this.host.pluginVersion));
	}

	/** Add a chart. Accepted on a dormant service too, where it is never collected. */
	registerChart(chart: Chart): void {
		this.registry.register(chart);
	}

	/** Stop scheduling cycles. Idempotent; a submission already sent is not cancelled. */
	shutdown(): void {
		this.scheduler?.shutdown();
	}

	/** Assemble the payload envelope for one cycle. */
	async buildPayload(): Promise<JsonObject> {
		return new JsonObject()
			.add("serverUUID", this.config.serverUuid)
			.add("metricsVersion", METRICS_VERSION)
			.add("platform", this.collectPlatformData())
			.add("service", this.collectServiceData())
			.add("customCharts", await this.registry.collectAll(this.logger));
	}

	/**
	 * Collect and dispatch one submission. Resolves once the request is on its
	 * way; the response is handled in the background. Never rejects.
	 */
	async runCycle(): Promise<void> {
		try {
			const payload = await this.buildPayload();
			const delivery = this.client.send(payload);
			this.inFlight.add(delivery);
			void delivery.finally(() => this.inFlight.delete(delivery));
		} catch (error) {
			this.logger.warn("Metrics collection failed", errorDetails(error));
		}
	}

	/** Resolves when every submission dispatched so far has settled. */
	async idle(): Promise<void> {
		await Promise.all(this.inFlight);
	}

	private collectPlatformData(): JsonObject {
		return new JsonObject()
			.add("playerCount", this.host.playerCount?.() ?? 0)
			.add("onlineMode", this.host.onlineMode?.() ?? true)
			.add("platformVersion", this.host.platformVersion)
			.add("osInfo", `${os.type()} ${os.release()}`)
			.add("nodeVersion", process.versions.node)
			.add("coreCount", os.cpus().length);
	}

	private collectServiceData(): JsonObject {
		return new JsonObject().add("pluginVersion", this.host.pluginVersion);
	}
}

export function createMetricsService(options: MetricsServiceOptions): MetricsService {
	return new MetricsService(options);
}

/**
 * Create a service configured from the config file. The opt-in flag is
 * re-read before every cycle, so `beacon telemetry off` takes effect without
 * a restart.
 */
export function createMetricsServiceFromStore(
	options: Omit<MetricsServiceOptions, "config" | "isEnabled"> & ConfigStoreOptions,
): MetricsService {
	const { dataDir, logger, env, ...serviceOptions } = options;
	const store: ConfigStoreOptions = { dataDir, logger, env };
	const config = resolveMetricsConfig(store);

	return new MetricsService({
		...serviceOptions,
		config,
		isEnabled: () => isTelemetryEnabled(store),
	});
}
