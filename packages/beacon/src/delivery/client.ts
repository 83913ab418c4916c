// =============================================================================
// METRICS CLIENT — Fire-and-forget gzip POST to the collector
// =============================================================================

import { promisify } from "node:util";
import { gzip } from "node:zlib";
import {
	type BeaconLogger,
	BeaconError,
	errorDetails,
	type JsonValue,
	type MetricsConfig,
} from "@beacon-metrics/core";

export const METRICS_VERSION = "3.2.0";
export const USER_AGENT = `BeaconMetrics/${METRICS_VERSION}`;
/** fetch() has no timeout of its own; a hung request is aborted after this. */
export const DEFAULT_TIMEOUT_MS = 10_000;

const gzipAsync = promisify(gzip);

/** Gzip the UTF-8 bytes of `text` off the main thread. */
export function compressPayload(text: string): Promise<Buffer> {
	return gzipAsync(Buffer.from(text, "utf-8"));
}

export interface MetricsClientOptions {
	config: MetricsConfig;
	/** Collector URL, owned by the host that embeds the reporter. */
	endpoint: string;
	/** Abort the request after this many ms. Default: 10000 */
	timeoutMs?: number;
}

export type DeliveryOutcome = { ok: true; status: number } | { ok: false; error: BeaconError };

export class MetricsClient {
	private readonly config: MetricsConfig;
	private readonly logger: BeaconLogger;
	readonly endpoint: string;
	readonly timeoutMs: number;

	constructor(options: MetricsClientOptions) {
		this.config = options.config;
		this.logger = options.config.logger;
		if (!URL.canParse(options.endpoint)) {
			throw BeaconError.invalidArgument(`Invalid collector endpoint "${options.endpoint}"`);
		}
		this.endpoint = options.endpoint;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
	}

	/**
	 * Serialize, compress and POST one payload. Rejects on transport errors;
	 * HTTP error statuses resolve like any other response.
	 */
	async post(payload: JsonValue): Promise<Response> {
		const json = payload.toJson();
		if (this.config.logPayload) {
			this.logger.info("Sending metrics data", { payload: json });
		}

		const body = await compressPayload(json);
		return fetch(this.endpoint, {
			method: "POST",
			headers: {
				"Content-Type": "application/json",
				"Content-Encoding": "gzip",
				"User-Agent": USER_AGENT,
			},
			body,
			signal: AbortSignal.timeout(this.timeoutMs),
		});
	}

	/** Send one payload. Never throws: failures are logged and reported in the outcome. */
	async send(payload: JsonValue): Promise<DeliveryOutcome> {
		try {
			const response = await this.post(payload);
			if (this.config.logResponse) {
				const text = await response.text();
				this.logger.info("Metrics response", { status: response.status, body: text });
			} else {
				await response.body?.cancel();
			}
			return { ok: true, status: response.status };
		} catch (error) {
			const failure = BeaconError.deliveryFailed("Metrics submission failed", error);
			this.logger.warn("Metrics submission error", {
				endpoint: this.endpoint,
				...errorDetails(failure),
			});
			return { ok: false, error: failure };
		}
	}
}
