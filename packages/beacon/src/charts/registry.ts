// =============================================================================
// CHART REGISTRY — Append-only chart set with per-chart fault isolation
// =============================================================================

import {
	type BeaconLogger,
	BeaconError,
	errorDetails,
	JsonArray,
	JsonObject,
} from "@beacon-metrics/core";
import type { Chart } from "./chart.js";

/**
 * Collect one chart into its `{ chartId, data }` envelope.
 * A throwing or rejecting chart is logged and yields `undefined`.
 */
export async function collectChart(
	chart: Chart,
	logger: BeaconLogger,
): Promise<JsonObject | undefined> {
	try {
		const data = await chart.collect();
		if (data === undefined) return undefined;
		return new JsonObject().add("chartId", chart.chartId).add("data", data);
	} catch (error) {
		const failure = BeaconError.chartCollectionFailed(chart.chartId, error);
		logger.warn("Failed to collect chart", { chartId: chart.chartId, ...errorDetails(failure) });
		return undefined;
	}
}

export class ChartRegistry {
	private readonly charts = new Set<Chart>();

	/**
	 * Add a chart. May be called at any time, including from inside another
	 * chart's `collect()`; such a chart is picked up on the next cycle.
	 */
	register(chart: Chart): void {
		if (typeof chart?.chartId !== "string") {
			throw BeaconError.invalidArgument("Chart id must be a string");
		}
		if (typeof chart.collect !== "function") {
			throw BeaconError.invalidArgument(`Chart "${chart.chartId}" has no collect() function`);
		}
		this.charts.add(chart);
	}

	get size(): number {
		return this.charts.size;
	}

	/**
	 * Collect every chart registered so far, in registration order. Charts run
	 * one after another; a slow chart delays the ones behind it.
	 */
	async collectAll(logger: BeaconLogger): Promise<JsonArray> {
		const results = new JsonArray();
		// Iterate a snapshot so registrations during collection don't extend this pass
		for (const chart of Array.from(this.charts)) {
			const entry = await collectChart(chart, logger);
			if (entry) results.add(entry);
		}
		return results;
	}
}
