// =============================================================================
// CHARTS — Named units of host data collected once per cycle
// =============================================================================

import { type JsonValue, JsonPrimitive, jsonOf } from "@beacon-metrics/core";

export type Awaitable<T> = T | Promise<T>;

/**
 * A chart produces its data for the current cycle, or `undefined` when it has
 * nothing to report. Charts are registered by object identity, so two charts
 * may share an id and both end up in the payload.
 */
export interface Chart {
	readonly chartId: string;
	collect(): Awaitable<JsonValue | undefined>;
}

export type SimpleChartValue = string | number | boolean | null | undefined;

/**
 * A chart reporting a single scalar. `undefined` means "no data this cycle";
 * `null` is reported as a JSON `null`.
 *
 * @example
 * ```ts
 * service.registerChart(simpleChart("storageBackend", () => config.storage.type));
 * ```
 */
export function simpleChart(
	chartId: string,
	supplier: () => Awaitable<SimpleChartValue>,
): Chart {
	return {
		chartId,
		async collect() {
			const value = await supplier();
			if (value === undefined) return undefined;
			return new JsonPrimitive(value);
		},
	};
}

/**
 * A chart reporting arbitrary structured data. The supplier's result goes
 * through `jsonOf`, so plain objects, arrays, Maps and Sets all work.
 */
export function customChart(chartId: string, supplier: () => Awaitable<unknown>): Chart {
	return {
		chartId,
		async collect() {
			const value = await supplier();
			if (value === null || value === undefined) return undefined;
			return jsonOf(value);
		},
	};
}
