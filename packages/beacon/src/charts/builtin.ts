import { JsonObject, JsonPrimitive } from "@beacon-metrics/core";
import type { Chart } from "./chart.js";

export const PLATFORM_CHART_ID = "platform";
export const SERVICE_VERSION_CHART_ID = "serviceVersion";

/** Runtime family the host process runs on. */
export function detectRuntime(): string {
	if (process.versions.bun) return "Bun";
	if ("Deno" in globalThis) return "Deno";
	return "Node.js";
}

export function platformChart(serviceId: number, platformName?: string): Chart {
	return {
		chartId: PLATFORM_CHART_ID,
		collect: () =>
			new JsonObject()
				.add("serviceId", serviceId)
				.add("serverType", platformName ?? detectRuntime()),
	};
}

export function serviceVersionChart(version: string): Chart {
	return {
		chartId: SERVICE_VERSION_CHART_ID,
		collect: () => new JsonPrimitive(version),
	};
}
