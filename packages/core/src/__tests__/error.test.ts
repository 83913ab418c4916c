import { describe, expect, it } from "vitest";
import { BASE_ERROR_CODES, BeaconError } from "../error/index.js";

describe("BeaconError", () => {
	describe("constructor", () => {
		it("creates an error with the given code and message", () => {
			const error = new BeaconError("CONFIG_INVALID", "bad config");
			expect(error.code).toBe("CONFIG_INVALID");
			expect(error.message).toBe("bad config");
		});

		it("is an instance of Error and BeaconError", () => {
			const error = new BeaconError("CONFIG_INVALID", "Something went wrong");
			expect(error).toBeInstanceOf(Error);
			expect(error).toBeInstanceOf(BeaconError);
		});

		it("has the name 'BeaconError'", () => {
			expect(new BeaconError("SCHEDULER_STATE", "x").name).toBe("BeaconError");
		});

		it("takes the transient flag from the code table by default", () => {
			expect(new BeaconError("DELIVERY_FAILED", "x").transient).toBe(true);
			expect(new BeaconError("INVALID_ARGUMENT", "x").transient).toBe(false);
		});

		it("keeps the cause", () => {
			const cause = new Error("ECONNREFUSED");
			const error = new BeaconError("DELIVERY_FAILED", "x", { cause });
			expect(error.cause).toBe(cause);
		});
	});

	describe("static factories", () => {
		it("deliveryFailed is transient", () => {
			const error = BeaconError.deliveryFailed();
			expect(error.code).toBe("DELIVERY_FAILED");
			expect(error.message).toBe("Metrics submission failed");
			expect(error.transient).toBe(true);
		});

		it("chartCollectionFailed names the chart", () => {
			const error = BeaconError.chartCollectionFailed("players");
			expect(error.code).toBe("CHART_COLLECTION_FAILED");
			expect(error.message).toBe("Failed to collect chart: players");
			expect(error.details).toEqual({ chartId: "players" });
		});

		it("invalidArgument uses default message when none provided", () => {
			const error = BeaconError.invalidArgument();
			expect(error.code).toBe("INVALID_ARGUMENT");
			expect(error.message).toBe("Invalid argument");
		});

		it("schedulerState is deterministic", () => {
			const error = BeaconError.schedulerState();
			expect(error.message).toBe(BASE_ERROR_CODES.SCHEDULER_STATE.message);
			expect(error.transient).toBe(false);
		});
	});

	it("has a factory for every code the engine raises", () => {
		expect(Object.keys(BASE_ERROR_CODES).sort()).toEqual([
			"CHART_COLLECTION_FAILED",
			"CONFIG_INVALID",
			"CONFIG_WRITE_FAILED",
			"DELIVERY_FAILED",
			"INVALID_ARGUMENT",
			"SCHEDULER_STATE",
		]);
		const factories = Object.getOwnPropertyNames(BeaconError).filter(
			(name) => typeof Reflect.get(BeaconError, name) === "function",
		);
		expect(factories.sort()).toEqual([
			"chartCollectionFailed",
			"configInvalid",
			"configWriteFailed",
			"deliveryFailed",
			"invalidArgument",
			"schedulerState",
		]);
	});
});
