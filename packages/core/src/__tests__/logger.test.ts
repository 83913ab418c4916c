import { afterEach, describe, expect, it, vi } from "vitest";
import {
	buildRedactKeys,
	createConsoleLogger,
	createJsonLogger,
	errorDetails,
	formatField,
	redactData,
} from "../logger/index.js";

describe("createJsonLogger", () => {
	it("writes one JSON record per call", () => {
		const lines: string[] = [];
		const logger = createJsonLogger({ write: (line) => lines.push(line) });

		logger.info("Metrics response", { status: 200 });

		expect(lines).toHaveLength(1);
		const record = JSON.parse(lines[0] ?? "");
		expect(record).toMatchObject({
			level: "info",
			service: "beacon-metrics",
			message: "Metrics response",
			status: 200,
		});
		expect(typeof record.timestamp).toBe("string");
	});

	it("filters records below the minimum level", () => {
		const write = vi.fn();
		const logger = createJsonLogger({ level: "warn", write });

		logger.debug("d");
		logger.info("i");
		logger.warn("w");
		logger.error("e");

		expect(write).toHaveBeenCalledTimes(2);
		expect(write.mock.calls.map((call) => call[1])).toEqual(["warn", "error"]);
	});

	it("redacts the server UUID by default", () => {
		const lines: string[] = [];
		const logger = createJsonLogger({ write: (line) => lines.push(line) });

		logger.info("loaded", { serverUuid: "00000000-0000-4000-8000-000000000000" });

		expect(JSON.parse(lines[0] ?? "").serverUuid).toBe("[REDACTED]");
	});

	it("does not throw on circular data", () => {
		const lines: string[] = [];
		const logger = createJsonLogger({ write: (line) => lines.push(line) });
		const data: Record<string, unknown> = { name: "loop" };
		data.self = data;

		expect(() => logger.warn("circular", data)).not.toThrow();
		expect(JSON.parse(lines[0] ?? "").self).toBe("[Circular]");
	});
});

describe("createConsoleLogger", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("routes warnings to console.warn as a single line", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		const logger = createConsoleLogger({ prefix: "MyPlugin", timestamps: false });

		logger.warn("Failed to collect chart", { chartId: "players", error: "supplier failed" });

		expect(warn).toHaveBeenCalledTimes(1);
		expect(warn.mock.calls[0]).toHaveLength(1);
		expect(String(warn.mock.calls[0]?.[0])).toContain(
			'[MyPlugin] Failed to collect chart chartId=players error="supplier failed"',
		);
	});

	it("uses the Metrics prefix and omits empty data", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		createConsoleLogger({ timestamps: false }).info("hello", {});

		expect(log.mock.calls[0]).toHaveLength(1);
		expect(String(log.mock.calls[0]?.[0]).endsWith("[Metrics] hello")).toBe(true);
	});

	it("masks the server UUID in fields", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		createConsoleLogger({ timestamps: false }).info("loaded", {
			serverUuid: "00000000-0000-4000-8000-000000000000",
		});

		expect(String(log.mock.calls[0]?.[0])).toContain("[Metrics] loaded serverUuid=[REDACTED]");
	});

	it("skips debug output at the default level", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		createConsoleLogger().debug("hidden");

		expect(log).not.toHaveBeenCalled();
	});
});

describe("redactData", () => {
	it("returns the same object when nothing matches", () => {
		const data = { chartId: "x" };
		expect(redactData(data, buildRedactKeys())).toBe(data);
	});

	it("adds caller keys to the defaults and ignores case", () => {
		const keys = buildRedactKeys(["body"]);
		expect(redactData({ BODY: "{}", serverUUID: "u", status: 200 }, keys)).toEqual({
			BODY: "[REDACTED]",
			serverUUID: "[REDACTED]",
			status: 200,
		});
	});

	it("masks the server UUID inside logged payload text", () => {
		const data = { payload: '{"serverUUID":"00000000-0000-4000-8000-000000000000","service":{"id":7}}' };
		expect(redactData(data, buildRedactKeys())).toEqual({
			payload: '{"serverUUID":"[REDACTED]","service":{"id":7}}',
		});
	});

	it("leaves the caller's object untouched", () => {
		const data = { token: "test-token" };
		expect(redactData(data, buildRedactKeys())).toEqual({ token: "[REDACTED]" });
		expect(data.token).toBe("test-token");
	});
});

describe("formatField", () => {
	it("writes bare values without quotes", () => {
		expect(formatField("chartId", "players")).toBe("chartId=players");
		expect(formatField("status", 200)).toBe("status=200");
	});

	it("quotes strings that contain spaces or are empty", () => {
		expect(formatField("statusText", "Too Many Requests")).toBe('statusText="Too Many Requests"');
		expect(formatField("value", "")).toBe('value=""');
	});

	it("serializes objects with stable key order", () => {
		expect(formatField("data", { b: 1, a: [true] })).toBe('data={"a":[true],"b":1}');
	});
});

describe("errorDetails", () => {
	it("flattens errors with code and cause", () => {
		const error = Object.assign(new Error("boom", { cause: new Error("root") }), {
			code: "ECONNRESET",
		});
		expect(errorDetails(error)).toEqual({ error: "boom", code: "ECONNRESET", cause: "root" });
	});

	it("stringifies non-errors", () => {
		expect(errorDetails("nope")).toEqual({ error: "nope" });
	});
});
