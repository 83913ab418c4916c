import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, relative } from "node:path";
import { fileURLToPath } from "node:url";
import { getConfigPath } from "beacon-metrics";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createProgram, readCliVersion, sanitizeErrorMessage } from "../program.js";

describe("beacon cli", () => {
	let dataDir: string;
	let output: string[];

	async function run(...args: string[]): Promise<string> {
		const program = createProgram("1.2.3").exitOverride();
		await program.parseAsync(["--data-dir", dataDir, ...args], { from: "user" });
		return output.join("");
	}

	function readStored(): Record<string, unknown> {
		return JSON.parse(readFileSync(getConfigPath({ dataDir }), "utf-8"));
	}

	beforeEach(() => {
		dataDir = mkdtempSync(join(tmpdir(), "beacon-cli-test-"));
		output = [];
		vi.spyOn(process.stdout, "write").mockImplementation((chunk: unknown) => {
			output.push(String(chunk));
			return true;
		});
		vi.stubEnv("DO_NOT_TRACK", "");
		vi.stubEnv("BEACON_METRICS_DISABLED", "");
	});

	afterEach(() => {
		vi.restoreAllMocks();
		vi.unstubAllEnvs();
		process.exitCode = undefined;
		rmSync(dataDir, { recursive: true, force: true });
	});

	describe("telemetry", () => {
		it("turns metrics off and on", async () => {
			await run("telemetry", "off");
			expect(readStored().enabled).toBe(false);

			await run("telemetry", "on");
			expect(readStored().enabled).toBe(true);
		});

		it("keeps the server id when toggling", async () => {
			await run("telemetry", "on");
			const { serverUuid } = readStored();

			await run("telemetry", "off");

			expect(readStored().serverUuid).toBe(serverUuid);
		});

		it("reports status without creating the config file", async () => {
			const text = await run("telemetry", "status");

			expect(text).toContain("enabled");
			expect(text).toContain(getConfigPath({ dataDir }));
			expect(existsSync(getConfigPath({ dataDir }))).toBe(false);
		});

		it("reports a disabled state", async () => {
			await run("telemetry", "off");
			output = [];

			const text = await run("telemetry");

			expect(text).toContain("disabled");
		});

		it("flags an unknown action", async () => {
			const text = await run("telemetry", "maybe");

			expect(text).toContain("Unknown action");
			expect(process.exitCode).toBe(1);
		});
	});

	describe("reset-id", () => {
		it("replaces the server id when confirmed with --yes", async () => {
			await run("telemetry", "on");
			const before = readStored().serverUuid;

			const text = await run("reset-id", "--yes");

			const after = readStored().serverUuid;
			expect(after).not.toBe(before);
			expect(text).toContain(String(after));
		});
	});

	describe("info", () => {
		it("prints machine-readable output with --json", async () => {
			const text = await run("info", "--json");
			const info = JSON.parse(text);

			expect(info.cli).toEqual({ version: "1.2.3" });
			expect(info.config).toEqual({
				path: getConfigPath({ dataDir }),
				exists: false,
				enabled: true,
				disabledByEnv: false,
				serverUuid: null,
				logResponseStatusText: false,
				logSentData: false,
			});
			expect(info.protocol).toEqual({ metricsVersion: "3.2.0", userAgent: "BeaconMetrics/3.2.0" });
			expect(info.system.nodeVersion).toBe(process.versions.node);
		});

		it("shows the stored server id", async () => {
			await run("telemetry", "on");
			const { serverUuid } = readStored();
			output = [];

			const info = JSON.parse(await run("info", "--json"));

			expect(info.config.exists).toBe(true);
			expect(info.config.serverUuid).toBe(serverUuid);
		});
	});

	describe("sanitizeErrorMessage", () => {
		it("masks credential-like values", () => {
			expect(sanitizeErrorMessage("request failed token=test-secret")).toBe(
				"request failed token=***",
			);
		});
	});

	describe("packaging", () => {
		const packageDir = fileURLToPath(new URL("../..", import.meta.url));

		function readJson(name: string): Record<string, unknown> & {
			version?: unknown;
			bin?: Record<string, string>;
			compilerOptions?: { rootDir?: string; outDir?: string };
		} {
			return JSON.parse(readFileSync(join(packageDir, name), "utf-8"));
		}

		it("points the bin at the file the build emits for src/index.ts", () => {
			const { compilerOptions = {} } = readJson("tsconfig.build.json");
			const emitted = join(
				compilerOptions.outDir ?? "",
				relative(compilerOptions.rootDir ?? "", "src/index.ts").replace(/\.ts$/, ".js"),
			);

			expect(readJson("package.json").bin?.beacon).toBe(`./${emitted}`);
		});

		it("reads the package version from both src/ and dist/", () => {
			const { version } = readJson("package.json");

			expect(readCliVersion(join(packageDir, "src"))).toBe(version);
			expect(readCliVersion(join(packageDir, "dist"))).toBe(version);
		});

		it("falls back when no package.json is found", () => {
			expect(readCliVersion(join(dataDir, "nested"))).toBe("0.0.0");
		});
	});
});
