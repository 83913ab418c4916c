import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { Command } from "commander";
import pc from "picocolors";
import { createInfoCommand } from "./commands/info.js";
import { createResetIdCommand } from "./commands/reset-id.js";
import { createTelemetryCommand } from "./commands/telemetry.js";

export function createProgram(version: string): Command {
	const banner = `
  ${pc.bold(pc.cyan("beacon"))} ${pc.dim(`v${version}`)}
  ${pc.dim("Opt-in anonymous usage metrics")}
`;

	const program = new Command()
		.name("beacon")
		.description("Manage the beacon-metrics opt-in and server identity")
		.version(version, "-v, --version")
		.option("--data-dir <dir>", "Metrics data directory (or set BEACON_METRICS_HOME)");

	program.action(() => {
		console.log(banner);
		program.help();
	});

	program.addCommand(createTelemetryCommand());
	program.addCommand(createInfoCommand());
	program.addCommand(createResetIdCommand());

	return program;
}

/** Strip anything that looks like a credential before printing an error. */
export function sanitizeErrorMessage(message: string): string {
	return message.replace(/(password|token|secret|key)[=:]\s*\S+/gi, "$1=***");
}

const FALLBACK_VERSION = "0.0.0";

/** Version from the package.json one directory above `entryDir`. */
export function readCliVersion(entryDir: string): string {
	try {
		const pkg = JSON.parse(readFileSync(resolve(entryDir, "../package.json"), "utf-8"));
		return typeof pkg.version === "string" ? pkg.version : FALLBACK_VERSION;
	} catch {
		return FALLBACK_VERSION;
	}
}
