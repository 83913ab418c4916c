import * as os from "node:os";
import * as p from "@clack/prompts";
import {
	detectRuntime,
	getConfigPath,
	isDisabledByEnv,
	isTelemetryEnabled,
	METRICS_VERSION,
	readConfigFile,
	USER_AGENT,
} from "beacon-metrics";
import { Command } from "commander";
import pc from "picocolors";
import { storeOptions } from "../utils/store-options.js";

// =============================================================================
// INFO COMMAND
// =============================================================================

export function createInfoCommand(): Command {
	return new Command("info")
		.description("Show the metrics config and the environment data a host would report")
		.option("--json", "Output as JSON")
		.action((options: { json?: boolean }, command: Command) => {
			const store = storeOptions(command);
			const version: string = command.parent?.version() ?? "unknown";
			const stored = readConfigFile(store);

			const info = {
				cli: { version },
				config: {
					path: getConfigPath(store),
					exists: stored !== null,
					enabled: isTelemetryEnabled(store),
					disabledByEnv: isDisabledByEnv(),
					serverUuid: stored?.serverUuid ?? null,
					logResponseStatusText: stored?.logResponseStatusText ?? false,
					logSentData: stored?.logSentData ?? false,
				},
				protocol: {
					metricsVersion: METRICS_VERSION,
					userAgent: USER_AGENT,
				},
				system: {
					runtime: detectRuntime(),
					osInfo: `${os.type()} ${os.release()}`,
					nodeVersion: process.versions.node,
					coreCount: os.cpus().length,
				},
			};

			if (options.json) {
				process.stdout.write(`${JSON.stringify(info, null, 2)}\n`);
				return;
			}

			p.intro(pc.bgCyan(pc.black(" beacon info ")));

			p.log.step(pc.bold("Config"));
			const configLines = [
				`${pc.bold("File:")}           ${info.config.path}${info.config.exists ? "" : pc.dim(" (not created yet)")}`,
				`${pc.bold("Metrics:")}        ${info.config.enabled ? pc.green("enabled") : pc.dim("disabled")}${info.config.disabledByEnv ? pc.dim(" (environment)") : ""}`,
				`${pc.bold("Server id:")}      ${info.config.serverUuid ?? pc.dim("not generated")}`,
				`${pc.bold("Log responses:")}  ${info.config.logResponseStatusText}`,
				`${pc.bold("Log payloads:")}   ${info.config.logSentData}`,
			];
			p.note(configLines.join("\n"), "Config");

			p.log.step(pc.bold("Reported environment"));
			const systemLines = [
				`${pc.bold("Runtime:")}        ${info.system.runtime} ${info.system.nodeVersion}`,
				`${pc.bold("OS:")}             ${info.system.osInfo}`,
				`${pc.bold("Cores:")}          ${info.system.coreCount}`,
				`${pc.bold("Protocol:")}       v${info.protocol.metricsVersion}`,
				`${pc.bold("User agent:")}     ${info.protocol.userAgent}`,
			];
			p.note(systemLines.join("\n"), "System");

			p.outro(pc.dim("Run with --json for machine-readable output"));
		});
}
