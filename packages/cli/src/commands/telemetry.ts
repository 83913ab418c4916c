import * as p from "@clack/prompts";
import {
	getConfigPath,
	isDisabledByEnv,
	isTelemetryEnabled,
	setTelemetryEnabled,
} from "beacon-metrics";
import { Command } from "commander";
import pc from "picocolors";
import { storeOptions } from "../utils/store-options.js";

export function createTelemetryCommand(): Command {
	return new Command("telemetry")
		.description("Manage anonymous usage metrics")
		.argument("[action]", "on | off | status")
		.action((action: string | undefined, _options: unknown, command: Command) => {
			const store = storeOptions(command);

			p.intro(pc.bgCyan(pc.black(" beacon telemetry ")));

			switch (action) {
				case "on":
					setTelemetryEnabled(true, store);
					p.log.success(pc.green("Metrics enabled."));
					p.note(
						[
							"Hosts using beacon-metrics report anonymous usage data every 30 minutes.",
							"",
							`${pc.bold("What is collected:")}`,
							`  - A random server id ${pc.dim("(reset with beacon reset-id)")}`,
							`  - Host and plugin versions`,
							`  - OS name, Node.js version and core count`,
							`  - Charts registered by the plugin ${pc.dim("(e.g. player count)")}`,
							"",
							`${pc.bold("What is NOT collected:")}`,
							`  - IP-derived identifiers, hostnames or user names`,
							`  - Secrets, credentials or file contents`,
						].join("\n"),
						"Metrics info",
					);
					if (isDisabledByEnv()) {
						p.log.warning(
							`DO_NOT_TRACK or BEACON_METRICS_DISABLED is set; metrics stay off in this environment.`,
						);
					}
					break;

				case "off":
					setTelemetryEnabled(false, store);
					p.log.info(pc.dim("Metrics disabled. Running hosts stop at their next cycle."));
					break;

				case "status":
				case undefined: {
					if (isTelemetryEnabled(store)) {
						p.log.success(`Metrics: ${pc.green("enabled")}`);
					} else if (isDisabledByEnv()) {
						p.log.info(`Metrics: ${pc.dim("disabled by environment")}`);
					} else {
						p.log.info(`Metrics: ${pc.dim("disabled")}`);
					}
					p.log.info(pc.dim(`Config: ${getConfigPath(store)}`));
					p.log.info(
						pc.dim(
							`Run ${pc.cyan("beacon telemetry on")} or ${pc.cyan("beacon telemetry off")} to change.`,
						),
					);
					break;
				}

				default:
					p.log.error(`Unknown action: ${pc.bold(action)}. Use "on", "off", or "status".`);
					process.exitCode = 1;
			}

			p.outro(pc.dim("beacon telemetry"));
		});
}
