import * as p from "@clack/prompts";
import { resetServerUuid } from "beacon-metrics";
import { Command } from "commander";
import pc from "picocolors";
import { storeOptions } from "../utils/store-options.js";

export function createResetIdCommand(): Command {
	return new Command("reset-id")
		.description("Replace the anonymous server id with a new one")
		.option("-y, --yes", "Skip the confirmation prompt")
		.action(async (options: { yes?: boolean }, command: Command) => {
			const store = storeOptions(command);

			p.intro(pc.bgCyan(pc.black(" beacon reset-id ")));

			if (!options.yes) {
				const confirmed = await p.confirm({
					message: "The collector will count this server as a new installation. Continue?",
					initialValue: false,
				});
				if (p.isCancel(confirmed) || !confirmed) {
					p.cancel("Server id unchanged.");
					return;
				}
			}

			const serverUuid = resetServerUuid(store);
			p.log.success(`New server id: ${pc.cyan(serverUuid)}`);
			p.outro(pc.dim("Running hosts pick up the new id after a restart."));
		});
}
