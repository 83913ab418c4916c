import type { ConfigStoreOptions } from "beacon-metrics";
import type { Command } from "commander";

export interface GlobalOptions {
	dataDir?: string;
}

/** Config store location from the program-level `--data-dir` flag. */
export function storeOptions(command: Command): ConfigStoreOptions {
	const { dataDir } = command.optsWithGlobals<GlobalOptions>();
	return { dataDir };
}
