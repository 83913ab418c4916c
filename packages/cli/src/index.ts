#!/usr/bin/env node
import "dotenv/config";
import { dirname } from "node:path";
import { fileURLToPath } from "node:url";
import pc from "picocolors";
import { createProgram, readCliVersion, sanitizeErrorMessage } from "./program.js";

// Graceful shutdown
process.on("SIGINT", () => process.exit(0));
process.on("SIGTERM", () => process.exit(0));

// Both src/ (under tsx) and dist/ sit one level below package.json
const cliVersion = readCliVersion(dirname(fileURLToPath(import.meta.url)));

const CLEAN_EXIT_CODES = new Set(["commander.help", "commander.helpDisplayed", "commander.version"]);

const program = createProgram(cliVersion);
program.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		if (CLEAN_EXIT_CODES.has(error.code)) process.exit(0);
	}
	const message = error instanceof Error ? error.message : String(error);
	console.error(pc.red(sanitizeErrorMessage(message)));
	process.exit(1);
}
