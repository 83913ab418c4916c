import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Workspace packages export their built `dist/` by default; tests run on sources.
const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
	resolve: {
		alias: [
			{ find: /^@beacon-metrics\/core$/, replacement: source("./packages/core/src/index.ts") },
			{ find: /^beacon-metrics$/, replacement: source("./packages/beacon/src/index.ts") },
		],
	},
	test: {
		globals: true,
		environment: "node",
		include: ["packages/*/src/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "lcov", "json-summary"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "**/*.test.ts"],
			thresholds: {
				lines: 80,
				branches: 75,
				functions: 80,
				statements: 80,
			},
		},
	},
});
