import {
	createJsonLogger,
	createMetricsServiceFromStore,
	customChart,
	simpleChart,
} from "beacon-metrics";

// A toy game server standing in for a real host.
const server = {
	version: "1.20.4",
	players: new Set(["alice", "bob", "carol"]),
	worlds: new Map([
		["overworld", 42],
		["nether", 7],
	]),
	onlineMode: true,
};

async function main() {
	const logger = createJsonLogger({ level: "debug" });

	// Reads <dataDir>/metrics/config.json, generating the server id on first run.
	// Set BEACON_METRICS_HOME to keep the example away from your real config.
	const metrics = createMetricsServiceFromStore({
		serviceId: 1234,
		// A local collector by default; point this at your own deployment.
		endpoint: process.env.BEACON_METRICS_ENDPOINT ?? "http://localhost:8080/api/v2/data",
		host: {
			pluginVersion: "0.1.0",
			platformVersion: server.version,
			platformName: "ExampleServer",
			playerCount: () => server.players.size,
			onlineMode: () => server.onlineMode,
		},
		logger,
	});

	metrics.registerChart(simpleChart("storageBackend", () => "memory"));
	metrics.registerChart(
		customChart("loadedChunks", () => Object.fromEntries(server.worlds)),
	);
	// Returning undefined leaves the chart out of this cycle
	metrics.registerChart(simpleChart("motd", () => undefined));

	console.log("Payload for the next cycle:");
	const payload = await metrics.buildPayload();
	console.log(JSON.stringify(JSON.parse(payload.toJson()), null, 2));

	if (process.argv.includes("--send")) {
		console.log("\nSending one cycle now...");
		await metrics.runCycle();
		await metrics.idle();
	}

	metrics.shutdown();
}

main().catch((error) => {
	console.error(error);
	process.exit(1);
});
