/**
 * Connection Events Example
 *
 * Wires a ConnectionMonitor directly, without a session:
 * - Logs every state transition and heartbeat latency
 * - Lets reconnection exhaust against a gateway that refuses connections
 * - Restarts the monitor once the gateway is back
 */

import {
	ConnectionMonitor,
	type GatewayConnection,
	classifyError,
	createLogger,
	recoveryStrategy,
} from "../src/index.js";

let gatewayUp = true;

const monitor = new ConnectionMonitor<GatewayConnection>({
	factory: () => {
		if (!gatewayUp) {
			throw Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
		}
		let open = true;
		return {
			ping: async () => {
				if (!open) throw new Error("socket closed");
			},
			disconnect: () => {
				open = false;
			},
			isConnected: () => open && gatewayUp,
		};
	},
	settings: { heartbeatIntervalMs: 1_000, maxReconnectAttempts: 3, reconnectDelayMs: 100 },
	logger: createLogger({ level: "warn", name: "events-demo" }),
});

monitor.on("stateChange", (from, to, transition) => {
	console.log(`${from} -> ${to} (${transition})`);
});
monitor.on("heartbeat", (latencyMs) => {
	console.log(`  heartbeat ${latencyMs}ms`);
});
monitor.onError((error) => {
	const recovery = recoveryStrategy(classifyError(error));
	console.log(`  ${error.message}; suggested action: ${recovery.action}`);
});

async function main() {
	await monitor.start();
	await new Promise((resolve) => setTimeout(resolve, 1_500));

	console.log("\nGateway goes down:");
	gatewayUp = false;
	await new Promise((resolve) => setTimeout(resolve, 3_000));

	console.log("\nGateway is back, restarting:");
	gatewayUp = true;
	await monitor.start();
	await new Promise((resolve) => setTimeout(resolve, 1_200));

	console.log(`\nReconnects: ${monitor.health().reconnectCount}, errors: ${monitor.health().errorCount}`);
	await monitor.stop();
}

main().catch((err) => {
	console.error("Error:", err);
	process.exit(1);
});
