/**
 * Guarded Gateway Example
 *
 * Demonstrates one GatewaySession in front of a flaky in-memory gateway:
 * - Builds the session from defaults plus GATEWAY_* environment overrides
 * - Places paced orders and historical-data requests through guarded()
 * - Drops the socket halfway and lets the monitor replace it
 * - Prints the combined health report at the end
 */

import {
	type GatewayConnection,
	GatewaySession,
	OperationClass,
	RateLimitError,
	createLogger,
} from "../src/index.js";

class PaperGateway implements GatewayConnection {
	private open = false;
	private nextOrderId = 1;

	async connect(): Promise<void> {
		await new Promise((resolve) => setTimeout(resolve, 20));
		this.open = true;
	}

	disconnect(): void {
		this.open = false;
	}

	async ping(): Promise<void> {
		if (!this.open) throw new Error("socket closed");
	}

	isConnected(): boolean {
		return this.open;
	}

	drop(): void {
		this.open = false;
	}

	async placeOrder(symbol: string, quantity: number): Promise<number> {
		if (!this.open) throw new Error("Not connected");
		console.log(`  order ${this.nextOrderId}: BUY ${quantity} ${symbol}`);
		return this.nextOrderId++;
	}

	async historicalBars(symbol: string): Promise<number[]> {
		if (!this.open) throw new Error("Not connected");
		return Array.from({ length: 5 }, (_, i) => 100 + i + symbol.length);
	}
}

async function main() {
	const created = GatewaySession.create(
		() => new PaperGateway(),
		{
			name: "paper",
			connection: { heartbeatIntervalMs: 1_000, reconnectDelayMs: 200 },
			rateLimit: { maxOrdersPerSecond: 2, maxHistoricalRequests: 3 },
		},
		{ logger: createLogger({ level: "warn", name: "paper" }) },
	);
	if (!created.ok) {
		console.error(`Invalid configuration: ${created.error.describe()}`);
		process.exit(1);
	}
	const session = created.value;
	await session.start();

	console.log("Placing 6 orders at 2/s (bucket holds 4):");
	const started = Date.now();
	for (const symbol of ["AAPL", "MSFT", "SPY", "QQQ", "IWM", "TLT"]) {
		await session.guarded((ib) => ib.placeOrder(symbol, 10), { operation: OperationClass.Order });
	}
	console.log(`  took ${Date.now() - started}ms`);

	console.log("\nDropping the socket:");
	session.monitor.connection?.drop();
	await new Promise((resolve) => setTimeout(resolve, 1_500));
	console.log(`  state after recovery: ${session.monitor.state}`);

	console.log("\nHistorical data, 3 per window:");
	for (const symbol of ["AAPL", "MSFT", "SPY", "QQQ"]) {
		try {
			const bars = await session.guarded((ib) => ib.historicalBars(symbol), {
				operation: OperationClass.HistoricalData,
			});
			console.log(`  ${symbol}: ${bars.length} bars`);
		} catch (err) {
			if (!(err instanceof RateLimitError)) throw err;
			console.log(`  ${symbol}: rejected, retry in ${Math.ceil(err.retryAfterMs / 1000)}s`);
		}
	}

	const { connection, rateLimit, healthy } = session.health();
	console.log("\nHealth:");
	console.log(`  healthy=${healthy} state=${connection.state} reconnects=${connection.reconnectCount}`);
	console.log(
		`  requests=${rateLimit.totalRequests} accepted=${rateLimit.acceptedRequests} rejected=${rateLimit.rejectedRequests} avgDelay=${rateLimit.avgDelayMs.toFixed(0)}ms`,
	);

	await session.stop();
}

main().catch((err) => {
	console.error("Error:", err);
	process.exit(1);
});
