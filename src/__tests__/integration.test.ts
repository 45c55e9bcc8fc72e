import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FakeSession } from "../connection/monitor-test-helpers.js";
import { ConnectionState } from "../connection/types.js";
import { silentLogger } from "../lib/logger/index.js";
import { OperationClass } from "../rate-limit/rate-limiter.js";
import { GatewaySession } from "../session/gateway-session.js";
import { loadGatewayConfig } from "../shared/config.js";
import { ConnectionLostError, RateLimitError } from "../shared/errors.js";
import { unwrap } from "../shared/result.js";

/** Fake brokerage session with one request method. */
class QuoteGateway extends FakeSession {
	quotes = 0;
	failNext: Error | null = null;

	quote(symbol: string): Promise<{ symbol: string; last: number }> {
		if (!this.connected) return Promise.reject(new Error("Not connected"));
		if (this.failNext) {
			const error = this.failNext;
			this.failNext = null;
			return Promise.reject(error);
		}
		this.quotes++;
		return Promise.resolve({ symbol, last: 101.5 });
	}
}

describe("gateway session end to end", () => {
	const settle = () => vi.advanceTimersByTimeAsync(0);
	let gateways: QuoteGateway[] = [];
	let refuseConnections = false;
	let session: GatewaySession<QuoteGateway>;

	beforeEach(() => {
		vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
		gateways = [];
		refuseConnections = false;
		const config = unwrap(
			loadGatewayConfig(
				{
					logLevel: "silent",
					connection: {
						heartbeatIntervalMs: 1_000,
						maxReconnectAttempts: 2,
						reconnectDelayMs: 100,
					},
					retry: { maxRetries: 3, baseDelayMs: 50 },
				},
				{},
			),
		);
		session = new GatewaySession({
			factory: () => {
				if (refuseConnections) {
					throw Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
				}
				const gateway = new QuoteGateway();
				gateways.push(gateway);
				return gateway;
			},
			config,
			logger: silentLogger(),
		});
	});

	afterEach(async () => {
		await session.stop();
		vi.useRealTimers();
	});

	it("serves guarded calls from the live session", async () => {
		await session.start();
		await settle();

		const quote = await session.guarded((ib) => ib.quote("AAPL"));

		expect(quote).toEqual({ symbol: "AAPL", last: 101.5 });
		expect(session.health()).toMatchObject({
			name: "gateway",
			healthy: true,
			connection: { state: "connected", messagesSent: 1, messagesReceived: 1 },
			rateLimit: { totalRequests: 1, acceptedRequests: 1 },
		});
	});

	it("replaces a dropped session before the next call", async () => {
		await session.start();
		await settle();

		const dropped = gateways[0];
		if (dropped) dropped.connected = false;
		await vi.advanceTimersByTimeAsync(2_000);

		expect(session.monitor.state).toBe(ConnectionState.Connected);
		expect(gateways).toHaveLength(2);
		expect(dropped?.disconnects).toBe(1);

		await session.guarded((ib) => ib.quote("MSFT"));
		expect(gateways[1]?.quotes).toBe(1);
		expect(session.health().connection.reconnectCount).toBe(1);
	});

	it("retries a call that hit a socket reset", async () => {
		await session.start();
		await settle();
		const gateway = gateways[0];
		const reset = Object.assign(new Error("read ECONNRESET"), { code: "ECONNRESET" });
		if (gateway) gateway.failNext = reset;

		const pending = session.guarded((ib) => ib.quote("SPY"));
		await vi.advanceTimersByTimeAsync(50);

		await expect(pending).resolves.toEqual({ symbol: "SPY", last: 101.5 });
		expect(session.health().rateLimit.totalRequests).toBe(2);
	});

	it("backs off after a pacing violation and resumes once it elapses", async () => {
		await session.start();
		await settle();
		const gateway = gateways[0];
		const violation = Object.assign(new Error("Max rate of messages per second has been exceeded"), {
			code: 100,
		});
		if (gateway) gateway.failNext = violation;

		await expect(
			session.guarded((ib) => ib.quote("QQQ"), { operation: OperationClass.MarketData }),
		).rejects.toBe(violation);
		expect(session.health().healthy).toBe(false);
		await expect(session.guarded((ib) => ib.quote("QQQ"))).rejects.toBeInstanceOf(RateLimitError);

		await vi.advanceTimersByTimeAsync(200);
		await expect(session.guarded((ib) => ib.quote("QQQ"))).resolves.toEqual({
			symbol: "QQQ",
			last: 101.5,
		});
	});

	it("fails calls fast once reconnection is exhausted, until restarted", async () => {
		await session.start();
		await settle();

		refuseConnections = true;
		const dropped = gateways[0];
		if (dropped) dropped.connected = false;
		await vi.advanceTimersByTimeAsync(2_000);

		expect(session.monitor.state).toBe(ConnectionState.Error);
		expect(session.health().connection.lastError).toBe("Reconnection failed after 2 attempts");
		await expect(session.guarded((ib) => ib.quote("AAPL"))).rejects.toThrow(
			new ConnectionLostError("Gateway connection failed permanently; restart the monitor"),
		);

		refuseConnections = false;
		await session.start();
		await expect(session.guarded((ib) => ib.quote("AAPL"))).resolves.toMatchObject({ symbol: "AAPL" });
	});
});
