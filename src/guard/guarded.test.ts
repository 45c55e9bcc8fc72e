import { describe, expect, it, vi } from "vitest";
import { type FakeSession, createMonitor } from "../connection/monitor-test-helpers.js";
import { OperationClass, RateLimiter } from "../rate-limit/rate-limiter.js";
import { CancelledError, ConnectionLostError, RateLimitError } from "../shared/errors.js";
import { FakeClock, type Sleep } from "../shared/time.js";
import { guarded } from "./guarded.js";

function errno(code: string): Error {
	return Object.assign(new Error(`write ${code}`), { code });
}

function setup() {
	const { monitor, factory, sessions } = createMonitor();
	const clock = new FakeClock(0);
	const limiterSleep = vi.fn<Sleep>(async (ms) => {
		clock.advance(ms);
	});
	const limiter = new RateLimiter({
		settings: { maxRequestsPerSecond: 10, burstSize: 1 },
		clock,
		sleep: limiterSleep,
	});
	const retrySleep = vi.fn<Sleep>(async () => {});
	return { monitor, factory, sessions, limiter, limiterSleep, retrySleep };
}

describe("guarded", () => {
	it("throttles and then runs the call on the live session", async () => {
		const { monitor, sessions, limiter, limiterSleep } = setup();
		await monitor.start();

		const first = await guarded({ monitor, limiter }, (session: FakeSession) => session.connects);
		const second = await guarded({ monitor, limiter }, () => "second");

		expect(first).toBe(1);
		expect(second).toBe("second");
		expect(sessions).toHaveLength(1);
		expect(limiterSleep.mock.calls.map(([ms]) => ms)).toEqual([100]);
		expect(limiter.getStats().acceptedRequests).toBe(2);
	});

	it("acquires again for every retry attempt", async () => {
		const { monitor, limiter, retrySleep } = setup();
		await monitor.start();
		const operation = vi
			.fn<() => Promise<string>>()
			.mockRejectedValueOnce(errno("EPIPE"))
			.mockResolvedValueOnce("done");

		const result = await guarded({ monitor, limiter }, operation, {
			retry: { sleep: retrySleep, baseDelayMs: 50 },
		});

		expect(result).toBe("done");
		expect(operation).toHaveBeenCalledTimes(2);
		expect(retrySleep.mock.calls.map(([ms]) => ms)).toEqual([50]);
		expect(limiter.getStats().totalRequests).toBe(2);
	});

	it("does not retry a rate-limit rejection", async () => {
		const { monitor, limiter, retrySleep } = setup();
		await monitor.start();
		limiter.handleRateLimitError("pacing");
		const operation = vi.fn();

		await expect(
			guarded({ monitor, limiter }, operation, { retry: { sleep: retrySleep } }),
		).rejects.toBeInstanceOf(RateLimitError);
		expect(operation).not.toHaveBeenCalled();
		expect(retrySleep).not.toHaveBeenCalled();
	});

	it("feeds a gateway pacing violation into the limiter backoff", async () => {
		const { monitor, limiter } = setup();
		await monitor.start();
		const violation = Object.assign(new Error("Max rate of messages per second has been exceeded"), {
			code: 100,
		});

		await expect(
			guarded({ monitor, limiter }, () => Promise.reject(violation), {
				operation: OperationClass.Order,
			}),
		).rejects.toBe(violation);
		expect(limiter.inBackoff).toBe(true);
	});

	it("leaves the backoff alone when a local subscription ceiling rejects the call", async () => {
		const { monitor, retrySleep } = setup();
		await monitor.start();
		const limiter = new RateLimiter({
			settings: { maxMarketDataLines: 1 },
			clock: new FakeClock(0),
			sleep: async () => {},
		});
		limiter.addSubscription("AAPL");

		await expect(
			guarded({ monitor, limiter }, () => limiter.addSubscription("MSFT"), {
				retry: { sleep: retrySleep },
			}),
		).rejects.toMatchObject({ limitType: "market_data_subscriptions", retryAfterMs: 0 });

		expect(limiter.inBackoff).toBe(false);
		expect(limiter.getStats().consecutiveErrors).toBe(0);
		await expect(limiter.acquire(OperationClass.Order)).resolves.toBeUndefined();
		expect(retrySleep).not.toHaveBeenCalled();
	});

	it("fails fast once the monitor has shut down", async () => {
		const { monitor, limiter } = setup();
		await monitor.start();
		await monitor.stop();

		await expect(guarded({ monitor, limiter }, () => "never")).rejects.toThrow(
			new ConnectionLostError("Connection monitor is shut down"),
		);
		expect(limiter.getStats().totalRequests).toBe(0);
	});

	it("passes the signal to the rate-limit wait", async () => {
		const { monitor } = setup();
		await monitor.start();
		const limiter = new RateLimiter({
			settings: { maxRequestsPerSecond: 1, burstSize: 1 },
			clock: new FakeClock(0),
		});
		await guarded({ monitor, limiter }, () => "first");

		const controller = new AbortController();
		const pending = guarded({ monitor, limiter }, () => "second", { signal: controller.signal });
		controller.abort();

		await expect(pending).rejects.toBeInstanceOf(CancelledError);
	});
});
