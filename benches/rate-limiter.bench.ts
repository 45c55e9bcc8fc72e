import { bench, describe } from "vitest";
import { OperationClass, RateLimiter } from "../src/rate-limit/rate-limiter.js";
import { FakeClock } from "../src/shared/time.js";

describe("rate limiter", () => {
	const clock = new FakeClock(0);
	const limiter = new RateLimiter({
		settings: { maxRequestsPerSecond: 100, burstSize: 100 },
		clock,
		sleep: async (ms) => {
			clock.advance(ms);
		},
	});

	bench("tryAcquire general 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			clock.advance(10);
			limiter.tryAcquire();
		}
	});

	bench("acquire order 100x", async () => {
		for (let i = 0; i < 100; i++) {
			await limiter.acquire(OperationClass.Order);
		}
	});

	bench("getStats 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			limiter.getStats();
		}
	});
});
