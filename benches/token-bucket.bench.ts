import { bench, describe } from "vitest";
import { TokenBucket } from "../src/rate-limit/token-bucket.js";
import { FakeClock } from "../src/shared/time.js";

describe("token bucket", () => {
	const clock = new FakeClock(0);
	const bucket = new TokenBucket({ capacity: 10, refillRate: 50, clock });

	bench("tryAcquire + refill 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			clock.advance(20);
			bucket.tryAcquire();
		}
	});

	bench("acquire with shortfall 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			clock.advance(1);
			bucket.acquire(2);
		}
		clock.advance(60_000);
	});
});
