import { bench, describe } from "vitest";
import { SlidingWindowCounter } from "../src/rate-limit/sliding-window.js";
import { FakeClock } from "../src/shared/time.js";

describe("sliding window", () => {
	bench("addRequest + getCount over a full 10 minute window", () => {
		const clock = new FakeClock(0);
		const window = new SlidingWindowCounter({ windowMs: 600_000, clock });
		for (let i = 0; i < 1000; i++) {
			clock.advance(1_000);
			window.addRequest();
			window.getCount();
		}
	});
});
