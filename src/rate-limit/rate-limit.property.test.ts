import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { FakeClock } from "../shared/time.js";
import { SlidingWindowCounter } from "./sliding-window.js";
import { TokenBucket } from "./token-bucket.js";

const step = fc.record({
	advanceMs: fc.integer({ min: 0, max: 2_000 }),
	tokens: fc.integer({ min: 1, max: 5 }),
	reserve: fc.boolean(),
});

describe("TokenBucket properties", () => {
	it("never holds more than its capacity", () => {
		fc.assert(
			fc.property(
				fc.integer({ min: 1, max: 50 }),
				fc.integer({ min: 1, max: 100 }),
				fc.array(step, { maxLength: 60 }),
				(capacity, rate, steps) => {
					const clock = new FakeClock(0);
					const bucket = new TokenBucket({ capacity, refillRate: rate, clock });
					for (const s of steps) {
						clock.advance(s.advanceMs);
						if (s.reserve) bucket.acquire(s.tokens);
						else bucket.tryAcquire(s.tokens);
						expect(bucket.availableTokens()).toBeLessThanOrEqual(capacity);
					}
				},
			),
		);
	});

	it("tryAcquire never drives the balance negative", () => {
		fc.assert(
			fc.property(fc.array(step, { maxLength: 60 }), (steps) => {
				const clock = new FakeClock(0);
				const bucket = new TokenBucket({ capacity: 10, refillRate: 5, clock });
				for (const s of steps) {
					clock.advance(s.advanceMs);
					bucket.tryAcquire(s.tokens);
					expect(bucket.availableTokens()).toBeGreaterThanOrEqual(0);
				}
			}),
		);
	});

	it("the reported wait is exactly enough to cover the reservation", () => {
		fc.assert(
			fc.property(
				fc.integer({ min: 1, max: 20 }),
				fc.integer({ min: 1, max: 20 }),
				(rate, demand) => {
					const clock = new FakeClock(0);
					const bucket = new TokenBucket({ capacity: 1, refillRate: rate, clock });
					const waitMs = bucket.acquire(demand);
					clock.advance(waitMs);
					expect(bucket.availableTokens()).toBeCloseTo(0, 9);
				},
			),
		);
	});
});

describe("SlidingWindowCounter properties", () => {
	it("only ever counts requests younger than the window", () => {
		fc.assert(
			fc.property(
				fc.integer({ min: 1, max: 1_000 }),
				fc.array(fc.integer({ min: 0, max: 500 }), { maxLength: 80 }),
				(windowMs, gaps) => {
					const clock = new FakeClock(0);
					const counter = new SlidingWindowCounter({ windowMs, clock });
					const added: number[] = [];
					for (const gap of gaps) {
						clock.advance(gap);
						counter.addRequest();
						added.push(clock.now());
						const live = added.filter((ts) => clock.now() - ts < windowMs).length;
						expect(counter.getCount()).toBe(live);
					}
				},
			),
		);
	});
});
