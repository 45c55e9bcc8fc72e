import { describe, expect, it } from "vitest";
import { ConfigError } from "../shared/errors.js";
import { FakeClock } from "../shared/time.js";
import { TokenBucket } from "./token-bucket.js";

describe("TokenBucket", () => {
	function createBucket(capacity = 5, refillRate = 1) {
		const clock = new FakeClock(1000);
		const bucket = new TokenBucket({ capacity, refillRate, clock });
		return { bucket, clock };
	}

	it("starts with full capacity", () => {
		const { bucket } = createBucket(5);
		expect(bucket.availableTokens()).toBe(5);
	});

	it("tryAcquire grants whole requests or nothing", () => {
		const { bucket, clock } = createBucket(20, 10);
		expect(bucket.tryAcquire(10)).toBe(true);
		expect(bucket.tryAcquire(15)).toBe(false);
		expect(bucket.availableTokens()).toBe(10);

		clock.advance(1000);
		expect(bucket.tryAcquire(10)).toBe(true);
		expect(bucket.availableTokens()).toBe(10);
	});

	it("tryAcquire never reserves", () => {
		const { bucket } = createBucket(3);
		expect(bucket.tryAcquire()).toBe(true);
		expect(bucket.tryAcquire()).toBe(true);
		expect(bucket.tryAcquire()).toBe(true);
		expect(bucket.tryAcquire()).toBe(false);
		expect(bucket.availableTokens()).toBe(0);
	});

	it("acquire grants without waiting while tokens last", () => {
		const { bucket } = createBucket(10, 50);
		for (let i = 0; i < 10; i++) {
			expect(bucket.acquire()).toBe(0);
		}
	});

	it("acquire reports the deficit wait and commits it", () => {
		const { bucket } = createBucket(10, 50);
		for (let i = 0; i < 10; i++) bucket.acquire();

		expect(bucket.acquire()).toBe(20);
		expect(bucket.availableTokens()).toBe(-1);
		// the next caller queues behind the reservation
		expect(bucket.acquire()).toBe(40);
	});

	it("acquire of several tokens waits for all of them", () => {
		const { bucket } = createBucket(5, 2);
		expect(bucket.acquire(8)).toBe(1_500);
		expect(bucket.availableTokens()).toBe(-3);
	});

	it("reservations are paid back by refill", () => {
		const { bucket, clock } = createBucket(10, 50);
		for (let i = 0; i < 12; i++) bucket.acquire();
		expect(bucket.availableTokens()).toBe(-2);

		clock.advance(40);
		expect(bucket.availableTokens()).toBe(0);
		expect(bucket.timeUntilAvailableMs()).toBe(20);
	});

	it("refill does not exceed capacity", () => {
		const { bucket, clock } = createBucket(5, 10);
		for (let i = 0; i < 5; i++) bucket.tryAcquire();

		clock.advance(10_000);
		expect(bucket.availableTokens()).toBe(5);
	});

	it("refills fractionally", () => {
		const { bucket, clock } = createBucket(5, 1);
		for (let i = 0; i < 5; i++) bucket.tryAcquire();

		clock.advance(2500);
		expect(bucket.availableTokens()).toBe(2.5);
		expect(bucket.canAcquire(3)).toBe(false);
		expect(bucket.canAcquire(2)).toBe(true);
	});

	it("ignores a clock that moves backwards", () => {
		const { bucket, clock } = createBucket(5, 1);
		bucket.tryAcquire(5);
		clock.set(0);
		expect(bucket.availableTokens()).toBe(0);
	});

	it("rejects capacity < 1", () => {
		const clock = new FakeClock(1000);
		expect(() => new TokenBucket({ capacity: 0, refillRate: 1, clock })).toThrow(
			"capacity must be >= 1",
		);
	});

	it("rejects a non-positive refill rate", () => {
		const clock = new FakeClock(1000);
		expect(() => new TokenBucket({ capacity: 5, refillRate: 0, clock })).toThrow(ConfigError);
	});
});
