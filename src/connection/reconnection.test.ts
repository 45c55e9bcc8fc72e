import { describe, expect, it } from "vitest";
import { ReconnectionPolicy } from "./reconnection.js";

describe("ReconnectionPolicy", () => {
	function createPolicy(baseDelayMs = 100, maxAttempts = 5, maxDelayMs?: number) {
		return new ReconnectionPolicy(
			maxDelayMs === undefined ? { baseDelayMs, maxAttempts } : { baseDelayMs, maxAttempts, maxDelayMs },
		);
	}

	it("returns baseDelay on first call", () => {
		const policy = createPolicy();
		expect(policy.nextDelay()).toBe(100);
	});

	it("doubles delay on subsequent calls", () => {
		const policy = createPolicy();
		policy.nextDelay(); // 100
		expect(policy.nextDelay()).toBe(200);
		expect(policy.nextDelay()).toBe(400);
		expect(policy.nextDelay()).toBe(800);
	});

	it("matches the gateway defaults of 5s doubling", () => {
		const policy = createPolicy(5_000, 5);
		const delays: number[] = [];
		while (policy.shouldRetry()) delays.push(policy.nextDelay());
		expect(delays).toEqual([5_000, 10_000, 20_000, 40_000, 80_000]);
	});

	it("caps delay at maxDelay when given", () => {
		const policy = createPolicy(100, 5, 300);
		policy.nextDelay(); // 100
		policy.nextDelay(); // 200
		expect(policy.nextDelay()).toBe(300);
		expect(policy.nextDelay()).toBe(300);
	});

	it("returns zero delays for a zero base", () => {
		const policy = createPolicy(0, 3);
		expect([policy.nextDelay(), policy.nextDelay()]).toEqual([0, 0]);
	});

	it("resets delay back to base", () => {
		const policy = createPolicy();
		policy.nextDelay();
		policy.nextDelay();
		policy.reset();
		expect(policy.attempt()).toBe(0);
		expect(policy.nextDelay()).toBe(100);
	});

	it("shouldRetry returns false after maxAttempts", () => {
		const policy = createPolicy(100, 3);
		expect(policy.shouldRetry()).toBe(true);
		policy.nextDelay();
		expect(policy.shouldRetry()).toBe(true);
		policy.nextDelay();
		expect(policy.shouldRetry()).toBe(true);
		policy.nextDelay();
		expect(policy.shouldRetry()).toBe(false);
		expect(policy.attempt()).toBe(3);
	});
});
