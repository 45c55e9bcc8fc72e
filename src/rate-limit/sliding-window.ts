import { ConfigError } from "../shared/errors.js";
import type { Clock } from "../shared/time.js";

export interface SlidingWindowConfig {
	readonly windowMs: number;
	readonly clock: Clock;
}

/**
 * Counts requests inside a trailing time window.
 *
 * An entry leaves the window once it is `windowMs` old. Expired entries are
 * evicted before any count is reported.
 */
export class SlidingWindowCounter {
	private readonly windowMs: number;
	private readonly clock: Clock;
	private readonly timestamps: number[] = [];

	constructor(config: SlidingWindowConfig) {
		if (config.windowMs <= 0) {
			throw new ConfigError("windowMs must be > 0", { windowMs: config.windowMs });
		}
		this.windowMs = config.windowMs;
		this.clock = config.clock;
	}

	/** Records a request now; returns the count including it. */
	addRequest(): number {
		const now = this.clock.now();
		this.evict(now);
		this.timestamps.push(now);
		return this.timestamps.length;
	}

	getCount(): number {
		this.evict(this.clock.now());
		return this.timestamps.length;
	}

	/** Time until the oldest retained request leaves the window; 0 when empty. */
	msUntilNextSlot(): number {
		const now = this.clock.now();
		this.evict(now);
		const oldest = this.timestamps[0];
		if (oldest === undefined) return 0;
		return oldest + this.windowMs - now;
	}

	reset(): void {
		this.timestamps.length = 0;
	}

	private evict(now: number): void {
		let expired = 0;
		for (const ts of this.timestamps) {
			if (now - ts < this.windowMs) break;
			expired++;
		}
		if (expired > 0) this.timestamps.splice(0, expired);
	}
}
