import { ConfigError } from "../shared/errors.js";
import type { Clock } from "../shared/time.js";

/**
 * Configuration for TokenBucket.
 */
export interface TokenBucketConfig {
	readonly capacity: number;
	/** Tokens added per second */
	readonly refillRate: number;
	readonly clock: Clock;
}

/**
 * Token bucket with lazy refill and an injectable clock.
 *
 * Tokens accumulate at `refillRate` tokens/second up to `capacity`; the refill
 * is computed from elapsed clock time on every access, never by a timer.
 * `acquire()` always succeeds and reports how long the caller must wait:
 * a shortfall is committed as a negative balance, which reserves the tokens
 * for that caller ahead of anyone who arrives later.
 */
export class TokenBucket {
	private readonly capacity: number;
	private readonly refillRate: number;
	private readonly clock: Clock;
	private tokens: number;
	private lastRefillMs: number;

	constructor(config: TokenBucketConfig) {
		if (config.capacity < 1) {
			throw new ConfigError("capacity must be >= 1", { capacity: config.capacity });
		}
		if (config.refillRate <= 0) {
			throw new ConfigError("refillRate must be > 0", { refillRate: config.refillRate });
		}
		this.capacity = config.capacity;
		this.refillRate = config.refillRate;
		this.clock = config.clock;
		this.tokens = config.capacity;
		this.lastRefillMs = this.clock.now();
	}

	/**
	 * Takes `n` tokens, reserving any shortfall.
	 * @returns milliseconds the caller must wait before the tokens are really there; 0 when granted now
	 */
	acquire(n = 1): number {
		this.refill();
		if (this.tokens >= n) {
			this.tokens -= n;
			return 0;
		}
		const waitMs = ((n - this.tokens) * 1000) / this.refillRate;
		this.tokens -= n;
		return waitMs;
	}

	/**
	 * Takes `n` tokens only if they are available now. Never goes negative.
	 * @example
	 * if (bucket.tryAcquire()) {
	 *   // proceed with request
	 * }
	 */
	tryAcquire(n = 1): boolean {
		if (!this.canAcquire(n)) return false;
		this.tokens -= n;
		return true;
	}

	/** Whether `n` tokens are available now, without taking them. */
	canAcquire(n = 1): boolean {
		this.refill();
		return this.tokens >= n;
	}

	/** Current balance after refill. Negative while reservations are outstanding. */
	availableTokens(): number {
		this.refill();
		return this.tokens;
	}

	/** Returns the time in milliseconds until `n` tokens are available; 0 if they are now. */
	timeUntilAvailableMs(n = 1): number {
		this.refill();
		if (this.tokens >= n) return 0;
		return ((n - this.tokens) * 1000) / this.refillRate;
	}

	private refill(): void {
		const now = this.clock.now();
		const elapsedMs = now - this.lastRefillMs;
		if (elapsedMs <= 0) return;

		const newTokens = (elapsedMs * this.refillRate) / 1000;
		this.tokens = Math.min(this.capacity, this.tokens + newTokens);
		this.lastRefillMs = now;
	}
}
