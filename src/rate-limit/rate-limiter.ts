/**
 * RateLimiter: throttles every outbound gateway call.
 *
 * Four operation classes share one general token bucket; orders also draw
 * from a dedicated order bucket, historical-data requests are capped per
 * sliding window and market-data calls by the number of active subscriptions.
 * Bucket shortfalls make the caller wait; fixed ceilings and an active
 * backoff reject immediately with RateLimitError.
 *
 * All bookkeeping is synchronous, so concurrent callers on the event loop
 * never interleave inside a reservation.
 */

import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { DEFAULT_RATE_LIMIT_SETTINGS, type RateLimitSettings } from "../shared/config.js";
import { RateLimitError, isCancelledError } from "../shared/errors.js";
import type { Clock, Sleep } from "../shared/time.js";
import { SystemClock, sleep as defaultSleep } from "../shared/time.js";
import { SlidingWindowCounter } from "./sliding-window.js";
import { type RateLimiterStats, RequestStats } from "./stats.js";
import { SubscriptionTracker } from "./subscription-tracker.js";
import { TokenBucket } from "./token-bucket.js";

export const OperationClass = {
	General: "general",
	Order: "order",
	HistoricalData: "historical_data",
	MarketData: "market_data",
} as const;

export type OperationClass = (typeof OperationClass)[keyof typeof OperationClass];

export interface RateLimiterOptions {
	readonly settings?: Partial<RateLimitSettings>;
	readonly logger?: Logger;
	readonly clock?: Clock;
	/** Used to wait out bucket shortfalls. */
	readonly sleep?: Sleep;
}

export class RateLimiter {
	private readonly settings: RateLimitSettings;
	private readonly log: Logger;
	private readonly clock: Clock;
	private readonly sleep: Sleep;

	private readonly general: TokenBucket;
	private readonly orders: TokenBucket;
	private readonly historical: SlidingWindowCounter;
	private readonly subscriptions: SubscriptionTracker;
	private readonly stats: RequestStats;

	private backoffUntil: number | null = null;
	private consecutiveErrors = 0;

	constructor(options: RateLimiterOptions = {}) {
		this.settings = { ...DEFAULT_RATE_LIMIT_SETTINGS, ...options.settings };
		this.log = (options.logger ?? silentLogger()).child({ component: "rate-limiter" });
		this.clock = options.clock ?? SystemClock;
		this.sleep = options.sleep ?? defaultSleep;

		const { maxRequestsPerSecond, burstSize, maxOrdersPerSecond } = this.settings;
		this.general = new TokenBucket({
			capacity: burstSize,
			refillRate: maxRequestsPerSecond,
			clock: this.clock,
		});
		this.orders = new TokenBucket({
			capacity: maxOrdersPerSecond * 2,
			refillRate: maxOrdersPerSecond,
			clock: this.clock,
		});
		this.historical = new SlidingWindowCounter({
			windowMs: this.settings.historicalWindowMs,
			clock: this.clock,
		});
		this.subscriptions = new SubscriptionTracker(this.settings.maxMarketDataLines);
		this.stats = new RequestStats(this.clock);
	}

	// ── Acquisition ────────────────────────────────────────────────

	/**
	 * Waits until a call of `operation` with `weight` may go out.
	 *
	 * @throws RateLimitError during a backoff or once a hard ceiling is reached
	 * @throws CancelledError when `signal` aborts the wait
	 */
	async acquire(
		operation: OperationClass = OperationClass.General,
		weight = 1,
		signal?: AbortSignal,
	): Promise<void> {
		this.stats.recordRequest();
		if (!this.settings.enabled) {
			this.stats.recordAccepted();
			return;
		}

		const backoffMs = this.backoffRemainingMs();
		if (backoffMs > 0) {
			this.stats.recordRejected();
			throw new RateLimitError("backoff", backoffMs, { operation });
		}

		let waitMs: number;
		try {
			waitMs = this.reserve(operation, weight);
		} catch (error) {
			this.stats.recordRejected();
			throw error;
		}

		if (waitMs > 0) {
			this.stats.recordDelay(waitMs);
			this.log.debug({ operation, weight, waitMs }, "Rate limit wait");
			try {
				await this.sleep(waitMs, signal);
			} catch (error) {
				if (isCancelledError(error)) this.stats.recordRejected();
				throw error;
			}
		}

		this.consecutiveErrors = 0;
		this.stats.recordAccepted();
	}

	/**
	 * Non-blocking acquire of one unit. Consumes nothing unless every bucket
	 * and ceiling involved admits the call right now.
	 */
	tryAcquire(operation: OperationClass = OperationClass.General): boolean {
		this.stats.recordRequest();
		const admitted = !this.settings.enabled || this.admitNow(operation);
		if (admitted) {
			this.stats.recordAccepted();
		} else {
			this.stats.recordRejected();
		}
		return admitted;
	}

	private admitNow(operation: OperationClass): boolean {
		if (this.backoffRemainingMs() > 0) return false;
		if (!this.general.canAcquire()) return false;

		switch (operation) {
			case OperationClass.General:
				break;
			case OperationClass.Order:
				if (!this.orders.canAcquire()) return false;
				this.orders.tryAcquire();
				break;
			case OperationClass.HistoricalData:
				if (this.historical.getCount() >= this.settings.maxHistoricalRequests) return false;
				this.historical.addRequest();
				break;
			case OperationClass.MarketData:
				if (this.subscriptions.isFull()) return false;
				break;
		}
		this.general.tryAcquire();
		return true;
	}

	/** Commits tokens and slots for one call; returns the required wait. */
	private reserve(operation: OperationClass, weight: number): number {
		switch (operation) {
			case OperationClass.General:
				return this.general.acquire(weight);

			case OperationClass.Order: {
				// weight counts against the message rate; an order is one order
				const generalWait = this.general.acquire(weight);
				const orderWait = this.orders.acquire(1);
				return Math.max(generalWait, orderWait);
			}

			case OperationClass.HistoricalData: {
				// inclusive ceiling: at most maxHistoricalRequests accepted per window
				if (this.historical.getCount() >= this.settings.maxHistoricalRequests) {
					throw new RateLimitError("historical_data", this.historical.msUntilNextSlot(), {
						limit: this.settings.maxHistoricalRequests,
						windowMs: this.settings.historicalWindowMs,
					});
				}
				this.historical.addRequest();
				return this.general.acquire(weight);
			}

			case OperationClass.MarketData:
				if (this.subscriptions.isFull()) {
					throw new RateLimitError("market_data", 0, {
						activeSubscriptions: this.subscriptions.size,
						limit: this.subscriptions.capacity,
					});
				}
				return this.general.acquire(weight);
		}
	}

	// ── Gateway-reported violations ────────────────────────────────

	/**
	 * Backs off after the gateway reported a rate violation. Every further
	 * acquire fails fast until the backoff has elapsed.
	 * @returns the backoff in milliseconds
	 */
	handleRateLimitError(message: string): number {
		this.consecutiveErrors++;
		const { initialBackoffMs, backoffMultiplier, maxBackoffMs } = this.settings;
		const backoffMs = Math.min(
			maxBackoffMs,
			initialBackoffMs * backoffMultiplier ** this.consecutiveErrors,
		);
		this.backoffUntil = this.clock.now() + backoffMs;
		this.log.warn(
			{ consecutiveErrors: this.consecutiveErrors, backoffMs, message },
			"Gateway rate limit violation, backing off",
		);
		return backoffMs;
	}

	resetBackoff(): void {
		this.backoffUntil = null;
		this.consecutiveErrors = 0;
	}

	get inBackoff(): boolean {
		return this.backoffRemainingMs() > 0;
	}

	backoffRemainingMs(): number {
		if (this.backoffUntil === null) return 0;
		return Math.max(0, this.backoffUntil - this.clock.now());
	}

	// ── Market-data subscriptions ──────────────────────────────────

	/**
	 * Registers a market-data line. Re-adding an active symbol succeeds.
	 * @throws RateLimitError (`market_data_subscriptions`, no retry-after) when every line is taken
	 */
	addSubscription(symbol: string): void {
		if (this.subscriptions.add(symbol)) return;
		this.log.warn({ symbol, limit: this.subscriptions.capacity }, "Market data line limit reached");
		throw new RateLimitError("market_data_subscriptions", 0, {
			symbol,
			activeSubscriptions: this.subscriptions.size,
			limit: this.subscriptions.capacity,
		});
	}

	removeSubscription(symbol: string): void {
		this.subscriptions.remove(symbol);
	}

	clearSubscriptions(): void {
		this.subscriptions.clear();
	}

	hasSubscription(symbol: string): boolean {
		return this.subscriptions.has(symbol);
	}

	activeSubscriptions(): readonly string[] {
		return this.subscriptions.list();
	}

	// ── Statistics ─────────────────────────────────────────────────

	getStats(): RateLimiterStats {
		const backoffRemainingMs = this.backoffRemainingMs();
		return this.stats.snapshot({
			activeSubscriptions: this.subscriptions.size,
			inBackoff: backoffRemainingMs > 0,
			backoffRemainingMs,
			consecutiveErrors: this.consecutiveErrors,
		});
	}

	resetStats(): void {
		this.stats.reset();
	}
}
