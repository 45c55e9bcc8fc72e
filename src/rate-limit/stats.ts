import type { Clock } from "../shared/time.js";

/** Snapshot of rate limiter usage since the last reset. */
export interface RateLimiterStats {
	readonly totalRequests: number;
	readonly acceptedRequests: number;
	readonly rejectedRequests: number;
	readonly delayedRequests: number;
	readonly totalDelayMs: number;
	readonly avgDelayMs: number;
	/** accepted / total; 1 before any request */
	readonly acceptanceRate: number;
	readonly periodMs: number;
	readonly activeSubscriptions: number;
	readonly inBackoff: boolean;
	readonly backoffRemainingMs: number;
	readonly consecutiveErrors: number;
}

/** Limiter state merged into the counters when a snapshot is taken. */
export type LimiterGauges = Pick<
	RateLimiterStats,
	"activeSubscriptions" | "inBackoff" | "backoffRemainingMs" | "consecutiveErrors"
>;

/** Cumulative request counters for the rate limiter. */
export class RequestStats {
	private total = 0;
	private accepted = 0;
	private rejected = 0;
	private delayed = 0;
	private delayMs = 0;
	private periodStartMs: number;
	private readonly clock: Clock;

	constructor(clock: Clock) {
		this.clock = clock;
		this.periodStartMs = clock.now();
	}

	recordRequest(): void {
		this.total++;
	}

	recordAccepted(): void {
		this.accepted++;
	}

	recordRejected(): void {
		this.rejected++;
	}

	recordDelay(ms: number): void {
		this.delayed++;
		this.delayMs += ms;
	}

	snapshot(gauges: LimiterGauges): RateLimiterStats {
		return {
			totalRequests: this.total,
			acceptedRequests: this.accepted,
			rejectedRequests: this.rejected,
			delayedRequests: this.delayed,
			totalDelayMs: this.delayMs,
			avgDelayMs: this.delayed > 0 ? this.delayMs / this.delayed : 0,
			acceptanceRate: this.total > 0 ? this.accepted / this.total : 1,
			periodMs: this.clock.now() - this.periodStartMs,
			...gauges,
		};
	}

	/** Zeroes every counter and starts a new period. */
	reset(): void {
		this.total = 0;
		this.accepted = 0;
		this.rejected = 0;
		this.delayed = 0;
		this.delayMs = 0;
		this.periodStartMs = this.clock.now();
	}
}
