/**
 * Log-scale histogram of heartbeat round trips.
 *
 * 16 buckets with upper bounds 1ms, 2ms, 4ms, ..., 32768ms plus one overflow
 * bucket. Percentiles report the upper bound of the bucket that holds them.
 */

const NUM_BUCKETS = 16;
const UPPER_BOUNDS_MS: readonly number[] = Array.from({ length: NUM_BUCKETS }, (_, i) => 2 ** i);
const OVERFLOW_MS = 2 ** NUM_BUCKETS;

export class LatencyHistogram {
	private readonly buckets: number[] = new Array<number>(NUM_BUCKETS + 1).fill(0);
	private samples = 0;
	private maxSeenMs = 0;

	/** Record one round trip in milliseconds. Negative samples count as 0. */
	record(latencyMs: number): void {
		const idx = bucketIndex(latencyMs);
		this.buckets[idx] = (this.buckets[idx] ?? 0) + 1;
		this.samples++;
		this.maxSeenMs = Math.max(this.maxSeenMs, latencyMs);
	}

	get count(): number {
		return this.samples;
	}

	get maxMs(): number {
		return this.maxSeenMs;
	}

	/** Estimate the p-th percentile in milliseconds. 0 when empty. */
	percentile(p: number): number {
		if (this.samples === 0) return 0;
		const target = Math.max(1, Math.ceil(this.samples * (p / 100)));
		let cumulative = 0;
		for (let i = 0; i <= NUM_BUCKETS; i++) {
			cumulative += this.buckets[i] ?? 0;
			if (cumulative >= target) {
				return UPPER_BOUNDS_MS[i] ?? OVERFLOW_MS;
			}
		}
		return OVERFLOW_MS;
	}

	reset(): void {
		this.buckets.fill(0);
		this.samples = 0;
		this.maxSeenMs = 0;
	}
}

function bucketIndex(latencyMs: number): number {
	if (latencyMs <= 0) return 0;
	for (let i = 0; i < NUM_BUCKETS; i++) {
		const bound = UPPER_BOUNDS_MS[i];
		if (bound !== undefined && latencyMs <= bound) return i;
	}
	return NUM_BUCKETS;
}
