export interface ReconnectionConfig {
	readonly baseDelayMs: number;
	readonly maxAttempts: number;
	/** Upper bound for a single delay. Defaults to no cap. */
	readonly maxDelayMs?: number;
}

/**
 * Exponential backoff reconnection policy with attempt limiting.
 * Attempt n (from 1) waits baseDelayMs × 2^(n-1).
 */
export class ReconnectionPolicy {
	private readonly config: ReconnectionConfig;
	private attempts = 0;

	constructor(config: ReconnectionConfig) {
		this.config = config;
	}

	/** Delay before the next attempt; counts the attempt. */
	nextDelay(): number {
		const raw = this.config.baseDelayMs * 2 ** this.attempts;
		this.attempts += 1;
		return Math.min(raw, this.config.maxDelayMs ?? Number.POSITIVE_INFINITY);
	}

	/** Attempts handed out since the last reset */
	attempt(): number {
		return this.attempts;
	}

	reset(): void {
		this.attempts = 0;
	}

	shouldRetry(): boolean {
		return this.attempts < this.config.maxAttempts;
	}
}
