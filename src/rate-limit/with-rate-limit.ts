import { isGatewayRateLimitSignal } from "../shared/errors.js";
import { OperationClass, type RateLimiter } from "./rate-limiter.js";

export interface RateLimitPolicy {
	readonly operation?: OperationClass;
	readonly weight?: number;
	/** Clear any gateway backoff once the call succeeds. */
	readonly resetBackoffOnSuccess?: boolean;
	readonly signal?: AbortSignal;
}

/**
 * Runs `operation` once the limiter admits it. A gateway pacing violation
 * raised by the operation starts a limiter backoff before it is rethrown.
 *
 * @example
 * ```ts
 * const bars = await withRateLimit(limiter, () => ib.reqHistoricalData(req), {
 *   operation: "historical_data",
 * });
 * ```
 */
export async function withRateLimit<T>(
	limiter: RateLimiter,
	operation: () => T | Promise<T>,
	policy: RateLimitPolicy = {},
): Promise<T> {
	await limiter.acquire(policy.operation ?? OperationClass.General, policy.weight ?? 1, policy.signal);
	try {
		const result = await operation();
		if (policy.resetBackoffOnSuccess) limiter.resetBackoff();
		return result;
	} catch (error) {
		if (isGatewayRateLimitSignal(error)) {
			limiter.handleRateLimitError(error instanceof Error ? error.message : String(error));
		}
		throw error;
	}
}
