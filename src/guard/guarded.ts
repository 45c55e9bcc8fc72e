import type { ConnectionMonitor } from "../connection/connection-monitor.js";
import type { GatewayConnection } from "../connection/types.js";
import {
	type ConnectedOperation,
	type ConnectionRetryOptions,
	withConnectionRetry,
} from "../connection/with-connection-retry.js";
import type { RateLimiter } from "../rate-limit/rate-limiter.js";
import { type RateLimitPolicy, withRateLimit } from "../rate-limit/with-rate-limit.js";

export interface GuardDeps<H extends GatewayConnection> {
	readonly monitor: ConnectionMonitor<H>;
	readonly limiter: RateLimiter;
}

/**
 * Throttling and retry settings for one guarded call. `signal` aborts both
 * a rate-limit wait and a retry backoff.
 */
export interface GuardPolicy extends RateLimitPolicy {
	readonly retry?: Omit<ConnectionRetryOptions, "signal">;
}

/**
 * Runs a gateway call through the limiter and the connection monitor.
 * Every retry attempt is throttled again, so a flapping connection cannot
 * push the caller past the gateway's pacing limits.
 *
 * @example
 * ```ts
 * const order = await guarded({ monitor, limiter }, (ib) => ib.placeOrder(id, contract, o), {
 *   operation: "order",
 * });
 * ```
 */
export function guarded<H extends GatewayConnection, T>(
	deps: GuardDeps<H>,
	operation: ConnectedOperation<H, T>,
	policy: GuardPolicy = {},
): Promise<T> {
	const retry: ConnectionRetryOptions = policy.signal
		? { ...policy.retry, signal: policy.signal }
		: { ...policy.retry };
	return withConnectionRetry(
		deps.monitor,
		(connection) => withRateLimit(deps.limiter, () => operation(connection), policy),
		retry,
	);
}
