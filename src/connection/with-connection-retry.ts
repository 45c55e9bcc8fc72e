/**
 * Connection retry decorator: runs an operation against the live handle,
 * repairing the connection and retrying on connection-class failures.
 *
 * Only retryable connection errors are retried; everything else (rate-limit
 * rejections, validation errors, gateway business errors) propagates on the
 * first failure.
 */

import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { DEFAULT_RETRY_SETTINGS, type RetrySettings } from "../shared/config.js";
import { ConnectionLostError, classifyError, isConnectionError } from "../shared/errors.js";
import type { Sleep } from "../shared/time.js";
import { sleep as defaultSleep } from "../shared/time.js";
import type { ConnectionMonitor } from "./connection-monitor.js";
import { ConnectionState, type GatewayConnection } from "./types.js";

export interface ConnectionRetryOptions extends Partial<RetrySettings> {
	readonly sleep?: Sleep;
	/** Aborts a pending backoff sleep with CancelledError. */
	readonly signal?: AbortSignal;
	readonly logger?: Logger;
}

/** Operation run against the live session handle. */
export type ConnectedOperation<H extends GatewayConnection, T> = (connection: H) => T | Promise<T>;

/** @internal Exported for testing only. */
export function retryDelay(attempt: number, baseDelayMs: number): number {
	return baseDelayMs * 2 ** attempt;
}

/**
 * Runs `operation` with the monitor's live handle, retrying connection
 * failures with exponential backoff.
 *
 * @throws ConnectionLostError immediately when the monitor is in `error` or shut down
 *
 * @example
 * ```ts
 * const positions = await withConnectionRetry(monitor, (ib) => ib.reqPositions(), {
 *   maxRetries: 3,
 * });
 * ```
 */
export async function withConnectionRetry<H extends GatewayConnection, T>(
	monitor: ConnectionMonitor<H>,
	operation: ConnectedOperation<H, T>,
	options: ConnectionRetryOptions = {},
): Promise<T> {
	const maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_RETRY_SETTINGS.maxRetries);
	const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_SETTINGS.baseDelayMs;
	const sleep = options.sleep ?? defaultSleep;
	const log = (options.logger ?? silentLogger()).child({ component: "connection-retry" });

	let lastError: unknown = null;
	for (let attempt = 0; attempt < maxRetries; attempt++) {
		failFastIfUnrecoverable(monitor.state);
		if (!monitor.isConnected) {
			// proceed regardless of the outcome; a missing handle fails below
			await monitor.reconnect();
		}

		try {
			const connection = monitor.connection;
			if (!connection) {
				throw new ConnectionLostError("No live gateway connection", { state: monitor.state });
			}
			monitor.recordSent();
			const result = await operation(connection);
			monitor.recordReceived();
			return result;
		} catch (error) {
			const classified = classifyError(error);
			if (!isConnectionError(classified) || !classified.isRetryable) throw error;
			lastError = error;
			if (attempt + 1 >= maxRetries) break;

			const delayMs = retryDelay(attempt, baseDelayMs);
			log.warn(
				{ attempt: attempt + 1, maxRetries, delayMs, err: classified.message },
				"Connection failure, retrying",
			);
			await sleep(delayMs, options.signal);
		}
	}
	throw lastError;
}

function failFastIfUnrecoverable(state: ConnectionState): void {
	if (state === ConnectionState.Error) {
		throw new ConnectionLostError("Gateway connection failed permanently; restart the monitor", {
			state,
		});
	}
	if (state === ConnectionState.Shutdown) {
		throw new ConnectionLostError("Connection monitor is shut down", { state });
	}
}
