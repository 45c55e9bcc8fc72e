/**
 * HealthTracker: counters and timestamps behind ConnectionMonitor.health().
 *
 * Only the monitor writes; snapshots are plain immutable objects.
 */

import { LatencyHistogram } from "../observability/latency-histogram.js";
import type { Clock } from "../shared/time.js";
import { Duration } from "../shared/time.js";
import type { ConnectionState, HealthSnapshot } from "./types.js";

/** A connected session counts as healthy while its last heartbeat is younger than this. */
export const HEALTHY_HEARTBEAT_AGE_MS = Duration.seconds(30);

export class HealthTracker {
	private lastHeartbeatAt: number | null = null;
	private connectedAt: number | null = null;
	private reconnectCount = 0;
	private errorCount = 0;
	private lastError: string | null = null;
	private latencyMs: number | null = null;
	private messagesSent = 0;
	private messagesReceived = 0;
	private readonly latency = new LatencyHistogram();
	private readonly clock: Clock;

	constructor(clock: Clock) {
		this.clock = clock;
	}

	/** A session was established; it also counts as a fresh heartbeat. */
	markConnected(): void {
		const now = this.clock.now();
		this.connectedAt = now;
		this.lastHeartbeatAt = now;
	}

	recordHeartbeat(latencyMs: number): void {
		this.lastHeartbeatAt = this.clock.now();
		this.latencyMs = latencyMs;
		this.latency.record(latencyMs);
	}

	recordReconnect(): void {
		this.reconnectCount++;
	}

	recordError(message: string): void {
		this.errorCount++;
		this.lastError = message;
	}

	recordSent(): void {
		this.messagesSent++;
	}

	recordReceived(): void {
		this.messagesReceived++;
	}

	/** Age of the last heartbeat, or null before the first connect. */
	heartbeatAgeMs(): number | null {
		return this.lastHeartbeatAt === null ? null : this.clock.now() - this.lastHeartbeatAt;
	}

	snapshot(state: ConnectionState): HealthSnapshot {
		const now = this.clock.now();
		const heartbeatAgeMs = this.heartbeatAgeMs();
		return {
			state,
			healthy:
				state === "connected" && heartbeatAgeMs !== null && heartbeatAgeMs < HEALTHY_HEARTBEAT_AGE_MS,
			lastHeartbeatAt: this.lastHeartbeatAt,
			heartbeatAgeMs,
			connectedAt: this.connectedAt,
			uptimeMs: this.connectedAt === null ? null : now - this.connectedAt,
			reconnectCount: this.reconnectCount,
			errorCount: this.errorCount,
			lastError: this.lastError,
			latencyMs: this.latencyMs,
			latencyP50Ms: this.latency.percentile(50),
			latencyP99Ms: this.latency.percentile(99),
			messagesSent: this.messagesSent,
			messagesReceived: this.messagesReceived,
		};
	}
}
