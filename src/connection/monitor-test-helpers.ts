/**
 * Shared test helpers for ConnectionMonitor and the wrappers built on it.
 */

import { vi } from "vitest";
import type { ConnectionSettings } from "../shared/config.js";
import { ConnectionMonitor } from "./connection-monitor.js";
import type { GatewayConnection } from "./types.js";

/** In-memory gateway session with switchable failures. */
export class FakeSession implements GatewayConnection {
	connected = false;
	connects = 0;
	disconnects = 0;
	pings = 0;
	pingError: Error | null = null;
	connectError: Error | null = null;

	connect(): void {
		this.connects++;
		if (this.connectError) throw this.connectError;
		this.connected = true;
	}

	disconnect(): void {
		this.disconnects++;
		this.connected = false;
	}

	ping(): Promise<void> {
		this.pings++;
		if (this.pingError) return Promise.reject(this.pingError);
		return Promise.resolve();
	}

	isConnected(): boolean {
		return this.connected;
	}
}

/** Check loops off and no backoff, so tests drive the monitor explicitly. */
export const QUIET_SETTINGS: Partial<ConnectionSettings> = {
	monitorEnabled: false,
	heartbeatIntervalMs: 1_000,
	reconnectDelayMs: 0,
	maxReconnectAttempts: 3,
};

/** Monitor whose factory hands out a fresh FakeSession per call. */
export function createMonitor(settings: Partial<ConnectionSettings> = {}) {
	const sessions: FakeSession[] = [];
	const factory = vi.fn(() => {
		const session = new FakeSession();
		sessions.push(session);
		return session;
	});
	const monitor = new ConnectionMonitor({
		factory,
		settings: { ...QUIET_SETTINGS, ...settings },
	});
	return { monitor, factory, sessions };
}
