/**
 * ConnectionMonitor: keeps one gateway session alive.
 *
 * Owns the lifecycle of a single logical connection: establishes it through
 * the caller's factory, runs a liveness check and a heartbeat probe in the
 * background, and repairs a lost session with bounded exponential backoff.
 *
 * Reconnection is serialized: concurrent callers of reconnect() share one
 * in-flight sequence and its outcome. stop() aborts both background checks
 * and any pending backoff sleep, waits for them to exit and only then
 * releases the handle.
 */

import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { type ConnectionSettings, DEFAULT_CONNECTION_SETTINGS } from "../shared/config.js";
import {
	CancelledError,
	ConnectionError,
	ConnectionTimeoutError,
	ReconnectExhaustedError,
	classifyError,
	isCancelledError,
	isConnectionError,
} from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import type { Clock, Sleep } from "../shared/time.js";
import { SystemClock, sleep as defaultSleep, withTimeout } from "../shared/time.js";
import { type ConnectionLink, link } from "./capabilities.js";
import { HealthTracker } from "./health.js";
import { ReconnectionPolicy } from "./reconnection.js";
import { ConnectionStateMachine } from "./state-machine.js";
import {
	type ConnectedCallback,
	type ConnectionEvents,
	type ConnectionFactory,
	ConnectionState,
	type ConnectionTransition,
	type DisconnectedCallback,
	type ErrorCallback,
	type GatewayConnection,
	type HealthSnapshot,
	type StateError,
	type TransitionRecord,
} from "./types.js";

/** Liveness fails once the last heartbeat is older than this many intervals. */
const STALE_HEARTBEAT_INTERVALS = 3;

export interface ConnectionMonitorOptions<H extends GatewayConnection> {
	readonly factory: ConnectionFactory<H>;
	readonly settings?: Partial<ConnectionSettings>;
	readonly logger?: Logger;
	readonly clock?: Clock;
	/** Used for backoff delays and check intervals. */
	readonly sleep?: Sleep;
}

export class ConnectionMonitor<H extends GatewayConnection = GatewayConnection> {
	private readonly factory: ConnectionFactory<H>;
	private readonly settings: ConnectionSettings;
	private readonly log: Logger;
	private readonly clock: Clock;
	private readonly sleep: Sleep;
	private readonly fsm: ConnectionStateMachine;
	private readonly tracker: HealthTracker;
	private readonly events: TypedEmitter<ConnectionEvents>;
	private readonly lifetime = new AbortController();

	private current: ConnectionLink<H> | null = null;
	private inFlightReconnect: Promise<boolean> | null = null;
	private loops: Promise<void>[] = [];
	private stopping: Promise<void> | null = null;

	private connectedCallback: ConnectedCallback | null = null;
	private disconnectedCallback: DisconnectedCallback | null = null;
	private errorCallback: ErrorCallback | null = null;

	constructor(options: ConnectionMonitorOptions<H>) {
		this.factory = options.factory;
		this.settings = { ...DEFAULT_CONNECTION_SETTINGS, ...options.settings };
		this.log = (options.logger ?? silentLogger()).child({ component: "connection-monitor" });
		this.clock = options.clock ?? SystemClock;
		this.sleep = options.sleep ?? defaultSleep;
		this.fsm = new ConnectionStateMachine(this.clock);
		this.tracker = new HealthTracker(this.clock);
		this.events = new TypedEmitter<ConnectionEvents>((event, error) => {
			this.log.error(
				{ event, err: error instanceof Error ? error.message : String(error) },
				"Event listener threw",
			);
		});
	}

	// ── Queries ────────────────────────────────────────────────────

	get state(): ConnectionState {
		return this.fsm.state();
	}

	get isConnected(): boolean {
		return this.fsm.state() === ConnectionState.Connected;
	}

	/** The live handle while connected, otherwise null. */
	get connection(): H | null {
		if (!this.isConnected) return null;
		return this.current?.handle ?? null;
	}

	health(): HealthSnapshot {
		return this.tracker.snapshot(this.fsm.state());
	}

	/** Last 100 accepted state transitions, oldest first. */
	history(): readonly TransitionRecord[] {
		return this.fsm.history();
	}

	// ── Subscriptions ──────────────────────────────────────────────

	on<K extends keyof ConnectionEvents>(event: K, handler: ConnectionEvents[K]): () => void {
		return this.events.on(event, handler);
	}

	/** Single slot: a later registration replaces the earlier one. */
	onConnected(callback: ConnectedCallback): void {
		this.connectedCallback = callback;
	}

	onDisconnected(callback: DisconnectedCallback): void {
		this.disconnectedCallback = callback;
	}

	onError(callback: ErrorCallback): void {
		this.errorCallback = callback;
	}

	recordSent(): void {
		this.tracker.recordSent();
	}

	recordReceived(): void {
		this.tracker.recordReceived();
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	/**
	 * Connects and launches the background checks. Also the external restart
	 * after reconnection was exhausted.
	 * @throws ConnectionError when the factory or connect fails; the state is then `error`
	 */
	async start(): Promise<void> {
		const begun = this.transition({ type: "start" });
		if (!begun.ok) {
			throw new ConnectionError(begun.error.message, { state: begun.error.from });
		}

		let established: ConnectionLink<H>;
		try {
			established = await this.establish();
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			this.tracker.recordError(reason);
			this.transition({ type: "connect_failed", reason });
			this.log.error({ err: reason }, "Failed to connect to gateway");
			if (error instanceof ConnectionError) throw error;
			throw new ConnectionError(`Failed to connect to gateway: ${reason}`, { cause: error });
		}

		if (!this.transition({ type: "connect_succeeded" }).ok) {
			await this.dispose(established);
			throw new CancelledError("Monitor stopped while connecting");
		}
		this.current = established;
		this.tracker.markConnected();
		this.log.info("Connected to gateway");
		this.notify("connected", this.connectedCallback);
		this.launchChecks();
	}

	/** Stops the checks, waits for them to exit and releases the handle. Idempotent. */
	stop(): Promise<void> {
		this.stopping ??= this.shutdown();
		return this.stopping;
	}

	/**
	 * Repairs the session. Resolves true when connected, false after shutdown
	 * or once every attempt has failed.
	 */
	reconnect(): Promise<boolean> {
		if (this.isConnected) return Promise.resolve(true);
		if (this.fsm.isTerminal()) return Promise.resolve(false);
		if (this.inFlightReconnect) return this.inFlightReconnect;

		const run = this.runReconnect().finally(() => {
			this.inFlightReconnect = null;
		});
		this.inFlightReconnect = run;
		return run;
	}

	// ── Internals ──────────────────────────────────────────────────

	private async shutdown(): Promise<void> {
		this.transition({ type: "shutdown" });
		this.lifetime.abort();

		const pending: Promise<unknown>[] = [...this.loops];
		if (this.inFlightReconnect) pending.push(this.inFlightReconnect);
		await Promise.allSettled(pending);
		this.loops = [];

		await this.releaseCurrent();
		this.log.info("Connection monitor stopped");
	}

	private async runReconnect(): Promise<boolean> {
		if (!this.transition({ type: "begin_recovery" }).ok) {
			// e.g. the first connect is still running
			return false;
		}

		const { maxReconnectAttempts, reconnectDelayMs } = this.settings;
		const policy = new ReconnectionPolicy({
			baseDelayMs: reconnectDelayMs,
			maxAttempts: maxReconnectAttempts,
		});
		this.log.info({ maxAttempts: maxReconnectAttempts }, "Reconnecting to gateway");

		while (policy.shouldRetry()) {
			const delayMs = policy.nextDelay();
			const attempt = policy.attempt();
			await this.releaseCurrent();

			try {
				await this.sleep(delayMs, this.lifetime.signal);
			} catch (error) {
				if (isCancelledError(error)) return false;
				throw error;
			}

			let next: ConnectionLink<H>;
			try {
				next = await this.establish();
			} catch (error) {
				const reason = error instanceof Error ? error.message : String(error);
				this.tracker.recordError(reason);
				this.log.warn(
					{ attempt, maxAttempts: maxReconnectAttempts, delayMs, err: reason },
					"Reconnect attempt failed",
				);
				continue;
			}

			if (!this.transition({ type: "recovery_succeeded" }).ok) {
				await this.dispose(next);
				return false;
			}
			this.current = next;
			this.tracker.markConnected();
			this.tracker.recordReconnect();
			this.log.info({ attempt }, "Reconnected to gateway");
			this.notify("connected", this.connectedCallback);
			return true;
		}

		const exhausted = new ReconnectExhaustedError(maxReconnectAttempts);
		this.tracker.recordError(exhausted.message);
		if (!this.transition({ type: "recovery_exhausted", attempts: maxReconnectAttempts }).ok) {
			return false;
		}
		this.log.error({ attempts: maxReconnectAttempts }, "Reconnection exhausted");
		const onError = this.errorCallback;
		this.notify("error", onError && (() => onError(exhausted)));
		return false;
	}

	/** Produces a handle and runs its connect() under the connect timeout. */
	private async establish(): Promise<ConnectionLink<H>> {
		const attempt = this.produce();
		try {
			return await withTimeout(attempt, this.settings.connectTimeoutMs, "Gateway connect");
		} catch (error) {
			if (error instanceof ConnectionTimeoutError) {
				// a handle that arrives after the timeout is never used
				attempt
					.then((late) => this.dispose(late))
					.catch((lateError: unknown) => {
						this.log.debug(
							{ err: lateError instanceof Error ? lateError.message : String(lateError) },
							"Abandoned connect attempt failed",
						);
					});
			}
			throw error;
		}
	}

	private async produce(): Promise<ConnectionLink<H>> {
		const established = link(await this.factory());
		if (established.caps.connect) {
			try {
				await established.caps.connect();
			} catch (error) {
				await this.dispose(established);
				throw error;
			}
		}
		return established;
	}

	/** Tears down a handle that is not (or no longer) the live one. Never throws. */
	private async dispose(target: ConnectionLink<H>): Promise<void> {
		if (!target.caps.disconnect) return;
		try {
			await target.caps.disconnect();
		} catch (error) {
			this.log.warn(
				{ err: error instanceof Error ? error.message : String(error) },
				"Disconnect failed",
			);
		}
	}

	private async releaseCurrent(): Promise<void> {
		const released = this.current;
		if (!released) return;
		this.current = null;
		await this.dispose(released);
		this.notify("disconnected", this.disconnectedCallback);
	}

	private markLost(reason: string): void {
		if (this.transition({ type: "connection_lost", reason }).ok) {
			this.tracker.recordError(reason);
			this.log.warn({ reason }, "Connection lost");
		}
	}

	// ── Background checks ──────────────────────────────────────────

	private launchChecks(): void {
		if (!this.settings.monitorEnabled || this.lifetime.signal.aborted) return;
		if (this.loops.length > 0) return;
		this.loops = [
			this.runLoop("liveness", () => this.checkLiveness()),
			this.runLoop("heartbeat", () => this.sendHeartbeat()),
		];
	}

	private async runLoop(check: string, tick: () => Promise<void>): Promise<void> {
		const { signal } = this.lifetime;
		while (!signal.aborted) {
			try {
				await tick();
			} catch (error) {
				const reason = error instanceof Error ? error.message : String(error);
				this.tracker.recordError(reason);
				this.log.error({ check, err: reason }, "Background check failed");
			}
			try {
				await this.sleep(this.settings.heartbeatIntervalMs, signal);
			} catch (error) {
				if (isCancelledError(error)) return;
				throw error;
			}
		}
	}

	private async checkLiveness(): Promise<void> {
		const state = this.fsm.state();
		if (state === ConnectionState.Disconnected) {
			await this.reconnect();
			return;
		}
		// connecting and reconnecting are in progress; error waits for an external restart
		if (state !== ConnectionState.Connected) return;

		const failure = this.livenessFailure();
		if (failure === null) return;
		this.markLost(failure);
		await this.reconnect();
	}

	private livenessFailure(): string | null {
		const live = this.current;
		if (!live) return "No live connection handle";
		if (live.caps.isConnected && !live.caps.isConnected()) {
			return "Gateway reports the session disconnected";
		}
		const age = this.tracker.heartbeatAgeMs();
		const limit = this.settings.heartbeatIntervalMs * STALE_HEARTBEAT_INTERVALS;
		if (age === null || age > limit) {
			return `No heartbeat for ${age ?? "ever"}ms`;
		}
		return null;
	}

	private async sendHeartbeat(): Promise<void> {
		const live = this.current;
		if (this.fsm.state() !== ConnectionState.Connected || !live) return;

		const startedAt = this.clock.now();
		if (live.caps.ping) {
			try {
				await withTimeout(live.caps.ping(), this.settings.heartbeatIntervalMs, "Heartbeat ping");
			} catch (error) {
				const classified = classifyError(error);
				if (!isConnectionError(classified)) throw error;
				this.markLost(`Heartbeat failed: ${classified.message}`);
				return;
			}
		} else if (live.caps.isConnected && !live.caps.isConnected()) {
			this.markLost("Gateway reports the session disconnected");
			return;
		}

		// the session may have been replaced while the ping was in flight
		if (this.current !== live || this.fsm.state() !== ConnectionState.Connected) return;
		const latencyMs = this.clock.now() - startedAt;
		this.tracker.recordHeartbeat(latencyMs);
		this.events.emit("heartbeat", latencyMs);
	}

	// ── Helpers ────────────────────────────────────────────────────

	private transition(t: ConnectionTransition): Result<ConnectionState, StateError> {
		const from = this.fsm.state();
		const result = this.fsm.transition(t);
		if (result.ok) {
			this.log.debug({ from, to: result.value, transition: t.type }, "State transition");
			this.events.emit("stateChange", from, result.value, t.type);
		} else {
			this.log.debug({ from, transition: t.type }, result.error.message);
		}
		return result;
	}

	/**
	 * Invokes a lifecycle callback without waiting for it to settle. A callback
	 * may await `stop()`, which in turn waits for the sequence that notified it.
	 */
	private notify(
		name: "connected" | "disconnected" | "error",
		callback: (() => void | Promise<void>) | null,
	): void {
		if (!callback) return;
		const report = (error: unknown): void => {
			this.log.error(
				{ callback: name, err: error instanceof Error ? error.message : String(error) },
				"Lifecycle callback failed",
			);
		};
		try {
			const pending = callback();
			if (pending instanceof Promise) pending.catch(report);
		} catch (error) {
			report(error);
		}
	}
}
