/**
 * Connection lifecycle types: state machine for the gateway session.
 *
 * 6 states model one logical connection from first connect to shutdown.
 * Transitions are explicitly validated: no implicit state changes.
 */

// ── Connection States ────────────────────────────────────────────────

export const ConnectionState = {
	/** No live handle; initial state and the state after a lost connection */
	Disconnected: "disconnected",
	/** First connect in progress */
	Connecting: "connecting",
	/** Handle is live; calls may be attempted */
	Connected: "connected",
	/** Backoff-and-retry sequence in progress */
	Reconnecting: "reconnecting",
	/** Initial connect failed or reconnection exhausted; needs an external restart */
	Error: "error",
	/** Terminal: monitor stopped */
	Shutdown: "shutdown",
} as const;

export type ConnectionState = (typeof ConnectionState)[keyof typeof ConnectionState];

// ── State Transitions ────────────────────────────────────────────────

export type ConnectionTransition =
	| { readonly type: "start" }
	| { readonly type: "connect_succeeded" }
	| { readonly type: "connect_failed"; readonly reason: string }
	| { readonly type: "connection_lost"; readonly reason: string }
	| { readonly type: "begin_recovery" }
	| { readonly type: "recovery_succeeded" }
	| { readonly type: "recovery_exhausted"; readonly attempts: number }
	| { readonly type: "shutdown" };

export type ConnectionTransitionType = ConnectionTransition["type"];

export interface TransitionRecord {
	readonly from: ConnectionState;
	readonly to: ConnectionState;
	readonly transition: ConnectionTransitionType;
	readonly timestamp: number;
}

// ── State Errors ─────────────────────────────────────────────────────

export const StateErrorKind = {
	InvalidTransition: "invalid_transition",
	AlreadyTerminal: "already_terminal",
} as const;

export type StateErrorKind = (typeof StateErrorKind)[keyof typeof StateErrorKind];

export interface StateError {
	readonly kind: StateErrorKind;
	readonly message: string;
	readonly from: ConnectionState;
	readonly transition: ConnectionTransitionType;
}

// ── Gateway session contract ─────────────────────────────────────────

/**
 * Capabilities the monitor uses on a session handle, every one optional.
 * Members may be synchronous or return a promise.
 */
export interface GatewayConnection {
	connect?(): unknown;
	disconnect?(): unknown;
	ping?(): unknown;
	/** Primary liveness signal when present. */
	isConnected?(): boolean;
}

/** Produces a fresh session handle. Called once per connect attempt. */
export type ConnectionFactory<H extends GatewayConnection = GatewayConnection> = () => H | Promise<H>;

// ── Health ───────────────────────────────────────────────────────────

export interface ConnectionHealth {
	readonly state: ConnectionState;
	readonly lastHeartbeatAt: number | null;
	readonly connectedAt: number | null;
	readonly reconnectCount: number;
	readonly errorCount: number;
	readonly lastError: string | null;
	/** Round trip of the most recent heartbeat */
	readonly latencyMs: number | null;
	readonly messagesSent: number;
	readonly messagesReceived: number;
}

export interface HealthSnapshot extends ConnectionHealth {
	/** Connected with a heartbeat younger than the freshness threshold */
	readonly healthy: boolean;
	readonly uptimeMs: number | null;
	readonly heartbeatAgeMs: number | null;
	readonly latencyP50Ms: number;
	readonly latencyP99Ms: number;
}

// ── Callbacks ────────────────────────────────────────────────────────

/**
 * Lifecycle callbacks. Notification is best-effort: a throw or rejection is
 * logged by the monitor and never reaches the code that triggered it.
 */
export type ConnectedCallback = () => void | Promise<void>;
export type DisconnectedCallback = () => void | Promise<void>;
export type ErrorCallback = (error: Error) => void | Promise<void>;

/** Events published by the monitor's emitter. */
export type ConnectionEvents = {
	stateChange: (from: ConnectionState, to: ConnectionState, transition: ConnectionTransitionType) => void;
	heartbeat: (latencyMs: number) => void;
};
