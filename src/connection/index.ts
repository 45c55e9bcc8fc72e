export {
	ConnectionState,
	StateErrorKind,
	type ConnectionTransition,
	type ConnectionTransitionType,
	type TransitionRecord,
	type StateError,
	type GatewayConnection,
	type ConnectionFactory,
	type ConnectionHealth,
	type HealthSnapshot,
	type ConnectedCallback,
	type DisconnectedCallback,
	type ErrorCallback,
	type ConnectionEvents,
} from "./types.js";

export { ConnectionStateMachine } from "./state-machine.js";
export { HEALTHY_HEARTBEAT_AGE_MS } from "./health.js";
export { ReconnectionPolicy, type ReconnectionConfig } from "./reconnection.js";
export { ConnectionMonitor, type ConnectionMonitorOptions } from "./connection-monitor.js";

export {
	withConnectionRetry,
	type ConnectionRetryOptions,
	type ConnectedOperation,
} from "./with-connection-retry.js";
