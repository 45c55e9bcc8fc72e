// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	unwrap,
	isOk,
	isErr,
	ErrorCategory,
	ErrorSeverity,
	GatewayError,
	ConnectionError,
	ConnectionLostError,
	ReconnectExhaustedError,
	ConnectionTimeoutError,
	type RateLimitType,
	RateLimitError,
	CancelledError,
	ConfigError,
	SystemError,
	classifyError,
	isGatewayRateLimitSignal,
	type RecoveryAction,
	type RecoveryStrategy,
	recoveryStrategy,
	isConnectionError,
	isRateLimitError,
	isCancelledError,
	isConfigError,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	type Sleep,
	sleep,
	withTimeout,
	type GatewayConfig,
	type GatewayConfigInput,
	type ConnectionSettings,
	type RateLimitSettings,
	type RetrySettings,
	DEFAULT_GATEWAY_CONFIG,
	DEFAULT_CONNECTION_SETTINGS,
	DEFAULT_RATE_LIMIT_SETTINGS,
	DEFAULT_RETRY_SETTINGS,
	gatewayConfigSchema,
	loadGatewayConfig,
	configFromEnv,
	configWarnings,
} from "./shared/index.js";

// ── Connection ───────────────────────────────────────────────────────
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
	ConnectionStateMachine,
	HEALTHY_HEARTBEAT_AGE_MS,
	ReconnectionPolicy,
	type ReconnectionConfig,
	ConnectionMonitor,
	type ConnectionMonitorOptions,
	withConnectionRetry,
	type ConnectionRetryOptions,
	type ConnectedOperation,
} from "./connection/index.js";

// ── Rate Limiting ────────────────────────────────────────────────────
export {
	TokenBucket,
	type TokenBucketConfig,
	SlidingWindowCounter,
	type SlidingWindowConfig,
	SubscriptionTracker,
	type RateLimiterStats,
	OperationClass,
	RateLimiter,
	type RateLimiterOptions,
	withRateLimit,
	type RateLimitPolicy,
} from "./rate-limit/index.js";

// ── Composition ──────────────────────────────────────────────────────
export { guarded, type GuardDeps, type GuardPolicy } from "./guard/index.js";
export {
	GatewaySession,
	type GatewaySessionOptions,
	type SessionHealth,
} from "./session/index.js";

// ── Lib: Logger ─────────────────────────────────────────────────────
export {
	type Logger,
	type LoggerConfig,
	type LogLevel,
	createLogger,
	silentLogger,
} from "./lib/logger/index.js";

// ── Lib: Validation ─────────────────────────────────────────────────
export { ValidationError, type ValidationIssue, validate } from "./lib/validation/index.js";

// ── Lib: Events ─────────────────────────────────────────────────────
export { TypedEmitter, type EventMap } from "./lib/events/index.js";

// ── Observability ──────────────────────────────────────────────────
export { LatencyHistogram } from "./observability/latency-histogram.js";
