export { type Result, type Ok, type Err, ok, err, unwrap, isOk, isErr } from "./result.js";

export {
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
} from "./errors.js";

export {
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	type Sleep,
	sleep,
	withTimeout,
} from "./time.js";

export {
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
} from "./config.js";
