/**
 * GatewayError hierarchy: structured error classification.
 *
 * Every error has a category (retryable, non-retryable, fatal) that drives the
 * retry wrappers, and a severity that drives the suggested recovery action.
 */

/** Error categories that drive retry behavior. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** How loudly an error should be surfaced to operators. */
export const ErrorSeverity = {
	Low: "low",
	Medium: "medium",
	High: "high",
	Critical: "critical",
} as const;

export type ErrorSeverity = (typeof ErrorSeverity)[keyof typeof ErrorSeverity];

/** Context accepted by every subclass; `cause` is lifted onto the error itself. */
type ErrorContext = Record<string, unknown> & { readonly cause?: unknown };

/** Base error class for everything raised by the gateway core. */
export class GatewayError extends Error {
	readonly category: ErrorCategory;
	readonly severity: ErrorSeverity;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		severity: ErrorSeverity,
		context: ErrorContext = {},
		hint?: string,
	) {
		const { cause, ...rest } = context;
		super(message);
		this.name = "GatewayError";
		this.category = category;
		this.severity = severity;
		this.code = code;
		this.context = rest;
		this.hint = hint;
		if (cause !== undefined) this.cause = cause;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			severity: this.severity,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Connection errors ────────────────────────────────────────────────

/** Retryable failure to establish a session with the gateway. */
export class ConnectionError extends GatewayError {
	constructor(
		message: string,
		context: ErrorContext = {},
		code = "CONNECTION_ERROR",
		severity: ErrorSeverity = ErrorSeverity.High,
		hint?: string,
	) {
		super(message, code, ErrorCategory.Retryable, severity, context, hint);
		this.name = "ConnectionError";
	}
}

/** The session was established but has since gone away (heartbeat or liveness failure). */
export class ConnectionLostError extends ConnectionError {
	constructor(message = "Lost connection to gateway", context: ErrorContext = {}) {
		super(
			message,
			context,
			"CONNECTION_LOST",
			ErrorSeverity.Critical,
			"Automatic reconnection is in progress",
		);
		this.name = "ConnectionLostError";
	}
}

/**
 * Every reconnection attempt failed. The monitor stays in `error` until it is
 * restarted, so retrying the call is pointless.
 */
export class ReconnectExhaustedError extends ConnectionLostError {
	override readonly category: ErrorCategory = ErrorCategory.Fatal;

	constructor(attempts: number, context: ErrorContext = {}) {
		super(`Reconnection failed after ${attempts} attempts`, { ...context, attempts });
		this.name = "ReconnectExhaustedError";
	}
}

/** A connect or ping did not complete in time. */
export class ConnectionTimeoutError extends ConnectionError {
	constructor(message: string, context: ErrorContext = {}) {
		super(
			message,
			context,
			"CONNECTION_TIMEOUT",
			ErrorSeverity.High,
			"Check the gateway is running and its API port accepts connections",
		);
		this.name = "ConnectionTimeoutError";
	}
}

// ── Throttling errors ────────────────────────────────────────────────

/** Limit families reported on RateLimitError. */
export type RateLimitType =
	| "backoff"
	| "general"
	| "order"
	| "historical_data"
	| "market_data"
	| "market_data_subscriptions";

/**
 * Hard rejection from the rate limiter. `retryAfterMs` is the suggested delay;
 * 0 means no automatic retry makes sense (e.g. subscription ceilings).
 */
export class RateLimitError extends GatewayError {
	readonly limitType: RateLimitType;
	readonly retryAfterMs: number;

	constructor(limitType: RateLimitType, retryAfterMs: number, context: ErrorContext = {}) {
		super(
			`Rate limit exceeded for ${limitType}`,
			"RATE_LIMIT_ERROR",
			ErrorCategory.Retryable,
			ErrorSeverity.Medium,
			context,
			retryAfterMs > 0
				? `Wait ${Math.ceil(retryAfterMs / 1000)}s before retrying`
				: "Reduce request frequency",
		);
		this.name = "RateLimitError";
		this.limitType = limitType;
		this.retryAfterMs = retryAfterMs;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			limitType: this.limitType,
			retryAfterMs: this.retryAfterMs,
		};
	}
}

// ── Everything else ──────────────────────────────────────────────────

/** An awaited wait was aborted through its AbortSignal. */
export class CancelledError extends GatewayError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CANCELLED", ErrorCategory.NonRetryable, ErrorSeverity.Low, context);
		this.name = "CancelledError";
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends GatewayError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, ErrorSeverity.Critical, context);
		this.name = "ConfigError";
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends GatewayError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, ErrorSeverity.High, context);
		this.name = "SystemError";
	}
}

// ── Classification ───────────────────────────────────────────────────

const CONNECTION_ERRNO = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EPIPE", "EHOSTUNREACH"]);

/** Message fragments the gateway uses for pacing and message-rate violations. */
const RATE_LIMIT_PATTERNS: readonly RegExp[] = [
	/rate\b.*\blimit/i,
	/pacing violation/i,
	/max rate of messages/i,
	/max number of tickers/i,
];

/** Gateway error codes that always denote throttling. */
const RATE_LIMIT_CODES = new Set([100, 420]);

function errnoOf(error: Error): string | undefined {
	if (!("code" in error)) return undefined;
	const { code } = error;
	return typeof code === "string" ? code : undefined;
}

function gatewayCodeOf(error: unknown): number | undefined {
	if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
	const { code } = error;
	if (typeof code === "number") return code;
	if (typeof code === "string" && /^\d+$/.test(code)) return Number.parseInt(code, 10);
	return undefined;
}

/**
 * Whether a failure reported by the gateway is a rate violation on its side.
 * Code 162 only counts when its message mentions pacing; it is also used for
 * ordinary historical-data failures. A RateLimitError only counts through the
 * gateway failure it was classified from, never as a local rejection.
 */
export function isGatewayRateLimitSignal(error: unknown): boolean {
	if (error instanceof RateLimitError) {
		return error.cause !== undefined && isGatewayRateLimitSignal(error.cause);
	}
	const message = error instanceof Error ? error.message : String(error);
	const code = gatewayCodeOf(error);
	if (code !== undefined && RATE_LIMIT_CODES.has(code)) return true;
	return RATE_LIMIT_PATTERNS.some((pattern) => pattern.test(message));
}

/** Classify an unknown error into the appropriate GatewayError subtype. */
export function classifyError(error: unknown): GatewayError {
	if (error instanceof GatewayError) return error;
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		const errno = errnoOf(error);

		if (isGatewayRateLimitSignal(error)) {
			return new RateLimitError("general", 1_000, { cause: error });
		}
		if (errno === "ETIMEDOUT" || msg.includes("timed out") || msg.includes("timeout")) {
			return new ConnectionTimeoutError(error.message, { cause: error });
		}
		if (errno !== undefined && CONNECTION_ERRNO.has(errno)) {
			return new ConnectionLostError(error.message, { cause: error, errno });
		}
		if (msg.includes("not connected") || msg.includes("socket") || msg.includes("connection")) {
			return new ConnectionLostError(error.message, { cause: error });
		}
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Recovery guidance ────────────────────────────────────────────────

export type RecoveryAction = "reconnect" | "wait" | "reduce_subscriptions" | "abort" | "retry";

export interface RecoveryStrategy {
	readonly shouldRetry: boolean;
	readonly retryDelayMs: number;
	readonly maxRetries: number;
	readonly action: RecoveryAction;
}

/** Suggested recovery for a classified error, for callers that surface errors to a user. */
export function recoveryStrategy(error: GatewayError): RecoveryStrategy {
	if (error instanceof ReconnectExhaustedError) {
		return { shouldRetry: false, retryDelayMs: 0, maxRetries: 0, action: "abort" };
	}
	if (error instanceof ConnectionLostError) {
		return { shouldRetry: true, retryDelayMs: 5_000, maxRetries: 3, action: "reconnect" };
	}
	if (error instanceof ConnectionTimeoutError) {
		return { shouldRetry: true, retryDelayMs: 10_000, maxRetries: 2, action: "reconnect" };
	}
	if (error instanceof RateLimitError) {
		if (error.limitType === "market_data_subscriptions") {
			return { shouldRetry: false, retryDelayMs: 0, maxRetries: 0, action: "reduce_subscriptions" };
		}
		return { shouldRetry: true, retryDelayMs: error.retryAfterMs, maxRetries: 1, action: "wait" };
	}
	if (error.severity === ErrorSeverity.Critical) {
		return { shouldRetry: false, retryDelayMs: 0, maxRetries: 0, action: "abort" };
	}
	const lowImpact = error.severity === ErrorSeverity.Low || error.severity === ErrorSeverity.Medium;
	return { shouldRetry: lowImpact, retryDelayMs: 5_000, maxRetries: 1, action: "retry" };
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for ConnectionError and its subclasses. */
export function isConnectionError(e: unknown): e is ConnectionError {
	return e instanceof ConnectionError;
}

/** Type guard for RateLimitError. */
export function isRateLimitError(e: unknown): e is RateLimitError {
	return e instanceof RateLimitError;
}

/** Type guard for CancelledError. */
export function isCancelledError(e: unknown): e is CancelledError {
	return e instanceof CancelledError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
