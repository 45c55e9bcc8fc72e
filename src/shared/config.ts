/**
 * Gateway configuration: one validated object that fully determines a session.
 *
 * Defaults are conservative for a desktop trading gateway. Every knob can be
 * overridden from GATEWAY_* environment variables or programmatically; the
 * merged result is validated with zod before any component sees it.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { type ValidationError, validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import type { Result } from "./result.js";

export interface ConnectionSettings {
	/** Run the liveness and heartbeat loops after connecting */
	readonly monitorEnabled: boolean;
	/** Period of both background checks; liveness fails after 3 silent periods */
	readonly heartbeatIntervalMs: number;
	readonly maxReconnectAttempts: number;
	/** Base of the reconnect backoff: attempt n sleeps base × 2^(n-1) */
	readonly reconnectDelayMs: number;
	/** Upper bound for a single connect(); 0 disables the timeout */
	readonly connectTimeoutMs: number;
}

export interface RateLimitSettings {
	readonly enabled: boolean;
	/** Refill rate of the general bucket */
	readonly maxRequestsPerSecond: number;
	/** Capacity of the general bucket */
	readonly burstSize: number;
	/** Refill rate of the order bucket; its capacity is twice this */
	readonly maxOrdersPerSecond: number;
	/** Ceiling of accepted historical-data requests per window */
	readonly maxHistoricalRequests: number;
	readonly historicalWindowMs: number;
	/** Maximum concurrently subscribed market-data symbols */
	readonly maxMarketDataLines: number;
	readonly initialBackoffMs: number;
	readonly maxBackoffMs: number;
	readonly backoffMultiplier: number;
}

export interface RetrySettings {
	/** Total attempts made by the connection retry wrapper */
	readonly maxRetries: number;
	/** Base of the retry backoff: retry n sleeps base × 2^n */
	readonly baseDelayMs: number;
}

export interface GatewayConfig {
	readonly name: string;
	readonly logLevel: LogLevel;
	readonly connection: ConnectionSettings;
	readonly rateLimit: RateLimitSettings;
	readonly retry: RetrySettings;
}

/** Partial overrides, merged section by section over the defaults. */
export interface GatewayConfigInput {
	name?: string;
	logLevel?: LogLevel;
	connection?: Partial<ConnectionSettings>;
	rateLimit?: Partial<RateLimitSettings>;
	retry?: Partial<RetrySettings>;
}

export const DEFAULT_CONNECTION_SETTINGS: ConnectionSettings = {
	monitorEnabled: true,
	heartbeatIntervalMs: 10_000,
	maxReconnectAttempts: 5,
	reconnectDelayMs: 5_000,
	connectTimeoutMs: 30_000,
};

export const DEFAULT_RATE_LIMIT_SETTINGS: RateLimitSettings = {
	enabled: true,
	maxRequestsPerSecond: 50,
	burstSize: 10,
	maxOrdersPerSecond: 5,
	maxHistoricalRequests: 60,
	historicalWindowMs: 600_000,
	maxMarketDataLines: 100,
	initialBackoffMs: 100,
	maxBackoffMs: 30_000,
	backoffMultiplier: 2,
};

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
	maxRetries: 3,
	baseDelayMs: 1_000,
};

export const DEFAULT_GATEWAY_CONFIG: GatewayConfig = {
	name: "gateway",
	logLevel: "info",
	connection: DEFAULT_CONNECTION_SETTINGS,
	rateLimit: DEFAULT_RATE_LIMIT_SETTINGS,
	retry: DEFAULT_RETRY_SETTINGS,
};

// ── Schema ──────────────────────────────────────────────────────────

const int = () => z.number().int();

const connectionSchema = z.object({
	monitorEnabled: z.boolean(),
	heartbeatIntervalMs: int().min(1_000).max(60_000),
	maxReconnectAttempts: int().min(1).max(20),
	reconnectDelayMs: int().min(0).max(60_000),
	connectTimeoutMs: int().min(0).max(300_000),
});

const rateLimitSchema = z
	.object({
		enabled: z.boolean(),
		maxRequestsPerSecond: int().min(1).max(100),
		burstSize: int().min(1),
		maxOrdersPerSecond: int().min(1).max(20),
		maxHistoricalRequests: int().min(1),
		historicalWindowMs: int().min(1_000),
		maxMarketDataLines: int().min(1).max(100),
		initialBackoffMs: int().min(1),
		maxBackoffMs: int().min(1),
		backoffMultiplier: z.number().min(1),
	})
	.refine((s) => s.maxBackoffMs >= s.initialBackoffMs, {
		message: "maxBackoffMs must be >= initialBackoffMs",
		path: ["maxBackoffMs"],
	});

const retrySchema = z.object({
	maxRetries: int().min(1).max(10),
	baseDelayMs: int().min(0).max(60_000),
});

export const gatewayConfigSchema = z.object({
	name: z.string().min(1),
	logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]),
	connection: connectionSchema,
	rateLimit: rateLimitSchema,
	retry: retrySchema,
});

// ── Loading ─────────────────────────────────────────────────────────

/**
 * Merges defaults, environment overrides and explicit overrides (in that
 * order of precedence, lowest first) and validates the result.
 */
export function loadGatewayConfig(
	overrides: GatewayConfigInput = {},
	env: NodeJS.ProcessEnv = process.env,
): Result<GatewayConfig, ValidationError> {
	const fromEnv = configFromEnv(env);
	const merged = {
		name: overrides.name ?? fromEnv.name ?? DEFAULT_GATEWAY_CONFIG.name,
		logLevel: overrides.logLevel ?? fromEnv.logLevel ?? DEFAULT_GATEWAY_CONFIG.logLevel,
		connection: { ...DEFAULT_CONNECTION_SETTINGS, ...fromEnv.connection, ...overrides.connection },
		rateLimit: { ...DEFAULT_RATE_LIMIT_SETTINGS, ...fromEnv.rateLimit, ...overrides.rateLimit },
		retry: { ...DEFAULT_RETRY_SETTINGS, ...fromEnv.retry, ...overrides.retry },
	};
	return validate(gatewayConfigSchema, merged);
}

/** Safety features an operator switched off, one message per feature. */
export function configWarnings(config: GatewayConfig): string[] {
	const warnings: string[] = [];
	if (!config.rateLimit.enabled) warnings.push("Rate limiting is disabled");
	if (!config.connection.monitorEnabled) warnings.push("Connection monitoring is disabled");
	if (config.connection.connectTimeoutMs === 0) warnings.push("Connect timeout is disabled");
	return warnings;
}

// ── Environment ─────────────────────────────────────────────────────

type Draft<T> = { -readonly [K in keyof T]?: T[K] };

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(raw: string): raw is LogLevel {
	return LOG_LEVELS.some((level) => level === raw);
}

/**
 * Reads overrides from GATEWAY_* environment variables. Unset or empty
 * variables are skipped.
 * @throws ConfigError if a variable holds a malformed value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): GatewayConfigInput {
	const connection: Draft<ConnectionSettings> = {};
	const rateLimit: Draft<RateLimitSettings> = {};
	const retry: Draft<RetrySettings> = {};
	const result: GatewayConfigInput = {};

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const name = env["GATEWAY_NAME"];
	if (name) result.name = name;

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const level = env["GATEWAY_LOG_LEVEL"];
	if (level) {
		if (!isLogLevel(level)) {
			throw new ConfigError(`Invalid GATEWAY_LOG_LEVEL: "${level}"`, { allowed: LOG_LEVELS });
		}
		result.logLevel = level;
	}

	const monitorEnabled = readBool(env, "GATEWAY_MONITOR_ENABLED");
	if (monitorEnabled !== undefined) connection.monitorEnabled = monitorEnabled;
	const heartbeat = readInt(env, "GATEWAY_HEARTBEAT_INTERVAL_MS");
	if (heartbeat !== undefined) connection.heartbeatIntervalMs = heartbeat;
	const attempts = readInt(env, "GATEWAY_MAX_RECONNECT_ATTEMPTS");
	if (attempts !== undefined) connection.maxReconnectAttempts = attempts;
	const reconnectDelay = readInt(env, "GATEWAY_RECONNECT_DELAY_MS");
	if (reconnectDelay !== undefined) connection.reconnectDelayMs = reconnectDelay;
	const connectTimeout = readInt(env, "GATEWAY_CONNECT_TIMEOUT_MS");
	if (connectTimeout !== undefined) connection.connectTimeoutMs = connectTimeout;

	const enabled = readBool(env, "GATEWAY_RATE_LIMIT_ENABLED");
	if (enabled !== undefined) rateLimit.enabled = enabled;
	const rps = readInt(env, "GATEWAY_MAX_REQUESTS_PER_SECOND");
	if (rps !== undefined) rateLimit.maxRequestsPerSecond = rps;
	const burst = readInt(env, "GATEWAY_BURST_SIZE");
	if (burst !== undefined) rateLimit.burstSize = burst;
	const orders = readInt(env, "GATEWAY_MAX_ORDERS_PER_SECOND");
	if (orders !== undefined) rateLimit.maxOrdersPerSecond = orders;
	const historical = readInt(env, "GATEWAY_MAX_HISTORICAL_REQUESTS");
	if (historical !== undefined) rateLimit.maxHistoricalRequests = historical;
	const lines = readInt(env, "GATEWAY_MAX_MARKET_DATA_LINES");
	if (lines !== undefined) rateLimit.maxMarketDataLines = lines;
	const initialBackoff = readInt(env, "GATEWAY_INITIAL_BACKOFF_MS");
	if (initialBackoff !== undefined) rateLimit.initialBackoffMs = initialBackoff;
	const maxBackoff = readInt(env, "GATEWAY_MAX_BACKOFF_MS");
	if (maxBackoff !== undefined) rateLimit.maxBackoffMs = maxBackoff;
	const multiplier = readFloat(env, "GATEWAY_BACKOFF_MULTIPLIER");
	if (multiplier !== undefined) rateLimit.backoffMultiplier = multiplier;

	const retries = readInt(env, "GATEWAY_RETRY_MAX_ATTEMPTS");
	if (retries !== undefined) retry.maxRetries = retries;
	const retryDelay = readInt(env, "GATEWAY_RETRY_BASE_DELAY_MS");
	if (retryDelay !== undefined) retry.baseDelayMs = retryDelay;

	if (Object.keys(connection).length > 0) result.connection = connection;
	if (Object.keys(rateLimit).length > 0) result.rateLimit = rateLimit;
	if (Object.keys(retry).length > 0) result.retry = retry;
	return result;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function readInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < 0) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a non-negative integer`);
	}
	return parsed;
}

function readFloat(env: NodeJS.ProcessEnv, key: string): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const parsed = Number(raw.trim());
	if (!Number.isFinite(parsed)) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a number`);
	}
	return parsed;
}

function readBool(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
	const raw = env[key];
	if (raw === undefined || raw === "") return undefined;
	if (raw !== "true" && raw !== "false") {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be "true" or "false"`);
	}
	return raw === "true";
}
