/**
 * Logger wrapper: structured logging backed by pino.
 *
 * Components receive a Logger and derive a child bound to their name
 * (`component: "connection-monitor"`). Library consumers that pass nothing get
 * a silent logger. Brokerage account identifiers are redacted by default.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe; `silent` disables output. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	/** Value of the `name` field on every line. */
	readonly name?: string;
	/** Extra pino redaction paths, added to the account-id defaults. */
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

export const DEFAULT_REDACT_PATHS: readonly string[] = ["accountId", "*.accountId"];

// ── Factory ─────────────────────────────────────────────────────────

type LogMethod = "info" | "warn" | "error" | "debug";

function forward(target: pino.Logger, method: LogMethod, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "object" && msgOrObj !== null) {
		target[method](msgOrObj, msg ?? "");
	} else {
		target[method](String(msgOrObj ?? ""));
	}
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", name: "gateway" });
 * logger.child({ component: "rate-limiter" }).warn({ backoffMs: 200 }, "Backing off");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
		redact: {
			paths: [...DEFAULT_REDACT_PATHS, ...(config.redactPaths ?? [])],
			censor: "[REDACTED]",
		},
	};
	if (config.name !== undefined) {
		pinoOptions.name = config.name;
	}

	if (config.destination) {
		const sink = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				sink.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}
	return wrapPino(pino(pinoOptions));
}

/** Logger that discards everything; the default for components built without one. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
