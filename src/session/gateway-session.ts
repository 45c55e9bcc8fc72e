/**
 * GatewaySession: one connection monitor and one rate limiter built from a
 * single validated configuration, with `guarded()` as the call entry point.
 *
 * Sessions are plain instances; nothing here is process-wide, so several
 * gateway accounts can run side by side in one process.
 */

import { ConnectionMonitor } from "../connection/connection-monitor.js";
import type { ConnectionFactory, GatewayConnection, HealthSnapshot } from "../connection/types.js";
import type { ConnectedOperation } from "../connection/with-connection-retry.js";
import { type GuardPolicy, guarded } from "../guard/guarded.js";
import type { Logger } from "../lib/logger/index.js";
import { createLogger } from "../lib/logger/index.js";
import type { ValidationError } from "../lib/validation/index.js";
import { RateLimiter } from "../rate-limit/rate-limiter.js";
import type { RateLimiterStats } from "../rate-limit/stats.js";
import {
	DEFAULT_GATEWAY_CONFIG,
	type GatewayConfig,
	type GatewayConfigInput,
	configWarnings,
	loadGatewayConfig,
} from "../shared/config.js";
import { type Result, ok } from "../shared/result.js";
import type { Clock, Sleep } from "../shared/time.js";
import { SystemClock, sleep as defaultSleep } from "../shared/time.js";

export interface GatewaySessionOptions<H extends GatewayConnection> {
	readonly factory: ConnectionFactory<H>;
	/** Already validated; see `GatewaySession.create` for raw input. */
	readonly config?: GatewayConfig;
	/** Defaults to a pino logger at the configured level. */
	readonly logger?: Logger;
	readonly clock?: Clock;
	readonly sleep?: Sleep;
}

/** Connection and throttling state in one report. */
export interface SessionHealth {
	readonly name: string;
	/** Connection healthy and no gateway backoff in force. */
	readonly healthy: boolean;
	readonly connection: HealthSnapshot;
	readonly rateLimit: RateLimiterStats;
}

export class GatewaySession<H extends GatewayConnection> {
	readonly config: GatewayConfig;
	readonly monitor: ConnectionMonitor<H>;
	readonly limiter: RateLimiter;
	private readonly log: Logger;
	private readonly sleep: Sleep;

	/**
	 * Validates `input` merged over `GATEWAY_*` variables from `env` and the
	 * defaults, then builds the session.
	 *
	 * @throws ConfigError when an environment variable cannot be parsed
	 */
	static create<H extends GatewayConnection>(
		factory: ConnectionFactory<H>,
		input: GatewayConfigInput = {},
		options: Omit<GatewaySessionOptions<H>, "factory" | "config"> & {
			readonly env?: NodeJS.ProcessEnv;
		} = {},
	): Result<GatewaySession<H>, ValidationError> {
		const { env, ...rest } = options;
		const loaded = loadGatewayConfig(input, env ?? process.env);
		if (!loaded.ok) return loaded;
		return ok(new GatewaySession({ ...rest, factory, config: loaded.value }));
	}

	constructor(options: GatewaySessionOptions<H>) {
		this.config = options.config ?? DEFAULT_GATEWAY_CONFIG;
		this.log =
			options.logger ?? createLogger({ level: this.config.logLevel, name: this.config.name });
		this.sleep = options.sleep ?? defaultSleep;
		const clock = options.clock ?? SystemClock;

		this.monitor = new ConnectionMonitor({
			factory: options.factory,
			settings: this.config.connection,
			logger: this.log,
			clock,
			sleep: this.sleep,
		});
		this.limiter = new RateLimiter({
			settings: this.config.rateLimit,
			logger: this.log,
			clock,
			sleep: this.sleep,
		});
	}

	/** Connects and starts the background checks. */
	async start(): Promise<void> {
		for (const warning of configWarnings(this.config)) {
			this.log.warn({ session: this.config.name }, warning);
		}
		await this.monitor.start();
		this.log.info({ session: this.config.name }, "Gateway session started");
	}

	/** Stops the monitor and forgets market-data lines; idempotent. */
	async stop(): Promise<void> {
		await this.monitor.stop();
		this.limiter.clearSubscriptions();
		this.log.info({ session: this.config.name }, "Gateway session stopped");
	}

	/**
	 * Runs `operation` throttled and with connection retry. Retry settings
	 * default to the session configuration; `policy.retry` overrides them.
	 */
	guarded<T>(operation: ConnectedOperation<H, T>, policy: GuardPolicy = {}): Promise<T> {
		return guarded({ monitor: this.monitor, limiter: this.limiter }, operation, {
			...policy,
			retry: {
				...this.config.retry,
				sleep: this.sleep,
				logger: this.log,
				...policy.retry,
			},
		});
	}

	health(): SessionHealth {
		const connection = this.monitor.health();
		const rateLimit = this.limiter.getStats();
		return {
			name: this.config.name,
			healthy: connection.healthy && !rateLimit.inBackoff,
			connection,
			rateLimit,
		};
	}
}
