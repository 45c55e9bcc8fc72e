/**
 * Time utilities: injectable clock, cancellable sleep and timeouts.
 *
 * Components read time through Clock.now() instead of Date.now() directly,
 * so tests can drive token refill and window eviction without real waiting.
 */

import { CancelledError, ConnectionTimeoutError } from "./errors.js";

/** Injectable time source -- components depend on this instead of `Date.now()`. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

// ── Duration helpers ─────────────────────────────────────────────────

/** Helpers to convert human-readable durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
} as const;

// ── Suspension ───────────────────────────────────────────────────────

/** Suspends for `ms`; rejects with CancelledError as soon as `signal` aborts. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) => {
	if (signal?.aborted) {
		return Promise.reject(new CancelledError("Sleep aborted before it started"));
	}
	if (ms <= 0) return Promise.resolve();

	return new Promise<void>((resolve, reject) => {
		const onAbort = () => {
			clearTimeout(timer);
			reject(new CancelledError("Sleep aborted", { remainingMs: ms }));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
};

/**
 * Races `work` against a timer. The timer is always cleared once `work` settles.
 * @throws ConnectionTimeoutError when `timeoutMs` elapses first
 */
export function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
	if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return work;

	let timer: ReturnType<typeof setTimeout> | undefined;
	const expiry = new Promise<never>((_resolve, reject) => {
		timer = setTimeout(() => {
			reject(new ConnectionTimeoutError(`${label} timed out after ${timeoutMs}ms`, { timeoutMs }));
		}, timeoutMs);
	});

	return Promise.race([work, expiry]).finally(() => {
		clearTimeout(timer);
	});
}
