import { ConfigError } from "../shared/errors.js";

/**
 * Bounded set of symbols with an active market-data subscription.
 * The gateway caps concurrent market-data lines per account.
 */
export class SubscriptionTracker {
	private readonly maxLines: number;
	private readonly symbols = new Set<string>();

	constructor(maxLines: number) {
		if (maxLines < 1) {
			throw new ConfigError("maxLines must be >= 1", { maxLines });
		}
		this.maxLines = maxLines;
	}

	/** Adds a symbol; false only when it is new and every line is taken. */
	add(symbol: string): boolean {
		if (this.symbols.has(symbol)) return true;
		if (this.symbols.size >= this.maxLines) return false;
		this.symbols.add(symbol);
		return true;
	}

	/** Removes a symbol; returns whether it was subscribed. */
	remove(symbol: string): boolean {
		return this.symbols.delete(symbol);
	}

	clear(): void {
		this.symbols.clear();
	}

	has(symbol: string): boolean {
		return this.symbols.has(symbol);
	}

	get size(): number {
		return this.symbols.size;
	}

	get capacity(): number {
		return this.maxLines;
	}

	isFull(): boolean {
		return this.symbols.size >= this.maxLines;
	}

	/** Subscribed symbols in insertion order. */
	list(): readonly string[] {
		return [...this.symbols];
	}
}
