import { EventEmitter } from "eventemitter3";

/**
 * Typed event map -- keys are event names, values are handler signatures.
 * Example: { stateChange: (from: ConnectionState, to: ConnectionState) => void }
 */
export type EventMap = Record<string, (...args: never[]) => void>;

/** Receives any error thrown by a listener during `emit`. */
export type ListenerErrorHandler = (event: string, error: unknown) => void;

/**
 * Type-safe event emitter wrapping eventemitter3.
 *
 * A throwing listener never breaks the emitter's caller: the error goes to the
 * `onListenerError` handler and the remaining listeners still run.
 *
 * @example
 * ```ts
 * type Events = { stateChange: (from: string, to: string) => void };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("stateChange", (from, to) => console.log(from, "->", to));
 * emitter.emit("stateChange", "connecting", "connected");
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();
	private readonly onListenerError: ListenerErrorHandler | null;

	constructor(onListenerError?: ListenerErrorHandler) {
		this.onListenerError = onListenerError ?? null;
	}

	/** Registers a handler; returns a function that removes it again. */
	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): () => void {
		const guarded = this.guard(event, handler);
		this.ee.on(event, guarded);
		return () => {
			this.ee.off(event, guarded);
		};
	}

	/** Registers a handler that auto-removes after its first invocation. */
	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): () => void {
		const guarded = this.guard(event, handler);
		this.ee.once(event, guarded);
		return () => {
			this.ee.off(event, guarded);
		};
	}

	/** Emits an event to every registered handler, in registration order. */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	/** Removes all listeners for one event, or for every event when none is given. */
	removeAllListeners<K extends keyof TEvents & string>(event?: K): void {
		if (event) {
			this.ee.removeAllListeners(event);
		} else {
			this.ee.removeAllListeners();
		}
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}

	private guard<K extends keyof TEvents & string>(
		event: K,
		handler: TEvents[K],
	): (...args: unknown[]) => void {
		const call = handler as (...args: unknown[]) => void;
		return (...args: unknown[]) => {
			try {
				call(...args);
			} catch (error) {
				this.onListenerError?.(event, error);
			}
		};
	}
}
