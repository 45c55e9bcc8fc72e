/**
 * ConnectionStateMachine: validated connection lifecycle FSM.
 *
 * All transitions go through transition() which validates the move.
 * History is bounded (last N transitions) for debugging.
 */

import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import {
	ConnectionState,
	type ConnectionTransition,
	type StateError,
	StateErrorKind,
	type TransitionRecord,
} from "./types.js";

const MAX_HISTORY = 100;

export class ConnectionStateMachine {
	private current: ConnectionState;
	private currentEnteredAt: number;
	private readonly transitions: TransitionRecord[];
	private readonly clock: Clock;

	constructor(clock: Clock = SystemClock) {
		this.clock = clock;
		this.current = ConnectionState.Disconnected;
		this.currentEnteredAt = clock.now();
		this.transitions = [];
	}

	// ── Queries ────────────────────────────────────────────────────

	state(): ConnectionState {
		return this.current;
	}

	isTerminal(): boolean {
		return this.current === ConnectionState.Shutdown;
	}

	/** Time spent in the current state (ms) */
	timeInState(): number {
		return this.clock.now() - this.currentEnteredAt;
	}

	/** Bounded transition history (most recent last) */
	history(): readonly TransitionRecord[] {
		return this.transitions;
	}

	// ── Transitions ────────────────────────────────────────────────

	transition(t: ConnectionTransition): Result<ConnectionState, StateError> {
		const from = this.current;

		if (from === ConnectionState.Shutdown) {
			return err({
				kind: StateErrorKind.AlreadyTerminal,
				message: "Connection monitor already shut down",
				from,
				transition: t.type,
			});
		}

		const next = nextState(from, t);
		if (next === null) {
			return err({
				kind: StateErrorKind.InvalidTransition,
				message: `Cannot transition from ${from} via ${t.type}`,
				from,
				transition: t.type,
			});
		}

		this.recordTransition({ from, to: next, transition: t.type, timestamp: this.clock.now() });
		this.current = next;
		this.currentEnteredAt = this.clock.now();
		return ok(next);
	}

	private recordTransition(record: TransitionRecord): void {
		if (this.transitions.length >= MAX_HISTORY) {
			this.transitions.shift();
		}
		this.transitions.push(record);
	}
}

function nextState(from: ConnectionState, t: ConnectionTransition): ConnectionState | null {
	switch (t.type) {
		case "start":
			// error → connecting is the external restart after exhausted recovery
			if (from === ConnectionState.Disconnected || from === ConnectionState.Error) {
				return ConnectionState.Connecting;
			}
			return null;

		case "connect_succeeded":
			return from === ConnectionState.Connecting ? ConnectionState.Connected : null;

		case "connect_failed":
			return from === ConnectionState.Connecting ? ConnectionState.Error : null;

		case "connection_lost":
			return from === ConnectionState.Connected ? ConnectionState.Disconnected : null;

		case "begin_recovery":
			if (
				from === ConnectionState.Connected ||
				from === ConnectionState.Disconnected ||
				from === ConnectionState.Error
			) {
				return ConnectionState.Reconnecting;
			}
			return null;

		case "recovery_succeeded":
			return from === ConnectionState.Reconnecting ? ConnectionState.Connected : null;

		case "recovery_exhausted":
			return from === ConnectionState.Reconnecting ? ConnectionState.Error : null;

		case "shutdown":
			// Any non-terminal state can shut down
			return ConnectionState.Shutdown;
	}
}
