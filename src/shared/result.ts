/**
 * Result<T, E>: failure as a value.
 *
 * Used where failing is part of normal operation, such as a rejected
 * state-machine transition or a configuration that does not validate.
 * Gateway I/O throws GatewayError subclasses instead.
 */

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

export const err = <E>(error: E): Err<E> => ({ ok: false, error });

export const isOk = <T, E>(result: Result<T, E>): result is Ok<T> => result.ok;

export const isErr = <T, E>(result: Result<T, E>): result is Err<E> => !result.ok;

/** Value of an ok result. Throws the error of an err result, wrapping anything that is not an Error. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	const { error } = result;
	if (error instanceof Error) throw error;
	throw new Error(`unwrap on err: ${String(error)}`);
}
