import type { GatewayConnection } from "./types.js";

/**
 * Capabilities of one session handle, probed once when the handle is produced.
 * A null member means the handle does not offer it.
 */
export interface ResolvedCapabilities {
	readonly connect: (() => Promise<void>) | null;
	readonly disconnect: (() => Promise<void>) | null;
	readonly ping: (() => Promise<void>) | null;
	readonly isConnected: (() => boolean) | null;
}

/** A live handle together with its resolved capabilities. */
export interface ConnectionLink<H extends GatewayConnection> {
	readonly handle: H;
	readonly caps: ResolvedCapabilities;
}

export function resolveCapabilities(handle: GatewayConnection): ResolvedCapabilities {
	const { connect, disconnect, ping, isConnected } = handle;
	return {
		connect: connect
			? async () => {
					await connect.call(handle);
				}
			: null,
		disconnect: disconnect
			? async () => {
					await disconnect.call(handle);
				}
			: null,
		ping: ping
			? async () => {
					await ping.call(handle);
				}
			: null,
		isConnected: isConnected ? () => isConnected.call(handle) : null,
	};
}

export function link<H extends GatewayConnection>(handle: H): ConnectionLink<H> {
	return { handle, caps: resolveCapabilities(handle) };
}
