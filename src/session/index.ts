export {
	GatewaySession,
	type GatewaySessionOptions,
	type SessionHealth,
} from "./gateway-session.js";
