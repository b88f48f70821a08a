export enum ErrorCode {
	// Event pipeline errors
	CHANNEL_CLOSED = "CHANNEL_CLOSED",

	// Simulation errors
	SIMULATION_ALREADY_RAN = "SIMULATION_ALREADY_RAN",

	// Client errors
	CLIENT_NOT_AUTHENTICATED = "CLIENT_NOT_AUTHENTICATED",
	CLIENT_REQUEST_FAILED = "CLIENT_REQUEST_FAILED",
	CLIENT_TIMEOUT = "CLIENT_TIMEOUT",

	// Homeserver (in-memory) errors
	ROOM_NOT_FOUND = "ROOM_NOT_FOUND",
	NOT_INVITED = "NOT_INVITED",
	INJECTED_FAILURE = "INJECTED_FAILURE",

	// Configuration errors
	CONFIG_INVALID = "CONFIG_INVALID",

	// Generic fallback
	UNKNOWN = "UNKNOWN",
}

export class SimulationError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message?: string,
	) {
		super(message || code);
		this.name = code;
	}
}

/** The event channel was closed while a producer or the consumer still needed it. */
export class ChannelClosedError extends SimulationError {
	constructor(message = "Event channel closed") {
		super(ErrorCode.CHANNEL_CLOSED, message);
	}
}

export class ClientError extends SimulationError {}

export class ConfigError extends SimulationError {
	constructor(
		public readonly key: string,
		message: string,
	) {
		super(ErrorCode.CONFIG_INVALID, `Invalid configuration "${key}": ${message}`);
	}
}
