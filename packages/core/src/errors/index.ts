export type KumoErrorCode =
	| "INSUFFICIENT_DATA"
	| "MALFORMED_QUOTE"
	| "PERSISTENCE_FAILURE"
	| "GATEWAY_FAILURE"
	| "CONFIG_INVALID";

export class KumoError extends Error {
	readonly code: KumoErrorCode;

	constructor(code: KumoErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/**
 * Raised when a series is shorter than a computation needs. Nothing is
 * produced: callers never see partial output.
 */
export class InsufficientDataError extends KumoError {
	constructor(
		readonly operation: string,
		readonly required: number,
		readonly actual: number
	) {
		super(
			"INSUFFICIENT_DATA",
			`${operation} needs at least ${required} quotes, got ${actual}`
		);
	}
}

export class MalformedQuoteError extends KumoError {
	constructor(message: string, options?: ErrorOptions) {
		super("MALFORMED_QUOTE", message, options);
	}
}

export class PersistenceError extends KumoError {
	constructor(
		readonly path: string,
		message: string,
		options?: ErrorOptions
	) {
		super("PERSISTENCE_FAILURE", message, options);
	}
}

export class GatewayError extends KumoError {
	constructor(
		message: string,
		readonly status?: number,
		options?: ErrorOptions
	) {
		super("GATEWAY_FAILURE", message, options);
	}
}

export class ConfigError extends KumoError {
	constructor(message: string) {
		super("CONFIG_INVALID", message);
	}
}

export const isKumoError = (value: unknown): value is KumoError =>
	value instanceof KumoError;

export const errorMessage = (value: unknown): string =>
	value instanceof Error ? value.message : String(value);
