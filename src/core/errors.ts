export class AppError extends Error {
	constructor(
		public code: string,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = this.constructor.name;
	}
}

export class ConfigurationError extends AppError {
	constructor(message: string, options?: ErrorOptions) {
		super("CONFIGURATION_ERROR", message, options);
	}
}

export class AuthenticationError extends AppError {
	constructor(message: string, options?: ErrorOptions) {
		super("AUTHENTICATION_ERROR", message, options);
	}
}

/** Raised to every waiter of a token acquisition that was invalidated mid-flight. */
export class TokenAcquisitionCancelledError extends AuthenticationError {
	constructor(message = "OAuth token acquisition was cancelled") {
		super(message);
		this.code = "TOKEN_ACQUISITION_CANCELLED";
	}
}

export class ConnectionError extends AppError {
	constructor(message: string, options?: ErrorOptions) {
		super("CONNECTION_ERROR", message, options);
	}
}

export class RequestError extends AppError {
	constructor(
		message: string,
		public readonly httpStatus: number,
		options?: ErrorOptions,
	) {
		super("REQUEST_ERROR", message, options);
	}
}
