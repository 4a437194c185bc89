import axios from "axios";
import {
	AppError,
	AuthenticationError,
	ConnectionError,
	RequestError,
} from "../core/errors.js";

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

/**
 * Maps a failed axios call onto the client's error taxonomy.
 * `context` names the call in the message, e.g. "API request".
 */
export function toTransportError(error: unknown, context: string): AppError {
	if (error instanceof AppError) {
		return error;
	}
	if (!axios.isAxiosError(error)) {
		return new RequestError(
			`${context} failed: ${error instanceof Error ? error.message : "Unknown error"}`,
			0,
			{ cause: error },
		);
	}

	const status = error.response?.status;
	if (status === undefined) {
		if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
			return new ConnectionError(`${context} timed out`, { cause: error });
		}
		return new ConnectionError(`${context} failed: ${error.message}`, {
			cause: error,
		});
	}
	if (status === 401 || status === 403) {
		return new AuthenticationError(`${context} was rejected (HTTP ${status})`, {
			cause: error,
		});
	}
	return new RequestError(`${context} failed (HTTP ${status})`, status, {
		cause: error,
	});
}
