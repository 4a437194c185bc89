import { ConnectionError } from "../core/errors.js";

/** Rejects with a ConnectionError when `promise` has not settled after `timeoutMs`. */
export function withTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
	message: string,
): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const timer = setTimeout(() => {
			reject(new ConnectionError(message));
		}, timeoutMs);
		timer.unref();
		promise.then(
			(value) => {
				clearTimeout(timer);
				resolve(value);
			},
			(error: unknown) => {
				clearTimeout(timer);
				reject(error);
			},
		);
	});
}

/**
 * Settles with `promise`, unless `signal` aborts first, in which case it
 * rejects with the error built by `onAbort`.
 */
export function abortable<T>(
	promise: Promise<T>,
	signal: AbortSignal,
	onAbort: () => Error,
): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const listener = () => reject(onAbort());
		promise.then(
			(value) => {
				signal.removeEventListener("abort", listener);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener("abort", listener);
				reject(error);
			},
		);
		if (signal.aborted) {
			listener();
		} else {
			signal.addEventListener("abort", listener, { once: true });
		}
	});
}
