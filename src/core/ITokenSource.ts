export interface ITokenSource {
	/** Returns a valid access token, serving from cache when possible. */
	accessToken(): Promise<string>;

	/**
	 * Invalidates the cached token, forcing the next call to re-authenticate.
	 * With `rejected`, acts only while that exact token is the cached one.
	 */
	invalidate(rejected?: string): void;

	/** Cancels timers and in-flight work; the source is unusable afterwards. */
	close(): void;
}
