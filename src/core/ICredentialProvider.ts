export type CredentialSource = "static" | "oauth";

export interface Credential {
	/** Full `Authorization` header value, scheme included. */
	authorization: string;
	source: CredentialSource;
	/** The bare key or access token inside `authorization`. */
	token: string;
}

export interface ICredentialProvider {
	/** Returns a usable credential, acquiring an OAuth token when needed. */
	resolve(): Promise<Credential>;

	/**
	 * Drops the cached OAuth token so the next resolve() acquires a fresh one.
	 * With `rejected`, only a cached token with that value is dropped.
	 */
	invalidate(rejected?: string): void;
}
