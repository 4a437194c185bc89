export interface StoredToken {
	accessToken: string;
	expiresAt: Date;
}

/**
 * Persists the OAuth access token across process restarts.
 * Entries may be stale or missing; the token manager falls back to a fresh exchange.
 */
export interface ITokenStorage {
	load(): Promise<StoredToken | null>;
	save(token: StoredToken): Promise<void>;
}
