import type { Logger } from "pino";
import { DevicesApi } from "./api/DevicesApi.js";
import { KeysApi } from "./api/KeysApi.js";
import { PolicyApi } from "./api/PolicyApi.js";
import { CredentialResolver } from "./auth/CredentialResolver.js";
import { OAuthTokenManager } from "./auth/OAuthTokenManager.js";
import { type ConfigInput, loadConfig, parseConfig } from "./config.js";
import type { ITokenStorage } from "./core/ITokenStorage.js";
import { HttpClient } from "./infra/HttpClient.js";
import { createLogger } from "./infra/logger.js";

export interface ClientDependencies {
	/** Persists the OAuth token across restarts. */
	tokenStorage?: ITokenStorage;
	/** Defaults to a pino logger at the configured `logLevel`. */
	logger?: Logger;
}

export type TailnetClientOptions = ConfigInput & ClientDependencies;

/**
 * Client for one tailnet. Owns its OAuth token state and connection pool;
 * call {@link close} (or use {@link withClient}) when done.
 */
export class TailnetClient {
	readonly devices: DevicesApi;
	readonly keys: KeysApi;
	readonly policy: PolicyApi;

	private readonly credentials: CredentialResolver;
	private readonly http: HttpClient;

	constructor(options: TailnetClientOptions = {}) {
		const { tokenStorage, logger, ...input } = options;
		const config = parseConfig(input);
		const log = logger ?? createLogger(config.logLevel);

		this.credentials = new CredentialResolver({
			credentials: config,
			apiKeyScheme: config.apiKeyScheme,
			logger: log,
			createTokenSource: ({ clientId, clientSecret }) =>
				new OAuthTokenManager({
					baseUrl: config.baseUrl,
					clientId,
					clientSecret,
					timeoutMs: config.requestTimeoutMs,
					logger: log,
					storage: tokenStorage,
				}),
		});
		this.http = new HttpClient({
			baseURL: config.baseUrl,
			auth: this.credentials,
			logger: log,
			timeoutMs: config.requestTimeoutMs,
		});

		this.devices = new DevicesApi(this.http, config.tailnet);
		this.keys = new KeysApi(this.http, config.tailnet);
		this.policy = new PolicyApi(this.http, config.tailnet);
	}

	/** Builds a client from `TS_*` environment variables. */
	static fromEnv(dependencies: ClientDependencies = {}): TailnetClient {
		return new TailnetClient({ ...loadConfig(), ...dependencies });
	}

	/** Drops the cached OAuth token; the next request acquires a new one. */
	invalidateToken(): void {
		this.credentials.invalidate();
	}

	/** Cancels token timers and pending acquisitions, and releases sockets. */
	close(): void {
		this.credentials.close();
		this.http.close();
	}
}

/** Runs `fn` with a fresh client and closes it once `fn` settles. */
export async function withClient<T>(
	options: TailnetClientOptions,
	fn: (client: TailnetClient) => Promise<T>,
): Promise<T> {
	const client = new TailnetClient(options);
	try {
		return await fn(client);
	} finally {
		client.close();
	}
}
