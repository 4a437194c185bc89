import type { Logger } from "pino";
import { AuthenticationError, ConfigurationError } from "../core/errors.js";
import type {
	Credential,
	ICredentialProvider,
} from "../core/ICredentialProvider.js";
import type { ITokenSource } from "../core/ITokenSource.js";

export type ApiKeyScheme = "bearer" | "basic";

export interface Credentials {
	apiKey?: string;
	oauthClientId?: string;
	oauthClientSecret?: string;
}

export interface OAuthClientCredentials {
	clientId: string;
	clientSecret: string;
}

export interface CredentialResolverOptions {
	credentials: Credentials;
	apiKeyScheme: ApiKeyScheme;
	logger: Logger;
	/** Builds the token source the first time OAuth mode is selected. */
	createTokenSource: (credentials: OAuthClientCredentials) => ITokenSource;
}

type AuthMode =
	| { kind: "static"; apiKey: string; authorization: string }
	| { kind: "oauth"; tokens: ITokenSource };

/**
 * Picks static-key or OAuth authentication from the configured credentials.
 * The combination is validated on first use, not at construction.
 */
export class CredentialResolver implements ICredentialProvider {
	private readonly options: CredentialResolverOptions;
	private readonly logger: Logger;
	private mode: AuthMode | null = null;
	private closed = false;

	constructor(options: CredentialResolverOptions) {
		this.options = options;
		this.logger = options.logger.child({ component: "CredentialResolver" });
	}

	async resolve(): Promise<Credential> {
		if (this.closed) {
			throw new AuthenticationError("Client has been closed");
		}
		const mode = (this.mode ??= this.selectMode());
		if (mode.kind === "static") {
			return {
				authorization: mode.authorization,
				source: "static",
				token: mode.apiKey,
			};
		}
		const token = await mode.tokens.accessToken();
		return { authorization: `Bearer ${token}`, source: "oauth", token };
	}

	invalidate(rejected?: string): void {
		if (this.mode?.kind === "oauth") {
			this.mode.tokens.invalidate(rejected);
		}
	}

	close(): void {
		this.closed = true;
		if (this.mode?.kind === "oauth") {
			this.mode.tokens.close();
		}
	}

	private selectMode(): AuthMode {
		const { apiKey, oauthClientId, oauthClientSecret } =
			this.options.credentials;

		if (oauthClientId && oauthClientSecret) {
			if (apiKey) {
				this.logger.debug("OAuth credentials take precedence over the API key");
			}
			this.logger.debug("using OAuth client credentials");
			return {
				kind: "oauth",
				tokens: this.options.createTokenSource({
					clientId: oauthClientId,
					clientSecret: oauthClientSecret,
				}),
			};
		}
		if (oauthClientId || oauthClientSecret) {
			throw new ConfigurationError(
				"Both oauthClientId and oauthClientSecret are required for OAuth authentication",
			);
		}
		if (apiKey) {
			this.logger.debug({ scheme: this.options.apiKeyScheme }, "using API key");
			return {
				kind: "static",
				apiKey,
				authorization: this.formatApiKey(apiKey),
			};
		}
		throw new ConfigurationError(
			"Either apiKey or oauthClientId and oauthClientSecret are required",
		);
	}

	private formatApiKey(apiKey: string): string {
		if (this.options.apiKeyScheme === "basic") {
			return `Basic ${Buffer.from(`${apiKey}:`).toString("base64")}`;
		}
		return `Bearer ${apiKey}`;
	}
}
