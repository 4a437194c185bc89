import { Agent as HttpAgent } from "node:http";
import { Agent as HttpsAgent } from "node:https";
import axios, { type AxiosInstance } from "axios";
import type { Logger } from "pino";
import type { z } from "zod";
import { AuthenticationError, RequestError } from "../core/errors.js";
import type { ICredentialProvider } from "../core/ICredentialProvider.js";
import { toTransportError } from "./transportErrors.js";

export const DEFAULT_TIMEOUT_MS = 8_000;

export interface ApiRequest {
	method: "GET" | "POST" | "DELETE";
	/** Path relative to the API base, without a leading slash. */
	url: string;
	params?: Record<string, string>;
	data?: unknown;
}

export interface HttpClientOptions {
	baseURL: string;
	auth: ICredentialProvider;
	logger: Logger;
	timeoutMs?: number;
}

export class HttpClient {
	private readonly client: AxiosInstance;
	private readonly auth: ICredentialProvider;
	private readonly logger: Logger;
	private readonly httpAgent = new HttpAgent({ keepAlive: true });
	private readonly httpsAgent = new HttpsAgent({ keepAlive: true });

	constructor(options: HttpClientOptions) {
		this.auth = options.auth;
		this.logger = options.logger.child({ component: "HttpClient" });
		this.client = axios.create({
			baseURL: options.baseURL,
			timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
			headers: { Accept: "application/json" },
			httpAgent: this.httpAgent,
			httpsAgent: this.httpsAgent,
		});
	}

	/**
	 * Sends an authenticated request and returns the decoded body.
	 * A 401/403 on an OAuth credential invalidates that token, if still cached, before the
	 * AuthenticationError propagates; the call itself is not retried.
	 */
	async request(request: ApiRequest): Promise<unknown> {
		const credential = await this.auth.resolve();
		try {
			const response = await this.client.request<unknown>({
				...request,
				headers: { Authorization: credential.authorization },
			});
			return response.data;
		} catch (error) {
			const structured = toTransportError(error, "API request");
			if (
				structured instanceof AuthenticationError &&
				credential.source === "oauth"
			) {
				this.logger.warn(
					{ method: request.method, url: request.url },
					"OAuth token rejected, invalidating",
				);
				this.auth.invalidate(credential.token);
			} else {
				this.logger.debug(
					{ method: request.method, url: request.url, err: structured },
					"API request failed",
				);
			}
			throw structured;
		}
	}

	/** Like {@link request}, validating the body against `schema`. */
	async requestParsed<S extends z.ZodTypeAny>(
		request: ApiRequest,
		schema: S,
	): Promise<z.output<S>> {
		const data = await this.request(request);
		const parsed = schema.safeParse(data);
		if (!parsed.success) {
			throw new RequestError(
				`Unexpected response from ${request.method} ${request.url}`,
				0,
				{ cause: parsed.error },
			);
		}
		return parsed.data;
	}

	/** Releases the keep-alive sockets held by this client. */
	close(): void {
		this.httpAgent.destroy();
		this.httpsAgent.destroy();
	}
}
