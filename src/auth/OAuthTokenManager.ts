import axios from "axios";
import type { Logger } from "pino";
import { z } from "zod";
import {
	AuthenticationError,
	TokenAcquisitionCancelledError,
} from "../core/errors.js";
import type { ITokenSource } from "../core/ITokenSource.js";
import type { ITokenStorage, StoredToken } from "../core/ITokenStorage.js";
import type { AccessToken } from "../core/types.js";
import { abortable, withTimeout } from "../infra/async.js";
import { toTransportError } from "../infra/transportErrors.js";

const TokenResponseSchema = z.object({
	access_token: z.string().optional(),
	expires_in: z.coerce.number().finite().optional(),
});

/** Tokens are dropped this long before the server considers them expired. */
export const EXPIRY_MARGIN_S = 60;
const EXPIRY_MARGIN_MS = EXPIRY_MARGIN_S * 1000;

// setTimeout overflows above this delay and fires immediately
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface OAuthTokenManagerOptions {
	/** API base, ending in a slash; the token endpoint is `oauth/token` below it. */
	baseUrl: string;
	clientId: string;
	clientSecret: string;
	timeoutMs: number;
	logger: Logger;
	storage?: ITokenStorage;
}

interface PendingAcquisition {
	readonly controller: AbortController;
	readonly promise: Promise<AccessToken>;
}

type TokenState =
	| { readonly kind: "absent" }
	| { readonly kind: "pending"; readonly acquisition: PendingAcquisition }
	| {
			readonly kind: "present";
			readonly token: AccessToken;
			readonly timer: NodeJS.Timeout;
	  };

const ABSENT: TokenState = { kind: "absent" };

/**
 * Owns the OAuth access token of one client.
 *
 * Concurrent callers share a single in-flight acquisition. A present token
 * carries a timer that drops it {@link EXPIRY_MARGIN_S} seconds before it
 * expires, and an optional {@link ITokenStorage} is consulted before any
 * network exchange.
 */
export class OAuthTokenManager implements ITokenSource {
	private readonly options: OAuthTokenManagerOptions;
	private readonly logger: Logger;
	private state: TokenState = ABSENT;
	private closed = false;

	constructor(options: OAuthTokenManagerOptions) {
		this.options = options;
		this.logger = options.logger.child({ component: "OAuthTokenManager" });
	}

	async accessToken(): Promise<string> {
		if (this.closed) {
			throw new AuthenticationError("OAuth token manager has been closed");
		}

		const state = this.state;
		if (state.kind === "present") {
			if (remainingMs(state.token) > EXPIRY_MARGIN_MS) {
				return state.token.value;
			}
			this.logger.debug("cached token is inside the expiry margin");
			this.invalidate();
		}

		const token = await this.claimAcquisition().promise;
		return token.value;
	}

	/**
	 * Drops the cached token or cancels the pending acquisition. With
	 * `rejected`, nothing happens unless that exact token is the cached one,
	 * so a late rejection of an old token leaves a newer one alone.
	 */
	invalidate(rejected?: string): void {
		const state = this.state;
		if (
			rejected !== undefined &&
			!(state.kind === "present" && state.token.value === rejected)
		) {
			this.logger.debug("rejected token is no longer current");
			return;
		}
		this.state = ABSENT;
		if (state.kind === "present") {
			clearTimeout(state.timer);
			this.logger.debug("token invalidated");
		} else if (state.kind === "pending") {
			state.acquisition.controller.abort();
			this.logger.debug("pending token acquisition cancelled");
		}
	}

	close(): void {
		this.invalidate();
		this.closed = true;
	}

	/** Joins the pending acquisition, or starts one. Never suspends between check and claim. */
	private claimAcquisition(): PendingAcquisition {
		if (this.state.kind === "pending") {
			return this.state.acquisition;
		}

		const controller = new AbortController();
		const promise = abortable(
			this.acquire(controller.signal),
			controller.signal,
			() => new TokenAcquisitionCancelledError(),
		).then(
			(token) => {
				this.settle(controller, token);
				return token;
			},
			(error: unknown) => {
				this.settle(controller, null);
				throw error;
			},
		);
		const acquisition: PendingAcquisition = { controller, promise };
		this.state = { kind: "pending", acquisition };
		return acquisition;
	}

	/** Leaves the pending state, unless this acquisition was superseded meanwhile. */
	private settle(controller: AbortController, token: AccessToken | null): void {
		if (
			this.state.kind !== "pending" ||
			this.state.acquisition.controller !== controller
		) {
			return;
		}
		if (token === null) {
			this.state = ABSENT;
			return;
		}
		this.state = { kind: "present", token, timer: this.scheduleExpiry(token) };
	}

	private async acquire(signal: AbortSignal): Promise<AccessToken> {
		const stored = await this.loadStoredToken();
		if (stored !== null) {
			return stored;
		}
		if (signal.aborted) {
			throw new TokenAcquisitionCancelledError();
		}
		return this.fetchToken(signal);
	}

	private async loadStoredToken(): Promise<AccessToken | null> {
		const { storage, timeoutMs } = this.options;
		if (!storage) {
			return null;
		}

		let entry: StoredToken | null;
		try {
			entry = await withTimeout(
				storage.load(),
				timeoutMs,
				"Token storage load timed out",
			);
		} catch (error) {
			this.logger.warn({ err: error }, "token storage load failed");
			return null;
		}

		if (entry === null) {
			this.logger.debug("token storage is empty");
			return null;
		}
		if (!isValidDate(entry.expiresAt)) {
			this.logger.warn("stored token has an invalid expiry");
			return null;
		}
		const token: AccessToken = {
			value: entry.accessToken,
			expiresAt: entry.expiresAt,
			source: "storage",
		};
		if (remainingMs(token) <= EXPIRY_MARGIN_MS) {
			this.logger.debug(
				{ expiresAt: token.expiresAt.toISOString() },
				"stored token is too close to expiry",
			);
			return null;
		}
		this.logger.info(
			{ expiresAt: token.expiresAt.toISOString() },
			"using token from storage",
		);
		return token;
	}

	private async fetchToken(signal: AbortSignal): Promise<AccessToken> {
		const { baseUrl, clientId, clientSecret, timeoutMs } = this.options;
		this.logger.debug("requesting OAuth token");

		let data: unknown;
		try {
			const response = await axios.post(
				new URL("oauth/token", baseUrl).toString(),
				new URLSearchParams({
					client_id: clientId,
					client_secret: clientSecret,
				}),
				{
					headers: {
						Accept: "application/json",
						"Content-Type": "application/x-www-form-urlencoded",
					},
					timeout: timeoutMs,
					signal,
				},
			);
			data = response.data;
		} catch (error) {
			if (signal.aborted) {
				throw new TokenAcquisitionCancelledError();
			}
			throw toTransportError(error, "OAuth token request");
		}

		const parsed = TokenResponseSchema.safeParse(data);
		const accessToken = parsed.success ? parsed.data.access_token : undefined;
		const expiresIn = parsed.success ? parsed.data.expires_in : undefined;
		if (!accessToken || !expiresIn) {
			throw new AuthenticationError("Failed to get OAuth token");
		}
		if (expiresIn <= EXPIRY_MARGIN_S) {
			throw new AuthenticationError(
				"OAuth token expires in less than 1 minute",
			);
		}

		const token: AccessToken = {
			value: accessToken,
			expiresAt: new Date(Date.now() + expiresIn * 1000),
			source: "fetched",
		};
		if (!isValidDate(token.expiresAt)) {
			throw new AuthenticationError("Failed to get OAuth token");
		}
		this.logger.info(
			{ expiresAt: token.expiresAt.toISOString() },
			"OAuth token acquired",
		);
		if (!signal.aborted) {
			await this.persist(token);
		}
		return token;
	}

	private async persist(token: AccessToken): Promise<void> {
		const { storage, timeoutMs } = this.options;
		if (!storage) {
			return;
		}
		try {
			await withTimeout(
				storage.save({ accessToken: token.value, expiresAt: token.expiresAt }),
				timeoutMs,
				"Token storage save timed out",
			);
		} catch (error) {
			this.logger.warn({ err: error }, "token storage save failed");
		}
	}

	/** Arms the timer that drops `token` once it enters the expiry margin. */
	private scheduleExpiry(token: AccessToken): NodeJS.Timeout {
		const delay = remainingMs(token) - EXPIRY_MARGIN_MS;
		const timer =
			delay > MAX_TIMER_DELAY_MS
				? setTimeout(() => this.rearm(token), MAX_TIMER_DELAY_MS)
				: setTimeout(() => this.expire(token), Math.max(delay, 0));
		timer.unref();
		return timer;
	}

	private rearm(token: AccessToken): void {
		if (this.state.kind === "present" && this.state.token === token) {
			this.state = { kind: "present", token, timer: this.scheduleExpiry(token) };
		}
	}

	private expire(token: AccessToken): void {
		if (this.state.kind === "present" && this.state.token === token) {
			this.logger.debug("token reached its expiry margin");
			this.state = ABSENT;
		}
	}
}

function remainingMs(token: AccessToken): number {
	return token.expiresAt.getTime() - Date.now();
}

function isValidDate(date: Date): boolean {
	return Number.isFinite(date.getTime());
}
