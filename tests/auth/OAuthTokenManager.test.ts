import { afterEach, beforeEach, describe, expect, it, jest } from "@jest/globals";
import pino from "pino";
import { OAuthTokenManager } from "../../src/auth/OAuthTokenManager.js";
import {
	AuthenticationError,
	ConnectionError,
	TokenAcquisitionCancelledError,
} from "../../src/core/errors.js";
import type { ITokenStorage, StoredToken } from "../../src/core/ITokenStorage.js";
import { MemoryTokenStorage } from "../../src/storage/MemoryTokenStorage.js";

interface PostConfig {
	headers: Record<string, string>;
	timeout: number;
	signal: AbortSignal;
}

const mockPost =
	jest.fn<
		(url: string, body: URLSearchParams, config: PostConfig) => Promise<{ data: unknown }>
	>();

jest.mock("axios", () => ({
	__esModule: true,
	default: {
		post: (url: string, body: URLSearchParams, config: PostConfig) =>
			mockPost(url, body, config),
		isAxiosError: (err: unknown) =>
			typeof err === "object" && err !== null && "isAxiosError" in err,
	},
}));

const BASE_URL = "https://api.example.test/api/v2/";
const NOW = new Date("2026-01-01T00:00:00.000Z");

function tokenResponse(accessToken = "tok", expiresIn: number | string = 3600) {
	return { data: { access_token: accessToken, expires_in: expiresIn } };
}

function axiosError(status?: number, code?: string) {
	return Object.assign(new Error(status ? `HTTP ${status}` : "socket hang up"), {
		isAxiosError: true,
		response: status === undefined ? undefined : { status },
		code,
	});
}

function deferred<T>() {
	let resolve: (value: T) => void = () => undefined;
	const promise = new Promise<T>((res) => {
		resolve = res;
	});
	return { promise, resolve };
}

const flushAsync = () => new Promise((resolve) => setImmediate(resolve));

const managers: OAuthTokenManager[] = [];

function createManager(storage?: ITokenStorage): OAuthTokenManager {
	const manager = new OAuthTokenManager({
		baseUrl: BASE_URL,
		clientId: "test-client-id",
		clientSecret: "test-secret",
		timeoutMs: 8000,
		logger: pino({ level: "silent" }),
		storage,
	});
	managers.push(manager);
	return manager;
}

function storedToken(accessToken: string, secondsLeft: number): StoredToken {
	return {
		accessToken,
		expiresAt: new Date(Date.now() + secondsLeft * 1000),
	};
}

beforeEach(() => {
	jest.clearAllMocks();
});

afterEach(() => {
	for (const manager of managers.splice(0)) {
		manager.close();
	}
	jest.useRealTimers();
});

describe("OAuthTokenManager", () => {
	describe("token exchange", () => {
		it("posts the client credentials form-encoded to the token endpoint", async () => {
			mockPost.mockResolvedValueOnce(tokenResponse());

			const token = await createManager().accessToken();

			expect(token).toBe("tok");
			expect(mockPost).toHaveBeenCalledTimes(1);
			const [url, body, config] = mockPost.mock.calls[0];
			expect(url).toBe("https://api.example.test/api/v2/oauth/token");
			expect(body.toString()).toBe(
				"client_id=test-client-id&client_secret=test-secret",
			);
			expect(config.headers["Content-Type"]).toBe(
				"application/x-www-form-urlencoded",
			);
			expect(config.timeout).toBe(8000);
		});

		it("returns the cached token without another exchange", async () => {
			mockPost.mockResolvedValueOnce(tokenResponse());

			const manager = createManager();
			await manager.accessToken();
			const token = await manager.accessToken();

			expect(token).toBe("tok");
			expect(mockPost).toHaveBeenCalledTimes(1);
		});

		it("accepts expires_in sent as a string", async () => {
			mockPost.mockResolvedValueOnce(tokenResponse("tok_str", "3600"));

			await expect(createManager().accessToken()).resolves.toBe("tok_str");
		});

		it.each([
			["missing access_token", { expires_in: 3600 }],
			["empty access_token", { access_token: "", expires_in: 3600 }],
			["missing expires_in", { access_token: "tok" }],
			["zero expires_in", { access_token: "tok", expires_in: 0 }],
			["an infinite expires_in", { access_token: "tok", expires_in: Infinity }],
			["an expires_in past the date range", { access_token: "tok", expires_in: 1e13 }],
			["a non-JSON body", "<html>gateway error</html>"],
		])("fails on %s", async (_label, data) => {
			mockPost.mockResolvedValueOnce({ data });

			const result = createManager().accessToken();

			await expect(result).rejects.toThrow(AuthenticationError);
			await expect(result).rejects.toThrow("Failed to get OAuth token");
		});

		it("rejects a token that expires within a minute and caches nothing", async () => {
			mockPost
				.mockResolvedValueOnce(tokenResponse("short", 60))
				.mockResolvedValueOnce(tokenResponse("long", 3600));

			const manager = createManager();
			await expect(manager.accessToken()).rejects.toThrow(
				"OAuth token expires in less than 1 minute",
			);
			await expect(manager.accessToken()).resolves.toBe("long");
			expect(mockPost).toHaveBeenCalledTimes(2);
		});

		it("maps a timed out exchange to ConnectionError", async () => {
			mockPost.mockRejectedValueOnce(axiosError(undefined, "ECONNABORTED"));

			const result = createManager().accessToken();

			await expect(result).rejects.toThrow(ConnectionError);
			await expect(result).rejects.toThrow("OAuth token request timed out");
		});

		it("maps rejected client credentials to AuthenticationError", async () => {
			mockPost.mockRejectedValueOnce(axiosError(401));

			await expect(createManager().accessToken()).rejects.toThrow(
				"OAuth token request was rejected (HTTP 401)",
			);
		});
	});

	describe("single flight", () => {
		it("shares one exchange between concurrent callers", async () => {
			const response = deferred<{ data: unknown }>();
			mockPost.mockReturnValueOnce(response.promise);

			const manager = createManager();
			const callers = Array.from({ length: 5 }, () => manager.accessToken());
			response.resolve(tokenResponse("shared"));

			expect(await Promise.all(callers)).toEqual([
				"shared",
				"shared",
				"shared",
				"shared",
				"shared",
			]);
			expect(mockPost).toHaveBeenCalledTimes(1);
		});

		it("delivers the same failure to every waiter and clears the pending slot", async () => {
			mockPost
				.mockResolvedValueOnce({ data: {} })
				.mockResolvedValueOnce(tokenResponse("retry"));

			const manager = createManager();
			const results = await Promise.allSettled([
				manager.accessToken(),
				manager.accessToken(),
				manager.accessToken(),
			]);

			const reasons = results.map((result) =>
				result.status === "rejected" ? result.reason : null,
			);
			expect(reasons[0]).toBeInstanceOf(AuthenticationError);
			expect(reasons[1]).toBe(reasons[0]);
			expect(reasons[2]).toBe(reasons[0]);

			await expect(manager.accessToken()).resolves.toBe("retry");
			expect(mockPost).toHaveBeenCalledTimes(2);
		});
	});

	describe("proactive expiry", () => {
		it("drops the token 60 seconds before it expires", async () => {
			jest.useFakeTimers({ now: NOW });
			mockPost
				.mockResolvedValueOnce(tokenResponse("first", 3600))
				.mockResolvedValueOnce(tokenResponse("second", 3600));

			const manager = createManager();
			expect(await manager.accessToken()).toBe("first");

			jest.advanceTimersByTime(3_539_999);
			expect(await manager.accessToken()).toBe("first");
			expect(mockPost).toHaveBeenCalledTimes(1);

			jest.advanceTimersByTime(1);
			expect(await manager.accessToken()).toBe("second");
			expect(mockPost).toHaveBeenCalledTimes(2);
		});

		it("re-arms the timer for lifetimes beyond the timer range", async () => {
			jest.useFakeTimers({ now: NOW });
			mockPost
				.mockResolvedValueOnce(tokenResponse("monthly", 2_592_000))
				.mockResolvedValueOnce(tokenResponse("renewed", 3600));

			const manager = createManager();
			expect(await manager.accessToken()).toBe("monthly");

			// 30 days minus the margin is 2_591_940_000 ms
			jest.advanceTimersByTime(2_147_483_647);
			expect(await manager.accessToken()).toBe("monthly");
			jest.advanceTimersByTime(444_456_352);
			expect(await manager.accessToken()).toBe("monthly");
			expect(mockPost).toHaveBeenCalledTimes(1);

			jest.advanceTimersByTime(1);
			expect(await manager.accessToken()).toBe("renewed");
			expect(mockPost).toHaveBeenCalledTimes(2);
		});
	});

	describe("invalidation", () => {
		it("forces exactly one new exchange for the next callers", async () => {
			mockPost
				.mockResolvedValueOnce(tokenResponse("first"))
				.mockResolvedValueOnce(tokenResponse("second"));

			const manager = createManager();
			await manager.accessToken();
			manager.invalidate();
			const tokens = await Promise.all([
				manager.accessToken(),
				manager.accessToken(),
			]);

			expect(tokens).toEqual(["second", "second"]);
			expect(mockPost).toHaveBeenCalledTimes(2);
		});

		it("cancels an in-flight acquisition and ignores its late result", async () => {
			const late = deferred<{ data: unknown }>();
			mockPost
				.mockReturnValueOnce(late.promise)
				.mockResolvedValueOnce(tokenResponse("fresh"));

			const manager = createManager();
			const waiter = manager.accessToken();
			await flushAsync();
			expect(mockPost).toHaveBeenCalledTimes(1);

			manager.invalidate();

			await expect(waiter).rejects.toThrow(TokenAcquisitionCancelledError);
			expect(mockPost.mock.calls[0][2].signal.aborted).toBe(true);

			late.resolve(tokenResponse("late"));
			await flushAsync();

			await expect(manager.accessToken()).resolves.toBe("fresh");
			expect(mockPost).toHaveBeenCalledTimes(2);
		});

		it("ignores a rejection of a token that was already replaced", async () => {
			mockPost
				.mockResolvedValueOnce(tokenResponse("first"))
				.mockResolvedValueOnce(tokenResponse("second"));

			const manager = createManager();
			await manager.accessToken();
			manager.invalidate("first");
			expect(await manager.accessToken()).toBe("second");

			manager.invalidate("first");

			expect(await manager.accessToken()).toBe("second");
			expect(mockPost).toHaveBeenCalledTimes(2);
		});

		it("leaves a pending acquisition alone when an old token is rejected", async () => {
			const next = deferred<{ data: unknown }>();
			mockPost
				.mockResolvedValueOnce(tokenResponse("first"))
				.mockReturnValueOnce(next.promise);

			const manager = createManager();
			await manager.accessToken();
			manager.invalidate("first");
			const waiter = manager.accessToken();
			await flushAsync();

			manager.invalidate("first");
			next.resolve(tokenResponse("second"));

			await expect(waiter).resolves.toBe("second");
			expect(mockPost.mock.calls[1][2].signal.aborted).toBe(false);
		});

		it("refuses to hand out tokens after close", async () => {
			mockPost.mockResolvedValueOnce(tokenResponse());

			const manager = createManager();
			await manager.accessToken();
			manager.close();

			await expect(manager.accessToken()).rejects.toThrow(
				"OAuth token manager has been closed",
			);
		});
	});

	describe("token storage", () => {
		it("uses a stored token with more than a minute left", async () => {
			const storage = new MemoryTokenStorage(storedToken("stored", 3600));

			await expect(createManager(storage).accessToken()).resolves.toBe(
				"stored",
			);
			expect(mockPost).not.toHaveBeenCalled();
		});

		it("exchanges when the stored token has 30 seconds left", async () => {
			mockPost.mockResolvedValueOnce(tokenResponse("fetched"));
			const storage = new MemoryTokenStorage(storedToken("stale", 30));

			await expect(createManager(storage).accessToken()).resolves.toBe(
				"fetched",
			);
			expect(mockPost).toHaveBeenCalledTimes(1);
		});

		it("persists a fetched token with its absolute expiry", async () => {
			jest.useFakeTimers({ now: NOW });
			mockPost.mockResolvedValueOnce(tokenResponse("tok", 3600));
			const storage = new MemoryTokenStorage();

			await createManager(storage).accessToken();

			const saved = await storage.load();
			expect(saved?.accessToken).toBe("tok");
			expect(saved?.expiresAt.toISOString()).toBe("2026-01-01T01:00:00.000Z");
		});

		it("expires a stored token a minute before its stored expiry", async () => {
			jest.useFakeTimers({ now: NOW });
			mockPost.mockResolvedValueOnce(tokenResponse("fetched"));
			const storage = new MemoryTokenStorage(storedToken("stored", 600));

			const manager = createManager(storage);
			expect(await manager.accessToken()).toBe("stored");

			jest.advanceTimersByTime(539_999);
			expect(await manager.accessToken()).toBe("stored");

			// the store still holds the old entry, now inside the margin
			jest.advanceTimersByTime(1);
			expect(await manager.accessToken()).toBe("fetched");
			expect(mockPost).toHaveBeenCalledTimes(1);
		});

		it("falls back to an exchange when the store fails to load", async () => {
			mockPost.mockResolvedValueOnce(tokenResponse("fetched"));
			const storage = {
				load: jest
					.fn<ITokenStorage["load"]>()
					.mockRejectedValue(new Error("disk unavailable")),
				save: jest.fn<ITokenStorage["save"]>().mockResolvedValue(undefined),
			};

			await expect(createManager(storage).accessToken()).resolves.toBe(
				"fetched",
			);
			expect(storage.save).toHaveBeenCalledTimes(1);
		});

		it("exchanges when the stored token has an invalid expiry", async () => {
			mockPost.mockResolvedValueOnce(tokenResponse("fetched"));
			const storage = new MemoryTokenStorage({
				accessToken: "unreadable",
				expiresAt: new Date("not a date"),
			});

			await expect(createManager(storage).accessToken()).resolves.toBe(
				"fetched",
			);
			expect(mockPost).toHaveBeenCalledTimes(1);
		});

		it("bounds store access by the request timeout", async () => {
			jest.useFakeTimers({ now: NOW });
			mockPost.mockResolvedValueOnce(tokenResponse("fetched"));
			const storage = {
				load: jest
					.fn<ITokenStorage["load"]>()
					.mockReturnValue(new Promise<StoredToken | null>(() => undefined)),
				save: jest.fn<ITokenStorage["save"]>().mockResolvedValue(undefined),
			};

			const result = createManager(storage).accessToken();
			await jest.advanceTimersByTimeAsync(8000);

			await expect(result).resolves.toBe("fetched");
		});

		it("still returns the token when saving fails", async () => {
			mockPost.mockResolvedValueOnce(tokenResponse("fetched"));
			const storage = {
				load: jest.fn<ITokenStorage["load"]>().mockResolvedValue(null),
				save: jest
					.fn<ITokenStorage["save"]>()
					.mockRejectedValue(new Error("read-only file system")),
			};

			await expect(createManager(storage).accessToken()).resolves.toBe(
				"fetched",
			);
		});
	});
});
