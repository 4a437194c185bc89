import type { AuthKey, CreateKeyOptions } from "../core/types.js";
import type { HttpClient } from "../infra/HttpClient.js";
import { ApiAuthKeySchema, ApiKeyListSchema } from "./api.types.js";
import { fromApiAuthKey, toApiCreateKeyRequest } from "./ApiMapper.js";

export class KeysApi {
	constructor(
		private readonly http: HttpClient,
		private readonly tailnet: string,
	) {}

	/** Returns the ids of the tailnet's keys. */
	async list(): Promise<string[]> {
		const data = await this.http.requestParsed(
			{ method: "GET", url: this.keysPath() },
			ApiKeyListSchema,
		);
		return data.keys.map((key) => key.id);
	}

	async get(keyId: string): Promise<AuthKey> {
		const data = await this.http.requestParsed(
			{ method: "GET", url: this.keysPath(keyId) },
			ApiAuthKeySchema,
		);
		return fromApiAuthKey(data);
	}

	/** Creates an auth key. The secret is only readable from this response. */
	async create(options: CreateKeyOptions = {}): Promise<AuthKey> {
		const data = await this.http.requestParsed(
			{
				method: "POST",
				url: this.keysPath(),
				data: toApiCreateKeyRequest(options),
			},
			ApiAuthKeySchema,
		);
		return fromApiAuthKey(data);
	}

	async delete(keyId: string): Promise<void> {
		await this.http.request({ method: "DELETE", url: this.keysPath(keyId) });
	}

	private keysPath(keyId?: string): string {
		const base = `tailnet/${encodeURIComponent(this.tailnet)}/keys`;
		return keyId === undefined ? base : `${base}/${encodeURIComponent(keyId)}`;
	}
}
