import type { ITokenStorage, StoredToken } from "../core/ITokenStorage.js";

/** Keeps the token for the life of the process; shareable between clients. */
export class MemoryTokenStorage implements ITokenStorage {
	private token: StoredToken | null;

	constructor(initial: StoredToken | null = null) {
		this.token = initial;
	}

	async load(): Promise<StoredToken | null> {
		return this.token;
	}

	async save(token: StoredToken): Promise<void> {
		this.token = token;
	}
}
