import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { ITokenStorage, StoredToken } from "../core/ITokenStorage.js";

const StoredTokenFileSchema = z.object({
	accessToken: z.string().min(1),
	expiresAt: z.string().datetime(),
});

// distinguishes concurrent saves within one process
let tmpCounter = 0;

/**
 * Stores the token as JSON at `path`, written with owner-only permissions.
 * A missing or unreadable document loads as no token.
 */
export class FileTokenStorage implements ITokenStorage {
	constructor(private readonly path: string) {}

	async load(): Promise<StoredToken | null> {
		let contents: string;
		try {
			contents = await readFile(this.path, "utf-8");
		} catch (error) {
			if (isMissingFile(error)) {
				return null;
			}
			throw error;
		}

		const parsed = StoredTokenFileSchema.safeParse(parseJson(contents));
		if (!parsed.success) {
			return null;
		}
		return {
			accessToken: parsed.data.accessToken,
			expiresAt: new Date(parsed.data.expiresAt),
		};
	}

	async save(token: StoredToken): Promise<void> {
		await mkdir(dirname(this.path), { recursive: true });
		const tmpPath = `${this.path}.${process.pid}.${++tmpCounter}.tmp`;
		const document = JSON.stringify({
			accessToken: token.accessToken,
			expiresAt: token.expiresAt.toISOString(),
		});
		await writeFile(tmpPath, document, { encoding: "utf-8", mode: 0o600 });
		await rename(tmpPath, this.path);
	}
}

function parseJson(contents: string): unknown {
	try {
		return JSON.parse(contents);
	} catch {
		return undefined;
	}
}

function isMissingFile(error: unknown): boolean {
	return (
		error instanceof Error && "code" in error && error.code === "ENOENT"
	);
}
