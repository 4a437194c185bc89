import type { HttpClient } from "../infra/HttpClient.js";
import { type Policy, PolicySchema } from "./api.types.js";

export class PolicyApi {
	constructor(
		private readonly http: HttpClient,
		private readonly tailnet: string,
	) {}

	async get(): Promise<Policy> {
		return this.http.requestParsed(
			{ method: "GET", url: this.policyPath() },
			PolicySchema,
		);
	}

	/** Replaces the tailnet policy file and returns the stored version. */
	async update(policy: Policy): Promise<Policy> {
		return this.http.requestParsed(
			{ method: "POST", url: this.policyPath(), data: policy },
			PolicySchema,
		);
	}

	private policyPath(): string {
		return `tailnet/${encodeURIComponent(this.tailnet)}/acl`;
	}
}
