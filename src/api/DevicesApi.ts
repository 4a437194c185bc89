import type { Device } from "../core/types.js";
import type { HttpClient } from "../infra/HttpClient.js";
import { ApiDeviceListSchema, ApiDeviceSchema } from "./api.types.js";
import { fromApiDevice, fromApiDeviceList } from "./ApiMapper.js";

const ALL_FIELDS = { fields: "all" };

export class DevicesApi {
	constructor(
		private readonly http: HttpClient,
		private readonly tailnet: string,
	) {}

	/** Lists every device of the tailnet, keyed by device id. */
	async list(): Promise<Record<string, Device>> {
		const data = await this.http.requestParsed(
			{
				method: "GET",
				url: `tailnet/${encodeURIComponent(this.tailnet)}/devices`,
				params: ALL_FIELDS,
			},
			ApiDeviceListSchema,
		);
		return fromApiDeviceList(data.devices);
	}

	async get(deviceId: string): Promise<Device> {
		const data = await this.http.requestParsed(
			{
				method: "GET",
				url: `device/${encodeURIComponent(deviceId)}`,
				params: ALL_FIELDS,
			},
			ApiDeviceSchema,
		);
		return fromApiDevice(data);
	}

	async delete(deviceId: string): Promise<void> {
		await this.http.request({
			method: "DELETE",
			url: `device/${encodeURIComponent(deviceId)}`,
		});
	}

	async authorize(deviceId: string, authorized = true): Promise<void> {
		await this.http.request({
			method: "POST",
			url: `device/${encodeURIComponent(deviceId)}/authorized`,
			data: { authorized },
		});
	}

	/** Replaces the device's tags; each must look like `tag:name`. */
	async setTags(deviceId: string, tags: string[]): Promise<void> {
		await this.http.request({
			method: "POST",
			url: `device/${encodeURIComponent(deviceId)}/tags`,
			data: { tags },
		});
	}
}
