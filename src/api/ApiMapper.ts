import type {
	AuthKey,
	ClientConnectivity,
	CreateKeyOptions,
	Device,
} from "../core/types.js";
import type {
	ApiAuthKey,
	ApiClientConnectivity,
	ApiCreateKeyRequest,
	ApiDevice,
} from "./api.types.js";

export function fromApiDevice(device: ApiDevice): Device {
	return {
		deviceId: device.id,
		name: device.name,
		hostname: device.hostname,
		user: device.user,
		os: device.os,
		addresses: device.addresses,
		authorized: device.authorized,
		blocksIncomingConnections: device.blocksIncomingConnections,
		clientConnectivity: device.clientConnectivity
			? fromApiConnectivity(device.clientConnectivity)
			: null,
		clientVersion: device.clientVersion,
		created: toDate(device.created),
		expires: toDate(device.expires),
		lastSeen: toDate(device.lastSeen),
		isExternal: device.isExternal,
		keyExpiryDisabled: device.keyExpiryDisabled,
		machineKey: device.machineKey,
		nodeKey: device.nodeKey,
		updateAvailable: device.updateAvailable,
		advertisedRoutes: device.advertisedRoutes ?? [],
		enabledRoutes: device.enabledRoutes ?? [],
		tags: device.tags ?? [],
	};
}

/** Keys the device list by device id. */
export function fromApiDeviceList(devices: ApiDevice[]): Record<string, Device> {
	return Object.fromEntries(
		devices.map((device) => [device.id, fromApiDevice(device)]),
	);
}

export function fromApiAuthKey(key: ApiAuthKey): AuthKey {
	const create = key.capabilities?.devices.create;
	return {
		keyId: key.id,
		key: key.key ?? null,
		description: key.description ?? "",
		created: toDate(key.created),
		expires: toDate(key.expires),
		revoked: toDate(key.revoked),
		capabilities: create
			? {
					reusable: create.reusable ?? false,
					ephemeral: create.ephemeral ?? false,
					preauthorized: create.preauthorized ?? false,
					tags: create.tags ?? [],
				}
			: null,
	};
}

export function toApiCreateKeyRequest(
	options: CreateKeyOptions,
): ApiCreateKeyRequest {
	const request: ApiCreateKeyRequest = {
		capabilities: {
			devices: {
				create: {
					reusable: options.reusable ?? false,
					ephemeral: options.ephemeral ?? false,
					preauthorized: options.preauthorized ?? false,
					tags: options.tags ?? [],
				},
			},
		},
	};
	if (options.expirySeconds !== undefined) {
		request.expirySeconds = options.expirySeconds;
	}
	if (options.description !== undefined) {
		request.description = options.description;
	}
	return request;
}

function fromApiConnectivity(
	connectivity: ApiClientConnectivity,
): ClientConnectivity {
	const supports = connectivity.clientSupports;
	return {
		endpoints: connectivity.endpoints ?? [],
		mappingVariesByDestIp: connectivity.mappingVariesByDestIP ?? null,
		clientSupports: {
			hairPinning: supports?.hairPinning ?? null,
			ipv6: supports?.ipv6 ?? null,
			pcp: supports?.pcp ?? null,
			pmp: supports?.pmp ?? null,
			udp: supports?.udp ?? null,
			upnp: supports?.upnp ?? null,
		},
	};
}

// the API sends "" for unset timestamps
function toDate(value: string | null | undefined): Date | null {
	return value ? new Date(value) : null;
}
