import { z } from "zod";

// Device schemas

const ApiClientSupportsSchema = z.object({
	hairPinning: z.boolean().nullish(),
	ipv6: z.boolean().nullish(),
	pcp: z.boolean().nullish(),
	pmp: z.boolean().nullish(),
	udp: z.boolean().nullish(),
	upnp: z.boolean().nullish(),
});

const ApiClientConnectivitySchema = z.object({
	endpoints: z.array(z.string()).nullish(),
	mappingVariesByDestIP: z.boolean().nullish(),
	clientSupports: ApiClientSupportsSchema.nullish(),
});

export const ApiDeviceSchema = z.object({
	id: z.string(),
	name: z.string(),
	hostname: z.string(),
	user: z.string(),
	os: z.string(),
	addresses: z.array(z.string()),
	authorized: z.boolean(),
	blocksIncomingConnections: z.boolean(),
	clientConnectivity: ApiClientConnectivitySchema.nullish(),
	clientVersion: z.string(),
	created: z.string().nullish(),
	expires: z.string().nullish(),
	lastSeen: z.string().nullish(),
	isExternal: z.boolean(),
	keyExpiryDisabled: z.boolean(),
	machineKey: z.string(),
	nodeKey: z.string(),
	updateAvailable: z.boolean(),
	advertisedRoutes: z.array(z.string()).nullish(),
	enabledRoutes: z.array(z.string()).nullish(),
	tags: z.array(z.string()).nullish(),
});

export const ApiDeviceListSchema = z.object({
	devices: z.array(ApiDeviceSchema),
});

export type ApiDevice = z.infer<typeof ApiDeviceSchema>;
export type ApiClientConnectivity = z.infer<typeof ApiClientConnectivitySchema>;

// Key schemas

const ApiKeyCapabilitiesSchema = z.object({
	devices: z.object({
		create: z.object({
			reusable: z.boolean().optional(),
			ephemeral: z.boolean().optional(),
			preauthorized: z.boolean().optional(),
			tags: z.array(z.string()).optional(),
		}),
	}),
});

export const ApiAuthKeySchema = z.object({
	id: z.string(),
	key: z.string().optional(),
	description: z.string().optional(),
	created: z.string().nullish(),
	expires: z.string().nullish(),
	revoked: z.string().nullish(),
	capabilities: ApiKeyCapabilitiesSchema.optional(),
});

export const ApiKeyListSchema = z.object({
	keys: z.array(z.object({ id: z.string() })),
});

export type ApiAuthKey = z.infer<typeof ApiAuthKeySchema>;
export type ApiKeyCapabilities = z.infer<typeof ApiKeyCapabilitiesSchema>;

export interface ApiCreateKeyRequest {
	capabilities: ApiKeyCapabilities;
	expirySeconds?: number;
	description?: string;
}

// Policy schema; unknown sections are kept so an update round-trips them

const PolicyAclSchema = z
	.object({
		action: z.string(),
		src: z.array(z.string()),
		dst: z.array(z.string()),
		proto: z.string().optional(),
	})
	.passthrough();

export const PolicySchema = z
	.object({
		acls: z.array(PolicyAclSchema).optional(),
		groups: z.record(z.array(z.string())).optional(),
		tagOwners: z.record(z.array(z.string())).optional(),
		hosts: z.record(z.string()).optional(),
	})
	.passthrough();

export type Policy = z.infer<typeof PolicySchema>;
export type PolicyAcl = z.infer<typeof PolicyAclSchema>;
