export type TokenSourceKind = "fetched" | "storage";

export interface AccessToken {
	value: string;
	expiresAt: Date;
	source: TokenSourceKind;
}

export interface ClientSupports {
	hairPinning: boolean | null;
	ipv6: boolean | null;
	pcp: boolean | null;
	pmp: boolean | null;
	udp: boolean | null;
	upnp: boolean | null;
}

export interface ClientConnectivity {
	endpoints: string[];
	mappingVariesByDestIp: boolean | null;
	clientSupports: ClientSupports;
}

export interface Device {
	deviceId: string;
	name: string;
	hostname: string;
	user: string;
	os: string;
	addresses: string[];
	authorized: boolean;
	blocksIncomingConnections: boolean;
	clientConnectivity: ClientConnectivity | null;
	clientVersion: string;
	created: Date | null;
	expires: Date | null;
	lastSeen: Date | null;
	isExternal: boolean;
	keyExpiryDisabled: boolean;
	machineKey: string;
	nodeKey: string;
	updateAvailable: boolean;
	advertisedRoutes: string[];
	enabledRoutes: string[];
	tags: string[];
}

export interface KeyCapabilities {
	reusable: boolean;
	ephemeral: boolean;
	preauthorized: boolean;
	tags: string[];
}

export interface AuthKey {
	keyId: string;
	/** The secret itself; only present in the response to a create call. */
	key: string | null;
	description: string;
	created: Date | null;
	expires: Date | null;
	revoked: Date | null;
	capabilities: KeyCapabilities | null;
}

export interface CreateKeyOptions {
	reusable?: boolean;
	ephemeral?: boolean;
	preauthorized?: boolean;
	tags?: string[];
	expirySeconds?: number;
	description?: string;
}
