export { DevicesApi } from "./api/DevicesApi.js";
export { KeysApi } from "./api/KeysApi.js";
export { PolicyApi } from "./api/PolicyApi.js";
export type { Policy, PolicyAcl } from "./api/api.types.js";
export {
	type ApiKeyScheme,
	CredentialResolver,
	type Credentials,
} from "./auth/CredentialResolver.js";
export { EXPIRY_MARGIN_S, OAuthTokenManager } from "./auth/OAuthTokenManager.js";
export {
	type Config,
	type ConfigInput,
	DEFAULT_BASE_URL,
	loadConfig,
	parseConfig,
} from "./config.js";
export {
	AppError,
	AuthenticationError,
	ConfigurationError,
	ConnectionError,
	RequestError,
	TokenAcquisitionCancelledError,
} from "./core/errors.js";
export type { ITokenStorage, StoredToken } from "./core/ITokenStorage.js";
export type {
	AccessToken,
	AuthKey,
	ClientConnectivity,
	ClientSupports,
	CreateKeyOptions,
	Device,
	KeyCapabilities,
} from "./core/types.js";
export { FileTokenStorage } from "./storage/FileTokenStorage.js";
export { MemoryTokenStorage } from "./storage/MemoryTokenStorage.js";
export {
	type ClientDependencies,
	TailnetClient,
	type TailnetClientOptions,
	withClient,
} from "./TailnetClient.js";
