import { z } from "zod";
import { ConfigurationError } from "./core/errors.js";

export const DEFAULT_BASE_URL = "https://api.tailscale.com/api/v2/";

const optionalSecret = z.string().min(1).optional();

const ConfigSchema = z.object({
	/** "-" selects the default tailnet of the credentials. */
	tailnet: z.string().min(1).default("-"),
	apiKey: optionalSecret,
	oauthClientId: optionalSecret,
	oauthClientSecret: optionalSecret,
	baseUrl: z
		.string()
		.url()
		.default(DEFAULT_BASE_URL)
		.transform((url) => (url.endsWith("/") ? url : `${url}/`)),
	requestTimeoutMs: z.coerce.number().int().positive().default(8_000),
	apiKeyScheme: z.enum(["bearer", "basic"]).default("bearer"),
	logLevel: z
		.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
		.default("silent"),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

export function parseConfig(input: ConfigInput = {}): Config {
	return validate(input);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	return validate({
		tailnet: fromEnv(env.TS_TAILNET),
		apiKey: fromEnv(env.TS_API_KEY),
		oauthClientId: fromEnv(env.TS_API_CLIENT_ID),
		oauthClientSecret: fromEnv(env.TS_API_CLIENT_SECRET),
		baseUrl: fromEnv(env.TS_API_BASE_URL),
		requestTimeoutMs: fromEnv(env.TS_REQUEST_TIMEOUT_MS),
		apiKeyScheme: fromEnv(env.TS_API_KEY_SCHEME),
		logLevel: fromEnv(env.LOG_LEVEL),
	});
}

function validate(raw: unknown): Config {
	const parsed = ConfigSchema.safeParse(raw);
	if (!parsed.success) {
		throw new ConfigurationError(
			`Invalid client configuration: ${parsed.error.issues
				.map((issue) => `${issue.path.join(".")} ${issue.message}`)
				.join("; ")}`,
			{ cause: parsed.error },
		);
	}
	return parsed.data;
}

// unset and empty variables both mean "use the default"
function fromEnv(value: string | undefined): string | undefined {
	return value === undefined || value === "" ? undefined : value;
}
