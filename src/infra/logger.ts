import pino, { type LevelWithSilent, type Logger } from "pino";

export function createLogger(level: LevelWithSilent = "silent"): Logger {
	return pino({ name: "tailnet-client", level });
}
