import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";
import { getConfig } from "./config.ts";

export type { Logger } from "pino";

/**
 * Create a rowframe logger. Records carry a `service` binding so they can be
 * told apart when the host application shares one log stream.
 */
export function createLogger(level: string, destination?: DestinationStream): Logger {
	const options: LoggerOptions = {
		level,
		base: {
			service: "rowframe",
		},
	};

	return destination ? pino(options, destination) : pino(options);
}

let sharedLogger: Logger | null = null;

/** Process-wide logger at the configured level, created on first use. */
export function getLogger(): Logger {
	if (sharedLogger === null) {
		sharedLogger = createLogger(getConfig().logLevel);
	}
	return sharedLogger;
}
