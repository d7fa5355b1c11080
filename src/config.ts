/**
 * Environment configuration.
 *
 * ROWFRAME_LOG_LEVEL  pino level name (default "warn")
 * ROWFRAME_COMPILE    "1" or "true" to resolve filter expressions through
 *                     generated code by default
 */

import { InvalidOperationError } from "./errors/index.ts";

export const DEFAULT_LOG_LEVEL = "warn";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface RowframeConfig {
	readonly logLevel: LogLevel;
	readonly compile: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RowframeConfig {
	const level = env.ROWFRAME_LOG_LEVEL?.trim().toLowerCase() || DEFAULT_LOG_LEVEL;
	const logLevel = LOG_LEVELS.find((l) => l === level);
	if (logLevel === undefined) {
		throw new InvalidOperationError(
			"loadConfig",
			`received unknown ROWFRAME_LOG_LEVEL '${level}'`,
			`expected one of ${LOG_LEVELS.join(", ")}`,
		);
	}

	const compile = env.ROWFRAME_COMPILE?.trim().toLowerCase();
	return {
		logLevel,
		compile: compile === "1" || compile === "true",
	};
}

let cached: RowframeConfig | null = null;

/** Configuration read from `process.env` once per process. */
export function getConfig(): RowframeConfig {
	if (cached === null) cached = loadConfig();
	return cached;
}
