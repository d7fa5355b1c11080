import { describe, expect, it } from "vitest";
import { DEFAULT_LOG_LEVEL, loadConfig } from "../src/config.ts";
import { InvalidOperationError } from "../src/errors/index.ts";
import { captureLogger } from "./test-utils.ts";

describe("loadConfig", () => {
	it("uses defaults for an empty environment", () => {
		expect(loadConfig({})).toEqual({ logLevel: DEFAULT_LOG_LEVEL, compile: false });
	});

	it("reads the log level and compile flag", () => {
		expect(loadConfig({ ROWFRAME_LOG_LEVEL: " DEBUG ", ROWFRAME_COMPILE: "true" })).toEqual({
			logLevel: "debug",
			compile: true,
		});
		expect(loadConfig({ ROWFRAME_COMPILE: "1" }).compile).toBe(true);
		expect(loadConfig({ ROWFRAME_COMPILE: "0" }).compile).toBe(false);
	});

	it("rejects unknown log levels", () => {
		expect(() => loadConfig({ ROWFRAME_LOG_LEVEL: "loud" })).toThrow(InvalidOperationError);
		expect(() => loadConfig({ ROWFRAME_LOG_LEVEL: "loud" })).toThrow(
			"'loadConfig' received unknown ROWFRAME_LOG_LEVEL 'loud'",
		);
	});
});

describe("createLogger", () => {
	it("binds the service name and honours the level", () => {
		const { logger, records } = captureLogger("info");
		logger.debug("hidden");
		logger.info({ rows: 3 }, "shown");
		expect(records()).toHaveLength(1);
		expect(records()[0]).toMatchObject({ level: 30, service: "rowframe", rows: 3, msg: "shown" });
	});
});
