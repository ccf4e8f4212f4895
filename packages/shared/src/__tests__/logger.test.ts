import { type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LoggerImpl, createLogger, createLoggerFactory, getCurrentLevel, isLogLevel, setLogLevel } from "../logger/index.js";
import type { LogLevel } from "../logger/index.js";

describe("LoggerImpl", () => {
	let previous: LogLevel;
	let logSpy: MockInstance<typeof console.log>;

	beforeEach(() => {
		previous = getCurrentLevel();
		logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
	});

	afterEach(() => {
		setLogLevel(previous);
		logSpy.mockRestore();
	});

	it("writes timestamp, padded level and prefix", () => {
		setLogLevel("debug");
		new LoggerImpl("enabler").info("scanned 3 classes");

		expect(logSpy).toHaveBeenCalledTimes(1);
		expect(logSpy.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO \] \[enabler\] scanned 3 classes$/);
	});

	it("drops messages below the current level", () => {
		setLogLevel("warn");
		const logger = createLogger("listener");
		logger.debug("hidden");
		logger.info("hidden");
		logger.warn("shown");
		logger.error("shown");

		expect(logSpy).toHaveBeenCalledTimes(2);
	});

	it("prints nothing when silent", () => {
		setLogLevel("silent");
		createLogger("listener").error("nope");

		expect(logSpy).not.toHaveBeenCalled();
	});

	it("prefers its own level over the process-wide one", () => {
		setLogLevel("debug");
		const logger = new LoggerImpl("locator:test", { level: "error" });
		logger.warn("hidden");
		logger.error("shown");

		expect(logSpy).toHaveBeenCalledTimes(1);
		expect(logSpy.mock.calls[0][0]).toMatch(/\[ERROR\] \[locator:test\] shown$/);
	});

	it("writes to the given sink instead of the console", () => {
		const lines: string[] = [];
		new LoggerImpl("enabler", { level: "debug", write: (line) => lines.push(line) }).debug("scanning");

		expect(logSpy).not.toHaveBeenCalled();
		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatch(/\[DEBUG\] \[enabler\] scanning$/);
	});
});

describe("createLoggerFactory", () => {
	it("shares level and sink between the loggers it creates", () => {
		const lines: string[] = [];
		const factory = createLoggerFactory({ level: "warn", write: (line) => lines.push(line) });

		factory("locator:test").info("hidden");
		factory("locator:test").warn("first");
		factory("provides-enabler").error("second");

		expect(lines).toHaveLength(2);
		expect(lines[0]).toMatch(/\[WARN \] \[locator:test\] first$/);
		expect(lines[1]).toMatch(/\[ERROR\] \[provides-enabler\] second$/);
	});
});

describe("isLogLevel", () => {
	it("accepts known levels", () => {
		expect(isLogLevel("debug")).toBe(true);
		expect(isLogLevel("silent")).toBe(true);
	});

	it("rejects unknown values", () => {
		expect(isLogLevel("verbose")).toBe(false);
		expect(isLogLevel(undefined)).toBe(false);
		expect(isLogLevel("toString")).toBe(false);
	});
});
