import type { ServicesConfig } from "../../types/index.js";

/**
 * Imports the config module afresh so that it reads the current
 * environment.
 */
export async function loadConfigFresh(args: string[]): Promise<ServicesConfig> {
	const { loadConfig } = await import("../../config/index.js");
	return loadConfig(args);
}

export function createTestConfig(overrides: Partial<ServicesConfig> = {}): ServicesConfig {
	return {
		locatorName: "test",
		logLevel: "silent",
		discovery: "enabler",
		scanPrefix: undefined,
		...overrides,
	};
}
