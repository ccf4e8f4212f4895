import type { ServicesConfig } from "../types/index.js";

export function getDefaultConfig(): ServicesConfig {
	return {
		locatorName: "default",
		logLevel: "info",
		discovery: "enabler",
		scanPrefix: undefined,
	};
}
