/**
 * Environment variable parsing for services configuration.
 */

import { type LogLevel, isLogLevel } from "@providence/shared";
import { type DiscoveryMode, isDiscoveryMode } from "../types/index.js";

export interface ParsedEnv {
	locatorName?: string;
	logLevel?: LogLevel;
	discovery?: DiscoveryMode;
	scanPrefix?: string;
}

export function parseEnvVars(): ParsedEnv {
	const logLevel = process.env.LOG_LEVEL;
	const discovery = process.env.PROVIDENCE_DISCOVERY;
	return {
		locatorName: process.env.PROVIDENCE_LOCATOR_NAME,
		logLevel: isLogLevel(logLevel) ? logLevel : undefined,
		discovery: isDiscoveryMode(discovery) ? discovery : undefined,
		scanPrefix: process.env.PROVIDENCE_SCAN_PREFIX,
	};
}
