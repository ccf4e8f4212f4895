/**
 * CLI argument parsing for services configuration.
 */

import { type LogLevel, isLogLevel } from "@providence/shared";
import { type DiscoveryMode, isDiscoveryMode } from "../types/index.js";

export interface ParsedArgs {
	locatorName?: string;
	logLevel?: LogLevel;
	discovery?: DiscoveryMode;
	scanPrefix?: string;
}

export function parseCliArgs(args: string[]): ParsedArgs {
	const parsed: ParsedArgs = {};

	for (const arg of args) {
		if (arg.startsWith("--locator-name=")) {
			parsed.locatorName = arg.slice("--locator-name=".length);
		} else if (arg.startsWith("--log-level=")) {
			const value = arg.slice("--log-level=".length);
			if (isLogLevel(value)) {
				parsed.logLevel = value;
			}
		} else if (arg.startsWith("--discovery=")) {
			const value = arg.slice("--discovery=".length);
			if (isDiscoveryMode(value)) {
				parsed.discovery = value;
			}
		} else if (arg.startsWith("--scan-prefix=")) {
			parsed.scanPrefix = arg.slice("--scan-prefix=".length);
		}
	}

	return parsed;
}
