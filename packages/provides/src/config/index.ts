/**
 * Services configuration module.
 *
 * Priority: CLI > Environment > Defaults
 */

import type { ServicesConfig } from "../types/index.js";
import { parseCliArgs } from "./cli-parser.js";
import { getDefaultConfig } from "./defaults.js";
import { parseEnvVars } from "./env-parser.js";

export { type ParsedArgs, parseCliArgs } from "./cli-parser.js";
export { type ParsedEnv, parseEnvVars } from "./env-parser.js";
export { getDefaultConfig } from "./defaults.js";

export function loadConfig(args: string[] = []): ServicesConfig {
	const cli = parseCliArgs(args);
	const env = parseEnvVars();
	const defaults = getDefaultConfig();

	return {
		locatorName: cli.locatorName ?? env.locatorName ?? defaults.locatorName,
		logLevel: cli.logLevel ?? env.logLevel ?? defaults.logLevel,
		discovery: cli.discovery ?? env.discovery ?? defaults.discovery,
		scanPrefix: cli.scanPrefix ?? env.scanPrefix ?? defaults.scanPrefix,
	};
}
