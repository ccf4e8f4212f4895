import type { LogLevel } from "@providence/shared";

/**
 * `listener` scans every component after each commit; `enabler` also
 * replaces the configuration service and accepts classes that only
 * contribute static providers.
 */
export type DiscoveryMode = "listener" | "enabler";

export const DISCOVERY_MODES: readonly DiscoveryMode[] = ["listener", "enabler"];

export function isDiscoveryMode(value: string | undefined): value is DiscoveryMode {
	return DISCOVERY_MODES.some((mode) => mode === value);
}

export interface ServicesConfig {
	locatorName: string;
	logLevel: LogLevel;
	discovery: DiscoveryMode;
	/** Listener only: scan components whose class name starts with this. */
	scanPrefix: string | undefined;
}
