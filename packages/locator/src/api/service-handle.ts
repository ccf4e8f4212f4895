import type { ActiveDescriptor } from "./active-descriptor.js";
import type { ServiceLocator } from "./service-locator.js";

/**
 * One lookup of a service. Per-lookup services obtained through a handle,
 * and those created as its dependencies, are disposed when it closes.
 */
export interface ServiceHandle {
	readonly descriptor: ActiveDescriptor;
	readonly locator: ServiceLocator;

	getService(): unknown;
	isActive(): boolean;
	addChild(child: ServiceHandle): void;
	close(): void;
}
