import { type ActiveDescriptor, type ServiceLocator, createLocator } from "@providence/locator";
import { DISCOVERY_MODES, type DiscoveryMode, ProvidesDescriptor, UnusableClassDescriptor, enableProvides } from "../../index.js";

export const MODES = DISCOVERY_MODES;

export function createProvidesLocator(discovery: DiscoveryMode, name = "test"): ServiceLocator {
	const locator = createLocator(name);
	enableProvides(locator, { discovery });
	return locator;
}

/** Descriptors synthesized from provider members. */
export function providers(locator: ServiceLocator): ProvidesDescriptor[] {
	return locator.getDescriptors().filter(
		(descriptor): descriptor is ProvidesDescriptor =>
			descriptor instanceof ProvidesDescriptor && !(descriptor instanceof UnusableClassDescriptor),
	);
}

export function providerOf(locator: ServiceLocator, label: string): ActiveDescriptor {
	const found = providers(locator).find((descriptor) => descriptor.toString() === `ProvidesDescriptor(${label})`);
	if (found === undefined) {
		throw new Error(`No provider ${label}`);
	}
	return found;
}

export function catchError(action: () => unknown): unknown {
	try {
		action();
	} catch (err) {
		return err;
	}
	throw new Error("Expected an error");
}
