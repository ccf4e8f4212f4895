import { type Class, type TypeLike, toType } from "@providence/types";
import type { ActiveDescriptor } from "./api/active-descriptor.js";
import { DynamicConfigurationService } from "./api/dynamic-configuration.js";
import type { ServiceLocator } from "./api/service-locator.js";
import { type ConstantOptions, ConstantDescriptor } from "./descriptors/constant-descriptor.js";
import { type LocatorOptions, ServiceLocatorImpl } from "./locator/service-locator-impl.js";

export function createLocator(name = "default", options: LocatorOptions = {}): ServiceLocator {
	return new ServiceLocatorImpl(name, options);
}

/**
 * Registers classes in one configuration, created through whichever
 * configuration service currently ranks highest.
 */
export function addClasses(locator: ServiceLocator, ...classes: Class[]): ActiveDescriptor[] {
	const configuration = locator.getService(DynamicConfigurationService).createDynamicConfiguration();
	const added = classes.map((cls) => configuration.addActiveClass(cls));
	configuration.commit();
	return added;
}

/**
 * Registers an existing object as a singleton advertising `type` and its
 * contracts.
 */
export function addOneConstant(
	locator: ServiceLocator,
	constant: unknown,
	type: TypeLike,
	options: ConstantOptions = {},
): ActiveDescriptor {
	const configuration = locator.getService(DynamicConfigurationService).createDynamicConfiguration();
	const added = configuration.addActiveDescriptor(new ConstantDescriptor(constant, toType(type), options));
	configuration.commit();
	return added;
}
