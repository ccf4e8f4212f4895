import { CONTRACT } from "../annotations.js";
import { type Class, type TypeExpression, declareInterface } from "@providence/types";
import type { ActiveDescriptor } from "./active-descriptor.js";

export interface ClassRegistrationOptions {
	/** Reified type of the class, such as `Repo<String>`. Defaults to the raw class. */
	type?: TypeExpression;
}

/**
 * A batch of descriptors committed to the locator at once.
 */
export interface DynamicConfiguration {
	addActiveDescriptor(descriptor: ActiveDescriptor): ActiveDescriptor;
	/**
	 * Builds a descriptor for a class the locator instantiates itself.
	 * @throws NoUsableConstructorError when the class cannot be constructed
	 */
	addActiveClass(cls: Class, options?: ClassRegistrationOptions): ActiveDescriptor;
	/** Publishes the batch. A configuration commits at most once. */
	commit(): void;
}

export interface DynamicConfigurationService {
	createDynamicConfiguration(): DynamicConfiguration;
}

export const DynamicConfigurationService = declareInterface<DynamicConfigurationService>("DynamicConfigurationService", {
	annotations: [CONTRACT.of(undefined)],
});

/**
 * Notified after every commit.
 */
export interface DynamicConfigurationListener {
	configurationChanged(): void;
}

export const DynamicConfigurationListener = declareInterface<DynamicConfigurationListener>("DynamicConfigurationListener", {
	annotations: [CONTRACT.of(undefined)],
});

export function isConfigurationListener(value: unknown): value is DynamicConfigurationListener {
	return typeof value === "object" && value !== null && "configurationChanged" in value
		&& typeof value.configurationChanged === "function";
}

export function isConfigurationService(value: unknown): value is DynamicConfigurationService {
	return typeof value === "object" && value !== null && "createDynamicConfiguration" in value
		&& typeof value.createDynamicConfiguration === "function";
}
