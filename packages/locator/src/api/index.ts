export type { ActiveDescriptor } from "./active-descriptor.js";
export type { ServiceHandle } from "./service-handle.js";
export { type DescriptorFilter, type ServiceKey, ServiceLocator } from "./service-locator.js";
export {
	type ClassRegistrationOptions,
	type DynamicConfiguration,
	DynamicConfigurationListener,
	DynamicConfigurationService,
	isConfigurationListener,
	isConfigurationService,
} from "./dynamic-configuration.js";
