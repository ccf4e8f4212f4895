export { DefaultConfigurationService } from "./default-configuration-service.js";
export { type ConfigurationTarget, DynamicConfigurationImpl } from "./dynamic-configuration-impl.js";
export { ForwardingDynamicConfiguration } from "./forwarding-dynamic-configuration.js";
export { ServiceHandleImpl } from "./service-handle-impl.js";
export { type LocatorOptions, ServiceLocatorImpl } from "./service-locator-impl.js";
