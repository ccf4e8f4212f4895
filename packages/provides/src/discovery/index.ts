export { DiscoveryCache, MEMBER_KINDS } from "./discovery-cache.js";
export { ProvidesDescriptorFactory } from "./descriptor-factory.js";
export type { ProviderContext } from "./provider-context.js";
export { ProvidersSeen } from "./providers-seen.js";
export { ProvidesAnnotationEnabler } from "./provides-annotation-enabler.js";
export { ProvidesConfiguration, type StaticProviderSource } from "./provides-configuration.js";
export { type ProvidesListenerOptions, ProvidesListener } from "./provides-listener.js";
export { type EnableProvidesOptions, enableProvides } from "./enable-provides.js";
