export { DISCOVERY_MODES, type DiscoveryMode, type ServicesConfig, isDiscoveryMode } from "./services-config.js";
