export { CacheNotSetError } from "./cache-not-set-error.js";
export { ConfigurationCommittedError } from "./configuration-committed-error.js";
export { LocatorShutdownError } from "./locator-shutdown-error.js";
export { NoUsableConstructorError } from "./no-usable-constructor-error.js";
export { ServiceNotFoundError } from "./service-not-found-error.js";
export { UnsatisfiedDependencyError } from "./unsatisfied-dependency-error.js";
export { UnsupportedOperationError } from "./unsupported-operation-error.js";
