/**
 * `@Provides` discovery for the service locator.
 */
import "reflect-metadata";

export { DESTROYED_BY, type DestroyedBy, PROVIDES, Provides, type ProvidesOptions, REGISTERS, Registers } from "./annotations.js";
export { loadConfig } from "./config/index.js";
export * from "./descriptors/index.js";
export * from "./di/index.js";
export * from "./discovery/index.js";
export * from "./errors/index.js";
export { Services } from "./services.js";
export * from "./types/index.js";
