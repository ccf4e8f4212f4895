/**
 * Dependency Injection module exports.
 */

import "reflect-metadata";

export { ContainerImpl, createContainer, type Container, type Factory } from "./container.js";
export {
	CONFIG,
	LOGGER,
	LOGGER_FACTORY,
	PROVIDES_EXTENSION,
	SERVICES,
	SERVICE_LOCATOR,
	createToken,
	type Token,
} from "./tokens.js";
export { configureContainer, createServices, createServicesContainer } from "./composition-root.js";
