/**
 * Composition root: wires the locator, the discovery engine and the
 * services facade.
 */

import "reflect-metadata";
import { createLocator } from "@providence/locator";
import { type LoggerFactory, createLoggerFactory } from "@providence/shared";
import type { Class } from "@providence/types";
import { enableProvides } from "../discovery/enable-provides.js";
import { Services } from "../services.js";
import type { ServicesConfig } from "../types/index.js";
import { type Container, createContainer } from "./container.js";
import { CONFIG, LOGGER, LOGGER_FACTORY, PROVIDES_EXTENSION, SERVICES, SERVICE_LOCATOR } from "./tokens.js";

export function configureContainer(container: Container, config: ServicesConfig, classes: readonly Class[] = []): void {
	container.instance(CONFIG, config);

	container.singleton<LoggerFactory>(LOGGER_FACTORY, (c: Container) =>
		createLoggerFactory({ level: c.resolve(CONFIG).logLevel }));

	container.singleton(LOGGER, (c: Container) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return factory("services");
	});

	container.singleton(SERVICE_LOCATOR, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		return createLocator(cfg.locatorName, { loggerFactory: c.resolve(LOGGER_FACTORY) });
	});

	container.singleton(PROVIDES_EXTENSION, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		const factory = c.resolve(LOGGER_FACTORY);
		return enableProvides(c.resolve(SERVICE_LOCATOR), {
			discovery: cfg.discovery,
			scanPrefix: cfg.scanPrefix,
			logger: factory(`provides-${cfg.discovery}`),
		});
	});

	// The discovery engine is installed before any application class.
	container.singleton(SERVICES, (c: Container) => {
		c.resolve(PROVIDES_EXTENSION);
		const services = new Services(c.resolve(SERVICE_LOCATOR), c.resolve(LOGGER));
		if (classes.length > 0) {
			services.register(...classes);
		}
		return services;
	});
}

export function createServicesContainer(config: ServicesConfig, classes: readonly Class[] = []): Container {
	const container = createContainer();
	configureContainer(container, config, classes);
	return container;
}

export function createServices(config: ServicesConfig, classes: readonly Class[] = []): Services {
	return createServicesContainer(config, classes).resolve(SERVICES);
}
