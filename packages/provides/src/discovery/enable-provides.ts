import {
	type ActiveDescriptor,
	type DescriptorFilter,
	type ServiceLocator,
	addOneConstant,
} from "@providence/locator";
import type { Logger } from "@providence/shared";
import { keyName } from "@providence/types";
import type { DiscoveryMode } from "../types/index.js";
import { ProvidesAnnotationEnabler } from "./provides-annotation-enabler.js";
import { ProvidesListener } from "./provides-listener.js";

export interface EnableProvidesOptions {
	discovery?: DiscoveryMode;
	/** Listener only. */
	scanPrefix?: string;
	logger?: Logger;
}

function prefixFilter(prefix: string | undefined): DescriptorFilter | undefined {
	if (prefix === undefined || prefix === "") {
		return undefined;
	}
	return (descriptor) => keyName(descriptor.implementationClass).startsWith(prefix);
}

/**
 * Installs a discovery engine in `locator`. Providers of classes already
 * registered are discovered right away.
 */
export function enableProvides(locator: ServiceLocator, options: EnableProvidesOptions = {}): ActiveDescriptor {
	if (options.discovery === "listener") {
		const listener = new ProvidesListener(locator, {
			filter: prefixFilter(options.scanPrefix),
			logger: options.logger,
		});
		return addOneConstant(locator, listener, ProvidesListener);
	}
	return addOneConstant(locator, new ProvidesAnnotationEnabler(locator, options.logger), ProvidesAnnotationEnabler);
}
