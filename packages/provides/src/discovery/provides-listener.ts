import {
	type ActiveDescriptor,
	ContractsProvided,
	type DescriptorFilter,
	type DynamicConfiguration,
	DynamicConfigurationListener,
	DynamicConfigurationService,
	Inject,
	ServiceLocator,
	Singleton,
} from "@providence/locator";
import { type Logger, LoggerImpl } from "@providence/shared";
import { getMembers, isClass } from "@providence/types";
import { PROVIDES } from "../annotations.js";
import { ProvidesDescriptorFactory } from "./descriptor-factory.js";
import { ProvidersSeen } from "./providers-seen.js";

export interface ProvidesListenerOptions {
	/** Restricts which component descriptors are scanned. */
	filter?: DescriptorFilter;
	logger?: Logger;
}

const everything: DescriptorFilter = () => true;

/**
 * Scans every component descriptor after each commit and adds descriptors
 * for its `@Provides` members. Static members are scanned once; instance
 * members once per component descriptor.
 */
@Singleton()
@Inject(() => [ServiceLocator])
@ContractsProvided(() => [DynamicConfigurationListener])
export class ProvidesListener implements DynamicConfigurationListener {
	private readonly seen = new ProvidersSeen();
	private readonly logger: Logger;
	private readonly factory: ProvidesDescriptorFactory;

	constructor(
		private readonly locator: ServiceLocator,
		private readonly options: ProvidesListenerOptions = {},
	) {
		this.logger = options.logger ?? new LoggerImpl("provides-listener");
		this.factory = new ProvidesDescriptorFactory({ disposeFields: false }, this.logger);
	}

	protected getFilter(): DescriptorFilter {
		return this.options.filter ?? everything;
	}

	configurationChanged(): void {
		const configuration = this.locator.getService(DynamicConfigurationService).createDynamicConfiguration();
		let added = 0;
		for (const descriptor of this.locator.getDescriptors(this.getFilter())) {
			added += this.addDescriptors(this.locator.reifyDescriptor(descriptor), configuration);
		}
		if (added > 0) {
			this.logger.debug(`Committing ${added} provider descriptor(s)`);
			configuration.commit();
		}
	}

	private addDescriptors(component: ActiveDescriptor, configuration: DynamicConfiguration): number {
		const componentClass = component.implementationClass;
		if (!isClass(componentClass) || !this.seen.addComponent(component)) {
			return 0;
		}
		const context = {
			locator: this.locator,
			componentClass,
			componentType: component.implementationType,
			component,
		};
		let added = 0;
		for (const member of getMembers(componentClass)) {
			if (!PROVIDES.isPresent(member.annotations) || !this.seen.addMember(component, member)) {
				continue;
			}
			const descriptor = this.factory.fromMember(member, context);
			if (descriptor !== undefined) {
				configuration.addActiveDescriptor(descriptor);
				added++;
			}
		}
		return added;
	}
}
