import {
	type ActiveDescriptor,
	ContractsProvided,
	type DynamicConfiguration,
	DynamicConfigurationListener,
	DynamicConfigurationService,
	Inject,
	Rank,
	ServiceLocator,
	ServiceNotFoundError,
	Singleton,
	isConfigurationService,
} from "@providence/locator";
import { type Logger, LoggerImpl, formatError } from "@providence/shared";
import { type Class, type MemberKind, getAnnotations, getMembers, isClass, raw } from "@providence/types";
import { REGISTERS } from "../annotations.js";
import { UnusableClassDescriptor } from "../descriptors/unusable-class-descriptor.js";
import { DiscoveryCache, MEMBER_KINDS, isStaticKind } from "./discovery-cache.js";
import { ProvidesDescriptorFactory } from "./descriptor-factory.js";
import type { ProviderContext } from "./provider-context.js";
import { ProvidesConfiguration, type StaticProviderSource } from "./provides-configuration.js";

/**
 * Discovery engine that also replaces the configuration service, so that
 * classes contributing only static providers can be registered.
 *
 * Each class is analyzed once. Static providers are found as soon as the
 * class is registered; instance providers once a usable component
 * descriptor for the class exists.
 */
@Singleton()
@Rank(1)
@Inject(() => [ServiceLocator])
@ContractsProvided(() => [DynamicConfigurationListener, DynamicConfigurationService])
export class ProvidesAnnotationEnabler implements DynamicConfigurationListener, DynamicConfigurationService, StaticProviderSource {
	private readonly cache = new DiscoveryCache();
	private readonly classesFullyAnalyzed = new Set<Class>();
	private readonly registersHandled = new Set<Class>();
	private readonly defaultService: DynamicConfigurationService;
	private readonly logger: Logger;
	private readonly factory: ProvidesDescriptorFactory;

	constructor(private readonly locator: ServiceLocator, logger?: Logger) {
		this.logger = logger ?? new LoggerImpl("provides-enabler");
		this.factory = new ProvidesDescriptorFactory({ disposeFields: true }, this.logger);
		this.defaultService = this.findDefaultService();
	}

	createDynamicConfiguration(): DynamicConfiguration {
		return new ProvidesConfiguration(this.defaultService.createDynamicConfiguration(), this);
	}

	configurationChanged(): void {
		try {
			this.findAllAnnotations();
		} catch (err) {
			this.logger.error(`Provider discovery failed: ${formatError(err)}`);
			throw err;
		}
	}

	staticProviders(cls: Class, configuration: DynamicConfiguration): readonly ActiveDescriptor[] {
		this.addProvidesDescriptors(cls, undefined, configuration);
		return [...this.cache.get("static-method", cls), ...this.cache.get("static-field", cls)];
	}

	private findDefaultService(): DynamicConfigurationService {
		const handle = this.locator.getAllServiceHandles(DynamicConfigurationService)
			.find((candidate) => candidate.descriptor.implementationClass !== ProvidesAnnotationEnabler);
		const service = handle?.getService();
		if (!isConfigurationService(service)) {
			throw new ServiceNotFoundError("DynamicConfigurationService");
		}
		return service;
	}

	private findAllAnnotations(): void {
		const configuration = this.locator.getService(DynamicConfigurationService).createDynamicConfiguration();
		let added = 0;
		for (const descriptor of this.locator.getDescriptors()) {
			const component = this.locator.reifyDescriptor(descriptor);
			const cls = component.implementationClass;
			if (!isClass(cls) || this.classesFullyAnalyzed.has(cls)) {
				continue;
			}
			const usable = component instanceof UnusableClassDescriptor ? undefined : component;
			added += this.addProvidesDescriptors(cls, usable, configuration);
			added += this.addRegisteredClasses(cls, configuration);
			if (usable !== undefined) {
				this.classesFullyAnalyzed.add(cls);
			}
		}
		if (added > 0) {
			this.logger.debug(`Committing ${added} discovered descriptor(s)`);
			configuration.commit();
		}
	}

	/**
	 * Fills every member kind of `cls` not cached yet. Instance kinds wait
	 * for a component descriptor.
	 */
	private addProvidesDescriptors(
		cls: Class,
		component: ActiveDescriptor | undefined,
		configuration: DynamicConfiguration,
	): number {
		const pending = MEMBER_KINDS.filter((kind) =>
			!this.cache.has(kind, cls) && (isStaticKind(kind) || component !== undefined));
		if (pending.length === 0) {
			return 0;
		}
		const context: ProviderContext = {
			locator: this.locator,
			componentClass: cls,
			componentType: component?.implementationType ?? raw(cls),
			component,
		};
		const built = new Map<MemberKind, ActiveDescriptor[]>(pending.map((kind) => [kind, []]));
		let added = 0;
		for (const member of getMembers(cls)) {
			const bucket = built.get(member.kind);
			const descriptor = bucket === undefined ? undefined : this.factory.fromMember(member, context);
			if (bucket !== undefined && descriptor !== undefined) {
				bucket.push(configuration.addActiveDescriptor(descriptor));
				added++;
			}
		}
		this.cache.publish(cls, built);
		return added;
	}

	private addRegisteredClasses(cls: Class, configuration: DynamicConfiguration): number {
		if (this.registersHandled.has(cls)) {
			return 0;
		}
		this.registersHandled.add(cls);
		const registered = REGISTERS.read(getAnnotations(cls))?.() ?? [];
		for (const registeredClass of registered) {
			configuration.addActiveClass(registeredClass);
		}
		return registered.length;
	}
}
