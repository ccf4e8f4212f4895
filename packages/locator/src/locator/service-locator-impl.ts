import { type Logger, type LoggerFactory, MultiError, createLogger } from "@providence/shared";
import {
	type Annotation,
	type AnnotationType,
	type TypeExpression,
	type TypeLike,
	formatType,
	getMembers,
	invokeMethod,
	isClass,
	raw,
	rawKeyOf,
	toType,
	typeEquals,
} from "@providence/types";
import { POST_CONSTRUCT, PRE_DESTROY } from "../annotations.js";
import type { ActiveDescriptor } from "../api/active-descriptor.js";
import {
	DynamicConfigurationListener,
	DynamicConfigurationService,
	isConfigurationListener,
} from "../api/dynamic-configuration.js";
import type { ServiceHandle } from "../api/service-handle.js";
import { type DescriptorFilter, type ServiceKey, ServiceLocator } from "../api/service-locator.js";
import { ConstantDescriptor } from "../descriptors/constant-descriptor.js";
import { isSingletonScope } from "../descriptors/contracts.js";
import { LocatorShutdownError, ServiceNotFoundError, UnsatisfiedDependencyError } from "../errors/index.js";
import { DefaultConfigurationService } from "./default-configuration-service.js";
import type { ConfigurationTarget } from "./dynamic-configuration-impl.js";
import { ServiceHandleImpl } from "./service-handle-impl.js";

export interface LocatorOptions {
	loggerFactory?: LoggerFactory;
}

interface SingletonRecord {
	descriptor: ActiveDescriptor;
	/** Parent of the per-lookup services created for the singleton. */
	handle: ServiceHandle;
}

function matchesContract(advertised: TypeExpression, requested: TypeExpression): boolean {
	if (typeEquals(advertised, requested)) {
		return true;
	}
	// A raw type on either side matches any parameterization of it.
	const key = rawKeyOf(advertised);
	return key !== null && key === rawKeyOf(requested) && (advertised.kind === "raw" || requested.kind === "raw");
}

function hasQualifiers(descriptor: ActiveDescriptor, qualifiers: readonly Annotation[]): boolean {
	return qualifiers.every((wanted) =>
		descriptor.qualifierAnnotations.some((actual) => actual.type === wanted.type && actual.value === wanted.value),
	);
}

function describeRequest(type: TypeExpression, qualifiers: readonly Annotation[]): string {
	const prefix = qualifiers.map((qualifier) => `${qualifier.toString()} `).join("");
	return `${prefix}${formatType(type)}`;
}

export class ServiceLocatorImpl implements ConfigurationTarget {
	private readonly descriptors: ActiveDescriptor[] = [];
	private readonly singletons: SingletonRecord[] = [];
	private readonly logger: Logger;
	private shutDown = false;

	constructor(
		readonly name: string,
		options: LocatorOptions = {},
	) {
		this.logger = (options.loggerFactory ?? createLogger)(`locator:${name}`);
		this.descriptors.push(
			new ConstantDescriptor(this, raw(ServiceLocatorImpl), { contracts: [raw(ServiceLocator)] }),
			new ConstantDescriptor(new DefaultConfigurationService(this), raw(DefaultConfigurationService), {
				contracts: [raw(DynamicConfigurationService)],
			}),
		);
	}

	// ==========================================================================
	// Descriptors
	// ==========================================================================

	getDescriptors(filter?: DescriptorFilter): ActiveDescriptor[] {
		return filter === undefined ? [...this.descriptors] : this.descriptors.filter(filter);
	}

	reifyDescriptor(descriptor: ActiveDescriptor): ActiveDescriptor {
		if (!descriptor.isReified()) {
			descriptor.reify();
		}
		return descriptor;
	}

	getBestDescriptor(contract: TypeLike, qualifiers: readonly Annotation[] = []): ActiveDescriptor | undefined {
		return this.candidates(toType(contract), qualifiers)[0];
	}

	/**
	 * Matching descriptors, highest ranking first. The sort is stable, so
	 * equal rankings keep registration order.
	 */
	private candidates(contract: TypeExpression, qualifiers: readonly Annotation[]): ActiveDescriptor[] {
		this.checkActive();
		return this.descriptors
			.filter((descriptor) => {
				const reified = this.reifyDescriptor(descriptor);
				return reified.contractTypes.some((advertised) => matchesContract(advertised, contract))
					&& hasQualifiers(reified, qualifiers);
			})
			.sort((a, b) => b.getRanking() - a.getRanking());
	}

	// ==========================================================================
	// Lookup
	// ==========================================================================

	getService<T>(contract: ServiceKey<T>, ...qualifiers: Annotation[]): T {
		// Descriptors advertising a key produce instances of the key's type.
		return this.getServiceOfType(contract, ...qualifiers) as T;
	}

	getServiceOfType(contract: TypeLike, ...qualifiers: Annotation[]): unknown {
		const type = toType(contract);
		const best = this.getBestDescriptor(type, qualifiers);
		if (best === undefined) {
			throw new ServiceNotFoundError(describeRequest(type, qualifiers));
		}
		return this.getServiceFromDescriptor(best);
	}

	getAllServices(contract: TypeLike): unknown[] {
		return this.candidates(toType(contract), []).map((descriptor) => this.getServiceFromDescriptor(descriptor));
	}

	hasService(contract: TypeLike, ...qualifiers: Annotation[]): boolean {
		return this.getBestDescriptor(contract, qualifiers) !== undefined;
	}

	getServiceFromDescriptor(descriptor: ActiveDescriptor, root?: ServiceHandle): unknown {
		this.checkActive();
		const reified = this.reifyDescriptor(descriptor);
		if (isSingletonScope(reified.scopeAnnotation)) {
			return this.getSingleton(reified);
		}
		const handle = new ServiceHandleImpl(this, reified);
		root?.addChild(handle);
		return handle.getService();
	}

	getServiceHandle(descriptor: ActiveDescriptor): ServiceHandle {
		this.checkActive();
		return new ServiceHandleImpl(this, this.reifyDescriptor(descriptor));
	}

	getAllServiceHandles(contract: TypeLike): ServiceHandle[] {
		return this.candidates(toType(contract), []).map((descriptor) => this.getServiceHandle(descriptor));
	}

	getInjecteeService(type: TypeExpression, qualifiers: readonly Annotation[], root: ServiceHandle | undefined): unknown {
		const best = this.getBestDescriptor(type, qualifiers);
		if (best === undefined) {
			throw new UnsatisfiedDependencyError(describeRequest(type, qualifiers), root?.descriptor.toString());
		}
		return this.getServiceFromDescriptor(best, root);
	}

	/**
	 * Cached instance of a singleton descriptor, created on first use.
	 */
	getSingleton(descriptor: ActiveDescriptor): unknown {
		if (descriptor.isCacheSet()) {
			return descriptor.getCache();
		}
		const handle = new ServiceHandleImpl(this, descriptor);
		let instance: unknown;
		try {
			instance = descriptor.create(handle);
		} catch (err) {
			handle.close();
			throw err;
		}
		descriptor.setCache(instance);
		this.singletons.push({ descriptor, handle });
		this.logger.debug(`Created singleton ${descriptor.toString()}`);
		return instance;
	}

	// ==========================================================================
	// Lifecycle hooks
	// ==========================================================================

	postConstruct(instance: unknown): void {
		// Superclass hooks run first.
		this.runHooks(instance, POST_CONSTRUCT, true);
	}

	preDestroy(instance: unknown): void {
		this.runHooks(instance, PRE_DESTROY, false);
	}

	private runHooks(instance: unknown, hook: AnnotationType, baseFirst: boolean): void {
		if (typeof instance !== "object" || instance === null) {
			return;
		}
		const cls: unknown = Reflect.get(instance, "constructor");
		if (!isClass(cls)) {
			return;
		}
		const methods = getMembers(cls).filter(
			(member) => member.kind === "instance-method" && hook.isPresent(member.annotations),
		);
		if (baseFirst) {
			methods.reverse();
		}
		for (const method of methods) {
			try {
				invokeMethod(instance, method.name, []);
			} catch (err) {
				throw MultiError.wrap(err);
			}
		}
	}

	// ==========================================================================
	// Configuration
	// ==========================================================================

	/**
	 * Registers a committed batch, then notifies every configuration
	 * listener. Listener failures are thrown together after all listeners ran.
	 */
	commitConfiguration(added: readonly ActiveDescriptor[]): void {
		this.checkActive();
		this.descriptors.push(...added);
		this.logger.debug(`Committed ${added.length} descriptor(s) to ${this.name}`);

		const errors: Error[] = [];
		for (const listener of this.getAllServices(DynamicConfigurationListener)) {
			if (!isConfigurationListener(listener)) {
				continue;
			}
			try {
				listener.configurationChanged();
			} catch (err) {
				errors.push(...MultiError.flatten(err));
			}
		}
		if (errors.length > 0) {
			throw new MultiError(errors);
		}
	}

	// ==========================================================================
	// Shutdown
	// ==========================================================================

	/**
	 * Disposes singletons newest first. Failures are logged and thrown
	 * together once every singleton was released.
	 */
	shutdown(): void {
		if (this.shutDown) {
			return;
		}
		const errors: Error[] = [];
		for (const { descriptor, handle } of [...this.singletons].reverse()) {
			try {
				descriptor.dispose(descriptor.getCache());
			} catch (err) {
				errors.push(...MultiError.flatten(err));
			}
			descriptor.releaseCache();
			try {
				handle.close();
			} catch (err) {
				errors.push(...MultiError.flatten(err));
			}
		}
		this.singletons.length = 0;
		this.shutDown = true;

		for (const error of errors) {
			this.logger.error(`Shutdown of ${this.name}: ${error.name}: ${error.message}`);
		}
		this.logger.info(`Service locator ${this.name} shut down`);
		if (errors.length > 0) {
			throw new MultiError(errors);
		}
	}

	isShutdown(): boolean {
		return this.shutDown;
	}

	private checkActive(): void {
		if (this.shutDown) {
			throw new LocatorShutdownError(this.name);
		}
	}
}
