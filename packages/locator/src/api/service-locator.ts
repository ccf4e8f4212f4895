import { CONTRACT } from "../annotations.js";
import {
	type Annotation,
	type Class,
	type InterfaceToken,
	type TypeExpression,
	type TypeLike,
	declareInterface,
} from "@providence/types";
import type { ActiveDescriptor } from "./active-descriptor.js";
import type { ServiceHandle } from "./service-handle.js";

export type DescriptorFilter = (descriptor: ActiveDescriptor) => boolean;

export type ServiceKey<T> = Class<T> | InterfaceToken<T>;

export interface ServiceLocator {
	readonly name: string;

	/** Registered descriptors in registration order. */
	getDescriptors(filter?: DescriptorFilter): ActiveDescriptor[];
	reifyDescriptor(descriptor: ActiveDescriptor): ActiveDescriptor;
	/** Highest ranking match, earliest registration on ties. */
	getBestDescriptor(contract: TypeLike, qualifiers?: readonly Annotation[]): ActiveDescriptor | undefined;

	getService<T>(contract: ServiceKey<T>, ...qualifiers: Annotation[]): T;
	getServiceOfType(contract: TypeLike, ...qualifiers: Annotation[]): unknown;
	getAllServices(contract: TypeLike): unknown[];
	hasService(contract: TypeLike, ...qualifiers: Annotation[]): boolean;

	/** Obtains the service as a dependency of `root`, if given. */
	getServiceFromDescriptor(descriptor: ActiveDescriptor, root?: ServiceHandle): unknown;
	getServiceHandle(descriptor: ActiveDescriptor): ServiceHandle;
	getAllServiceHandles(contract: TypeLike): ServiceHandle[];
	/**
	 * Resolves an injection point on behalf of `root`.
	 * @throws UnsatisfiedDependencyError when nothing matches
	 */
	getInjecteeService(type: TypeExpression, qualifiers: readonly Annotation[], root: ServiceHandle | undefined): unknown;

	/** Runs `@PostConstruct` methods of an arbitrary instance. */
	postConstruct(instance: unknown): void;
	/** Runs `@PreDestroy` methods of an arbitrary instance. */
	preDestroy(instance: unknown): void;

	shutdown(): void;
	isShutdown(): boolean;
}

export const ServiceLocator = declareInterface<ServiceLocator>("ServiceLocator", {
	annotations: [CONTRACT.of(undefined)],
});
