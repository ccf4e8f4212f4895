import type { Annotation, TypeExpression, TypeKey } from "@providence/types";
import type { ServiceHandle } from "./service-handle.js";

/**
 * Metadata and behaviour the locator uses to create and destroy one kind of
 * service.
 */
export interface ActiveDescriptor {
	/** Erased class of the produced instances. */
	readonly implementationClass: TypeKey;
	readonly implementationType: TypeExpression;
	readonly contractTypes: readonly TypeExpression[];
	readonly scopeAnnotation: Annotation;
	readonly qualifierAnnotations: readonly Annotation[];
	readonly name: string | undefined;

	isReified(): boolean;
	reify(): void;

	getRanking(): number;
	/** Returns the previous ranking. */
	setRanking(ranking: number): number;

	isCacheSet(): boolean;
	/** Throws when no value has been cached. */
	getCache(): unknown;
	setCache(value: unknown): void;
	releaseCache(): void;

	create(root: ServiceHandle): unknown;
	/** No-op for null and undefined. */
	dispose(instance: unknown): void;
}
