import { type Annotation, type TypeExpression, type TypeKey, formatType } from "@providence/types";
import type { ActiveDescriptor } from "../api/active-descriptor.js";
import type { ServiceHandle } from "../api/service-handle.js";
import { CacheNotSetError } from "../errors/index.js";

/**
 * Ranking and cache bookkeeping shared by every descriptor.
 */
export abstract class AbstractActiveDescriptor implements ActiveDescriptor {
	private ranking: number | undefined;
	private cacheSet = false;
	private cache: unknown;

	abstract readonly implementationClass: TypeKey;
	abstract readonly implementationType: TypeExpression;
	abstract readonly contractTypes: readonly TypeExpression[];
	abstract readonly scopeAnnotation: Annotation;
	abstract readonly qualifierAnnotations: readonly Annotation[];
	abstract readonly name: string | undefined;

	/** Ranking used until `setRanking` is called. Read once. */
	protected abstract initialRanking(): number;

	protected abstract destroy(instance: unknown): void;

	abstract create(root: ServiceHandle): unknown;

	isReified(): boolean {
		return true;
	}

	reify(): void {}

	getRanking(): number {
		if (this.ranking === undefined) {
			this.ranking = this.initialRanking();
		}
		return this.ranking;
	}

	setRanking(ranking: number): number {
		const previous = this.getRanking();
		this.ranking = ranking;
		return previous;
	}

	isCacheSet(): boolean {
		return this.cacheSet;
	}

	getCache(): unknown {
		if (!this.cacheSet) {
			throw new CacheNotSetError(this.toString());
		}
		return this.cache;
	}

	setCache(value: unknown): void {
		this.cache = value;
		this.cacheSet = true;
	}

	releaseCache(): void {
		this.cache = undefined;
		this.cacheSet = false;
	}

	dispose(instance: unknown): void {
		if (instance === null || instance === undefined) {
			return;
		}
		this.destroy(instance);
	}

	toString(): string {
		return `${this.constructor.name}(${formatType(this.implementationType)})`;
	}
}
