import { NAMED, RANK } from "../annotations.js";
import { type Annotation, type TypeExpression, type TypeKey, getAnnotations, rawClassOf, withMarker } from "@providence/types";
import { AbstractActiveDescriptor } from "./abstract-active-descriptor.js";
import { SINGLETON_SCOPE, advertisedContracts } from "./contracts.js";

export interface ConstantOptions {
	/** Defaults to the contracts of `type`. */
	contracts?: readonly TypeExpression[];
	qualifiers?: readonly Annotation[];
	ranking?: number;
}

/**
 * Singleton descriptor around an existing object. The locator never
 * disposes constants.
 */
export class ConstantDescriptor extends AbstractActiveDescriptor {
	readonly implementationClass: TypeKey;
	readonly contractTypes: readonly TypeExpression[];
	readonly scopeAnnotation = SINGLETON_SCOPE;
	readonly qualifierAnnotations: readonly Annotation[];
	readonly name: string | undefined;

	constructor(
		private readonly constant: unknown,
		readonly implementationType: TypeExpression,
		private readonly options: ConstantOptions = {},
	) {
		super();
		this.implementationClass = rawClassOf(implementationType);
		this.contractTypes = options.contracts ?? advertisedContracts(implementationType);
		const annotations = [...getAnnotations(this.implementationClass), ...(options.qualifiers ?? [])];
		this.qualifierAnnotations = withMarker(annotations, "qualifier");
		this.name = NAMED.read(this.qualifierAnnotations);
		this.setCache(constant);
	}

	protected initialRanking(): number {
		return this.options.ranking ?? RANK.read(getAnnotations(this.implementationClass)) ?? 0;
	}

	create(): unknown {
		return this.constant;
	}

	protected destroy(): void {}
}
