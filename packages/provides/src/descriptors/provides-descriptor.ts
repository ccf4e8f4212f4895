import { AbstractActiveDescriptor, NAMED, RANK, type ServiceHandle } from "@providence/locator";
import {
	type Annotation,
	type Class,
	type MemberDescription,
	type TypeExpression,
	type TypeKey,
	getAnnotations,
	isClass,
	memberLabel,
	rawClassOf,
	withMarker,
} from "@providence/types";

export type CreateFunction = (root: ServiceHandle) => unknown;

export type DisposeFunction = (instance: unknown) => void;

/**
 * What a descriptor was synthesized from: a provider member, or a class the
 * locator cannot construct.
 */
export type ProviderSource = MemberDescription | Class;

export interface ProvidesDescriptorInit {
	source: ProviderSource;
	implementationType: TypeExpression;
	contracts: readonly TypeExpression[];
	scope: Annotation;
	create: CreateFunction;
	dispose: DisposeFunction;
}

function annotationsOf(source: ProviderSource): readonly Annotation[] {
	return isClass(source) ? getAnnotations(source) : source.annotations;
}

export function sourceLabel(source: ProviderSource): string {
	return isClass(source) ? source.name : memberLabel(source);
}

/**
 * Descriptor of one discovered provider. Everything except the ranking and
 * the cache is fixed at construction.
 */
export class ProvidesDescriptor extends AbstractActiveDescriptor {
	readonly source: ProviderSource;
	readonly implementationClass: TypeKey;
	readonly implementationType: TypeExpression;
	readonly contractTypes: readonly TypeExpression[];
	readonly scopeAnnotation: Annotation;
	readonly qualifierAnnotations: readonly Annotation[];
	readonly name: string | undefined;
	private readonly createFunction: CreateFunction;
	private readonly disposeFunction: DisposeFunction;

	constructor(init: ProvidesDescriptorInit) {
		super();
		const annotations = annotationsOf(init.source);
		this.source = init.source;
		this.implementationType = init.implementationType;
		this.implementationClass = rawClassOf(init.implementationType);
		this.contractTypes = init.contracts;
		this.scopeAnnotation = init.scope;
		this.qualifierAnnotations = withMarker(annotations, "qualifier");
		this.name = NAMED.read(annotations);
		this.createFunction = init.create;
		this.disposeFunction = init.dispose;
	}

	protected initialRanking(): number {
		return RANK.read(annotationsOf(this.source)) ?? 0;
	}

	create(root: ServiceHandle): unknown {
		return this.createFunction(root);
	}

	protected destroy(instance: unknown): void {
		this.disposeFunction(instance);
	}

	override toString(): string {
		return `ProvidesDescriptor(${sourceLabel(this.source)})`;
	}
}
