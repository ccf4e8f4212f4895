import { INJECT, NAMED, RANK } from "../annotations.js";
import { MultiError } from "@providence/shared";
import {
	type Annotation,
	type Class,
	type TypeExpression,
	getAnnotations,
	raw,
	resolveType,
	toParameters,
	withMarker,
} from "@providence/types";
import type { ServiceHandle } from "../api/service-handle.js";
import type { ServiceLocator } from "../api/service-locator.js";
import { AbstractActiveDescriptor } from "./abstract-active-descriptor.js";
import { PER_LOOKUP_SCOPE, advertisedContracts, scopeOf } from "./contracts.js";

/**
 * Descriptor of a class the locator constructs itself, injecting the
 * parameters listed by `@Inject`.
 */
export class ClassDescriptor extends AbstractActiveDescriptor {
	readonly implementationType: TypeExpression;
	readonly scopeAnnotation: Annotation;
	readonly qualifierAnnotations: readonly Annotation[];
	readonly name: string | undefined;
	private contracts: readonly TypeExpression[] | undefined;
	private readonly annotations: readonly Annotation[];

	constructor(
		readonly implementationClass: Class,
		private readonly locator: ServiceLocator,
		type?: TypeExpression,
	) {
		super();
		this.implementationType = type ?? raw(implementationClass);
		this.annotations = getAnnotations(implementationClass);
		this.scopeAnnotation = scopeOf(this.annotations) ?? PER_LOOKUP_SCOPE;
		this.qualifierAnnotations = withMarker(this.annotations, "qualifier");
		this.name = NAMED.read(this.annotations);
	}

	get contractTypes(): readonly TypeExpression[] {
		return this.resolveContracts();
	}

	override isReified(): boolean {
		return this.contracts !== undefined;
	}

	override reify(): void {
		this.resolveContracts();
	}

	private resolveContracts(): readonly TypeExpression[] {
		this.contracts ??= advertisedContracts(this.implementationType);
		return this.contracts;
	}

	protected initialRanking(): number {
		return RANK.read(this.annotations) ?? 0;
	}

	create(root: ServiceHandle): unknown {
		const parameters = toParameters(INJECT.read(this.annotations)?.() ?? []);
		const args = parameters.map((parameter) =>
			root.locator.getInjecteeService(
				resolveType(this.implementationType, parameter.type),
				parameter.qualifiers,
				root,
			),
		);
		let instance: unknown;
		try {
			instance = Reflect.construct(this.implementationClass, args);
		} catch (err) {
			throw MultiError.wrap(err);
		}
		this.locator.postConstruct(instance);
		return instance;
	}

	protected destroy(instance: unknown): void {
		this.locator.preDestroy(instance);
	}
}
