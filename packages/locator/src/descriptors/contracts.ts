import { ABSTRACT, CONTRACT, CONTRACTS_PROVIDED, INJECT, PER_LOOKUP, SINGLETON } from "../annotations.js";
import {
	type Annotation,
	type Class,
	InterfaceToken,
	type TypeExpression,
	type TypeKey,
	getAnnotations,
	getSupertypes,
	hasPrototypeMethods,
	rawKeyOf,
	toType,
	uniqueTypes,
	withMarker,
} from "@providence/types";

/**
 * True when the type is marked `@Contract()` or carries an annotation whose
 * type is a contract indicator.
 */
export function isContract(key: TypeKey): boolean {
	const annotations = getAnnotations(key);
	return CONTRACT.isPresent(annotations) || withMarker(annotations, "contract-indicator").length > 0;
}

/**
 * The explicit `@ContractsProvided` list of a type, if it has one.
 */
export function providedContracts(key: TypeKey): TypeExpression[] | undefined {
	const contracts = CONTRACTS_PROVIDED.read(getAnnotations(key));
	return contracts === undefined ? undefined : uniqueTypes(contracts().map(toType));
}

/**
 * Contracts a type advertises by default: `@ContractsProvided` of its raw
 * type when present, otherwise the type itself followed by every supertype
 * that is a contract.
 */
export function advertisedContracts(type: TypeExpression): TypeExpression[] {
	const rawKey = rawKeyOf(type);
	const explicit = rawKey === null ? undefined : providedContracts(rawKey);
	if (explicit !== undefined) {
		return explicit;
	}
	const [self, ...supertypes] = getSupertypes(type);
	const contracts = supertypes.filter((supertype) => {
		const key = rawKeyOf(supertype);
		return key !== null && isContract(key);
	});
	return uniqueTypes([self, ...contracts]);
}

/**
 * First scope annotation in the list.
 */
export function scopeOf(annotations: readonly Annotation[]): Annotation | undefined {
	return withMarker(annotations, "scope")[0];
}

export function isSingletonScope(scope: Annotation): boolean {
	return scope.type === SINGLETON;
}

export const PER_LOOKUP_SCOPE = PER_LOOKUP.of(undefined);

export const SINGLETON_SCOPE = SINGLETON.of(undefined);

/**
 * Whether the locator can instantiate the class itself: it is not marked
 * `@Abstract()` and it either lists its injected parameters with `@Inject`
 * or declares no constructor parameters.
 */
export function hasUsableConstructor(key: TypeKey): key is Class {
	if (key instanceof InterfaceToken) {
		return false;
	}
	const annotations = getAnnotations(key);
	if (ABSTRACT.isPresent(annotations)) {
		return false;
	}
	return INJECT.isPresent(annotations) || key.length === 0;
}

/**
 * A class made of static members only.
 */
export function isUtilityClass(cls: Class): boolean {
	return !hasPrototypeMethods(cls) && Reflect.ownKeys(cls).some(
		(key) => key !== "length" && key !== "name" && key !== "prototype",
	);
}
