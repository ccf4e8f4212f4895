import {
	AnnotationType,
	type ParameterLike,
	type TypeLike,
	type UniversalDecorator,
	type ValueGuard,
	annotate,
	isNumber,
	isString,
	markerType,
} from "@providence/types";

type ContractsThunk = () => readonly TypeLike[];
type ParametersThunk = () => readonly ParameterLike[];

const isThunk = <R>(value: unknown): value is () => R => typeof value === "function";
const isContractsThunk: ValueGuard<ContractsThunk> = isThunk;
const isParametersThunk: ValueGuard<ParametersThunk> = isThunk;

// ============================================================================
// Annotation types
// ============================================================================

/** One shared instance per locator. */
export const SINGLETON = markerType("Singleton", ["scope"]);

/** A new instance for every lookup, disposed when its handle closes. */
export const PER_LOOKUP = markerType("PerLookup", ["scope"]);

export const NAMED = new AnnotationType("Named", isString, ["qualifier"]);

export const RANK = new AnnotationType("Rank", isNumber);

export const CONTRACT = markerType("Contract");

export const CONTRACTS_PROVIDED = new AnnotationType("ContractsProvided", isContractsThunk);

export const INJECT = new AnnotationType("Inject", isParametersThunk);

/** Marks a class that must never be instantiated directly. */
export const ABSTRACT = markerType("Abstract");

export const POST_CONSTRUCT = markerType("PostConstruct");

export const PRE_DESTROY = markerType("PreDestroy");

// ============================================================================
// Decorators
// ============================================================================

export function Singleton(): UniversalDecorator {
	return annotate(SINGLETON.of(undefined));
}

export function PerLookup(): UniversalDecorator {
	return annotate(PER_LOOKUP.of(undefined));
}

export function Named(name: string): UniversalDecorator {
	return annotate(NAMED.of(name));
}

export function Rank(rank: number): UniversalDecorator {
	return annotate(RANK.of(rank));
}

export function Contract(): UniversalDecorator {
	return annotate(CONTRACT.of(undefined));
}

/**
 * Replaces the contracts a class would otherwise advertise.
 */
export function ContractsProvided(contracts: ContractsThunk): UniversalDecorator {
	return annotate(CONTRACTS_PROVIDED.of(contracts));
}

/**
 * Declares the constructor parameters the locator resolves on creation.
 */
export function Inject(parameters: ParametersThunk = () => []): UniversalDecorator {
	return annotate(INJECT.of(parameters));
}

export function Abstract(): UniversalDecorator {
	return annotate(ABSTRACT.of(undefined));
}

export function PostConstruct(): UniversalDecorator {
	return annotate(POST_CONSTRUCT.of(undefined));
}

export function PreDestroy(): UniversalDecorator {
	return annotate(PRE_DESTROY.of(undefined));
}
