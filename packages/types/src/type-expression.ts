import { InterfaceToken, type TypeKey, isClass } from "./class-ref.js";
import type { CaptureArena } from "./capture.js";

export interface RawType {
	readonly kind: "raw";
	readonly key: TypeKey;
}

export interface ParameterizedType {
	readonly kind: "parameterized";
	readonly owner: TypeExpression | null;
	readonly raw: TypeKey;
	readonly args: readonly TypeExpression[];
}

export interface WildcardType {
	readonly kind: "wildcard";
	readonly lowerBounds: readonly TypeExpression[];
	readonly upperBounds: readonly TypeExpression[];
}

export interface ArrayType {
	readonly kind: "array";
	readonly component: TypeExpression;
}

/**
 * Where a type variable was declared: a generic class or interface, or the
 * capture arena of one resolution call.
 */
export type VariableDeclaration = TypeKey | CaptureArena;

/**
 * A type variable. Two variables are the same variable when they share a
 * declaration and a name; bounds never take part in equality.
 *
 * Bounds are read lazily so a variable may appear in its own bound
 * (`T extends Comparable<T>`).
 */
export class TypeVariable {
	readonly kind = "variable";
	private resolvedBounds: readonly TypeExpression[] | undefined;

	constructor(
		readonly name: string,
		readonly declaration: VariableDeclaration,
		private readonly boundsThunk: () => readonly TypeExpression[],
	) {}

	get bounds(): readonly TypeExpression[] {
		if (this.resolvedBounds === undefined) {
			this.resolvedBounds = this.boundsThunk();
		}
		return this.resolvedBounds;
	}

	toString(): string {
		return this.name;
	}
}

export type TypeExpression = RawType | ParameterizedType | WildcardType | TypeVariable | ArrayType;

/**
 * Anything accepted where a type is expected. Bare classes and interface
 * tokens stand for their raw type.
 */
export type TypeLike = TypeExpression | TypeKey;

// ============================================================================
// Builders
// ============================================================================

export function raw(key: TypeKey): RawType {
	return { kind: "raw", key };
}

export const OBJECT_TYPE: RawType = raw(Object);

export function toType(type: TypeLike): TypeExpression {
	if (isClass(type) || type instanceof InterfaceToken) {
		return raw(type);
	}
	return type;
}

/**
 * `Raw<A, B>`. With no arguments this is the raw type itself.
 */
export function parameterized(
	rawKey: TypeKey,
	args: readonly TypeLike[],
	owner: TypeLike | null = null,
): ParameterizedType | RawType {
	if (args.length === 0 && owner === null) {
		return raw(rawKey);
	}
	return {
		kind: "parameterized",
		owner: owner === null ? null : toType(owner),
		raw: rawKey,
		args: args.map(toType),
	};
}

export function wildcardType(
	lowerBounds: readonly TypeLike[],
	upperBounds: readonly TypeLike[],
): WildcardType {
	return {
		kind: "wildcard",
		lowerBounds: lowerBounds.map(toType),
		upperBounds: upperBounds.length === 0 ? [OBJECT_TYPE] : upperBounds.map(toType),
	};
}

/** `?` */
export function wildcard(): WildcardType {
	return wildcardType([], []);
}

/** `? extends B1 & B2` */
export function wildcardExtends(...bounds: TypeLike[]): WildcardType {
	return wildcardType([], bounds);
}

/** `? super B` */
export function wildcardSuper(...bounds: TypeLike[]): WildcardType {
	return wildcardType(bounds, []);
}

export function arrayOf(component: TypeLike): ArrayType {
	return { kind: "array", component: toType(component) };
}

export function isObjectType(type: TypeExpression): boolean {
	return type.kind === "raw" && type.key === Object;
}

