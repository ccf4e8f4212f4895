import type { TypeKey } from "./class-ref.js";
import type { TypeExpression } from "./type-expression.js";

/**
 * Raw type of a class-like expression, or null for variables, wildcards
 * and arrays.
 */
export function rawKeyOf(type: TypeExpression): TypeKey | null {
	switch (type.kind) {
		case "raw":
			return type.key;
		case "parameterized":
			return type.raw;
		default:
			return null;
	}
}

/**
 * Erasure of a type: variables and wildcards erase to their first upper
 * bound, arrays to Array.
 */
export function rawClassOf(type: TypeExpression): TypeKey {
	switch (type.kind) {
		case "raw":
			return type.key;
		case "parameterized":
			return type.raw;
		case "array":
			return Array;
		case "variable":
			return type.bounds.length > 0 ? rawClassOf(type.bounds[0]) : Object;
		case "wildcard":
			return type.upperBounds.length > 0 ? rawClassOf(type.upperBounds[0]) : Object;
	}
}
