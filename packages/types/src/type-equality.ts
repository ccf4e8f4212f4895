import { identityOf } from "./identity.js";
import type { TypeExpression } from "./type-expression.js";

function keysOf(types: readonly TypeExpression[]): string {
	return types.map(typeKeyOf).join(",");
}

/**
 * Canonical structural key. Equal keys mean equal types; variables are keyed
 * by declaration and name only, so the walk never follows bounds.
 */
export function typeKeyOf(type: TypeExpression): string {
	switch (type.kind) {
		case "raw":
			return `R${identityOf(type.key)}`;
		case "parameterized": {
			const owner = type.owner === null ? "" : typeKeyOf(type.owner);
			return `P(${owner}|${identityOf(type.raw)}<${keysOf(type.args)}>)`;
		}
		case "wildcard":
			return `W(${keysOf(type.lowerBounds)};${keysOf(type.upperBounds)})`;
		case "variable":
			return `V${identityOf(type.declaration)}:${type.name}`;
		case "array":
			return `A(${typeKeyOf(type.component)})`;
	}
}

export function typeEquals(a: TypeExpression, b: TypeExpression): boolean {
	return a === b || typeKeyOf(a) === typeKeyOf(b);
}

/**
 * Removes structural duplicates, keeping first occurrences in order.
 */
export function uniqueTypes(types: Iterable<TypeExpression>): TypeExpression[] {
	const seen = new Set<string>();
	const result: TypeExpression[] = [];
	for (const type of types) {
		const key = typeKeyOf(type);
		if (!seen.has(key)) {
			seen.add(key);
			result.push(type);
		}
	}
	return result;
}
