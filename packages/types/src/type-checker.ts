import { getTypeDeclaration } from "./declarations.js";
import { rawKeyOf } from "./raw-types.js";
import { type TypeExpression, type TypeLike, type WildcardType, isObjectType, toType } from "./type-expression.js";
import { typeEquals, typeKeyOf } from "./type-equality.js";
import { substituteTypeVariables } from "./type-utils.js";

/**
 * `type` followed by every superclass and interface reachable from it, with
 * type arguments carried through. Duplicates are dropped; Object is included
 * last when reachable.
 */
export function getSupertypes(type: TypeLike): TypeExpression[] {
	const start = toType(type);
	const result: TypeExpression[] = [];
	const seen = new Set<string>();
	const queue: TypeExpression[] = [start];

	while (queue.length > 0) {
		const current = queue.shift();
		if (current === undefined) {
			break;
		}
		const key = typeKeyOf(current);
		if (seen.has(key)) {
			continue;
		}
		seen.add(key);
		result.push(current);

		const rawKey = rawKeyOf(current);
		if (rawKey === null) {
			continue;
		}
		const declaration = getTypeDeclaration(rawKey);
		const direct = declaration.superclass === null
			? declaration.interfaces
			: [declaration.superclass, ...declaration.interfaces];
		for (const supertype of direct) {
			queue.push(current.kind === "parameterized" ? substituteTypeVariables(current, supertype) : supertype);
		}
	}

	const object = result.findIndex(isObjectType);
	if (object >= 0 && object !== result.length - 1) {
		result.push(...result.splice(object, 1));
	}
	return result;
}

function wildcardContains(container: WildcardType, contained: TypeExpression): boolean {
	if (contained.kind === "wildcard") {
		return container.upperBounds.every((upper) => contained.upperBounds.some((inner) => isSupertypeOf(upper, inner)))
			&& container.lowerBounds.every((lower) => contained.lowerBounds.some((inner) => isSupertypeOf(inner, lower)));
	}
	return container.upperBounds.every((upper) => isSupertypeOf(upper, contained))
		&& container.lowerBounds.every((lower) => isSupertypeOf(contained, lower));
}

function argumentContains(container: TypeExpression, contained: TypeExpression): boolean {
	return container.kind === "wildcard" ? wildcardContains(container, contained) : typeEquals(container, contained);
}

/**
 * True when a value of type `subtype` may be used where `supertype` is
 * expected. Type arguments are invariant unless the supertype uses a
 * wildcard; arrays are covariant. A type variable is only a supertype of
 * itself, so capture variables reject every concrete argument.
 */
export function isSupertypeOf(supertype: TypeLike, subtype: TypeLike): boolean {
	const sup = toType(supertype);
	const sub = toType(subtype);

	if (typeEquals(sup, sub) || isObjectType(sup)) {
		return true;
	}

	if (sup.kind === "wildcard") {
		return wildcardContains(sup, sub);
	}

	switch (sub.kind) {
		case "variable":
			return sub.bounds.some((bound) => isSupertypeOf(sup, bound));
		case "wildcard":
			return sub.upperBounds.some((bound) => isSupertypeOf(sup, bound));
		case "array":
			return sup.kind === "array" && isSupertypeOf(sup.component, sub.component);
		case "raw":
		case "parameterized":
			break;
	}

	if (sup.kind !== "raw" && sup.kind !== "parameterized") {
		return false;
	}

	const target = sup.kind === "raw" ? sup.key : sup.raw;
	const match = getSupertypes(sub).find((candidate) => rawKeyOf(candidate) === target);
	if (match === undefined) {
		return false;
	}
	if (sup.kind === "raw") {
		return true;
	}
	if (match.kind !== "parameterized" || match.args.length !== sup.args.length) {
		return false;
	}
	return sup.args.every((arg, i) => argumentContains(arg, match.args[i]));
}
