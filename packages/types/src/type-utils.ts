import { CaptureArena } from "./capture.js";
import { getTypeDeclaration } from "./declarations.js";
import {
	type TypeExpression,
	type TypeLike,
	TypeVariable,
	isObjectType,
	parameterized,
	raw,
	toType,
	arrayOf,
	wildcardType,
} from "./type-expression.js";
import { typeKeyOf, uniqueTypes } from "./type-equality.js";

/**
 * True if any node reachable from `type` is a type variable.
 */
export function containsTypeVariable(type: TypeLike): boolean {
	const seen = new Set<string>();

	const matches = (current: TypeExpression): boolean => {
		const key = typeKeyOf(current);
		if (seen.has(key)) {
			return false;
		}
		seen.add(key);

		switch (current.kind) {
			case "variable":
				return true;
			case "raw":
				return false;
			case "wildcard":
				return current.lowerBounds.some(matches) || current.upperBounds.some(matches);
			case "parameterized":
				return (current.owner !== null && matches(current.owner)) || current.args.some(matches);
			case "array":
				return matches(current.component);
		}
	};

	return matches(toType(type));
}

// ============================================================================
// Capture conversion
// ============================================================================

function combinedBounds(upper: readonly TypeExpression[], declared: readonly TypeExpression[]): TypeExpression[] {
	const combined = uniqueTypes([...upper, ...declared]);
	return combined.length > 1 ? combined.filter((bound) => !isObjectType(bound)) : combined;
}

/**
 * Replaces every `?` wildcard (one without lower bounds) with a capture
 * variable from `arena`. `declared` holds the bounds of the type parameter
 * the type occupies, if any.
 */
function captureWildcards(type: TypeExpression, arena: CaptureArena, declared: readonly TypeExpression[] = []): TypeExpression {
	switch (type.kind) {
		case "variable":
		case "raw":
			return type;
		case "wildcard":
			return type.lowerBounds.length > 0 ? type : arena.capture(combinedBounds(type.upperBounds, declared));
		case "parameterized": {
			const parameters = getTypeDeclaration(type.raw).typeParameters;
			const args = type.args.map((arg, i) => captureWildcards(arg, arena, parameters[i]?.bounds ?? []));
			const owner = type.owner === null ? null : captureWildcards(type.owner, arena);
			return parameterized(type.raw, args, owner);
		}
		case "array":
			return arrayOf(captureWildcards(type.component, arena));
	}
}

// ============================================================================
// Variable mappings
// ============================================================================

class VariableMappings {
	private readonly seen = new Set<string>();
	private readonly map = new Map<string, TypeExpression>();

	static of(context: TypeExpression): VariableMappings {
		const mappings = new VariableMappings();
		mappings.add(context);
		return mappings;
	}

	/**
	 * Follows variable-to-variable links until reaching a non-variable or an
	 * unmapped variable.
	 */
	get(type: TypeExpression): TypeExpression {
		const visited = new Set<string>();
		let current = type;
		while (current instanceof TypeVariable) {
			const key = typeKeyOf(current);
			const next = this.map.get(key);
			if (next === undefined || visited.has(key)) {
				break;
			}
			visited.add(key);
			current = next;
		}
		return current;
	}

	private put(variable: TypeVariable, value: TypeExpression): void {
		const key = typeKeyOf(variable);
		if (!this.map.has(key)) {
			this.map.set(key, value);
		}
	}

	private add(type: TypeExpression): void {
		const key = typeKeyOf(type);
		if (this.seen.has(key)) {
			return;
		}
		this.seen.add(key);

		switch (type.kind) {
			case "variable":
				type.bounds.forEach((bound) => this.add(bound));
				break;
			case "raw": {
				const declaration = getTypeDeclaration(type.key);
				if (declaration.superclass !== null) {
					this.add(declaration.superclass);
				}
				declaration.interfaces.forEach((iface) => this.add(iface));
				break;
			}
			case "wildcard":
				type.upperBounds.forEach((bound) => this.add(bound));
				break;
			case "parameterized": {
				const parameters = getTypeDeclaration(type.raw).typeParameters;
				const count = Math.min(parameters.length, type.args.length);
				for (let i = 0; i < count; i++) {
					this.put(parameters[i], type.args[i]);
				}
				this.add(raw(type.raw));
				if (type.owner !== null) {
					this.add(type.owner);
				}
				break;
			}
			case "array":
				this.add(type.component);
				break;
		}
	}
}

// ============================================================================
// Substitution
// ============================================================================

function substitute(type: TypeExpression, mappings: VariableMappings, resolving: Set<string>): TypeExpression {
	switch (type.kind) {
		case "variable": {
			const mapped = mappings.get(type);
			if (mapped instanceof TypeVariable) {
				return mapped;
			}
			// A mapped value may itself mention variables of the context hierarchy.
			const key = typeKeyOf(type);
			if (resolving.has(key)) {
				return mapped;
			}
			resolving.add(key);
			const result = substitute(mapped, mappings, resolving);
			resolving.delete(key);
			return result;
		}
		case "raw":
			return type;
		case "wildcard":
			return wildcardType(
				type.lowerBounds.map((bound) => substitute(bound, mappings, resolving)),
				type.upperBounds.map((bound) => substitute(bound, mappings, resolving)),
			);
		case "parameterized":
			return parameterized(
				type.raw,
				type.args.map((arg) => substitute(arg, mappings, resolving)),
				type.owner === null ? null : substitute(type.owner, mappings, resolving),
			);
		case "array":
			return arrayOf(substitute(type.component, mappings, resolving));
	}
}

/**
 * Resolves the type variables of `dependent` using the type arguments found
 * in `context` and its supertypes. Wildcards in `context` are captured first,
 * so each `?` becomes a distinct variable named `capture#N of ? extends B`,
 * numbered from 1 within this call. Variables with no mapping are returned
 * unchanged; callers detect them with {@link containsTypeVariable}.
 *
 * @example
 * // Repo<String> declares `T`; resolving `List<T>` yields `List<String>`.
 * resolveType(parameterized(Repo, [String]), parameterized(List, [typeVariable(Repo, "T")]));
 */
export function resolveType(context: TypeLike, dependent: TypeLike): TypeExpression {
	const arena = new CaptureArena();
	const mappings = VariableMappings.of(captureWildcards(toType(context), arena));
	return substitute(toType(dependent), mappings, new Set());
}

/**
 * Like {@link resolveType} but without capture conversion, so wildcards in
 * `context` are substituted as they are.
 */
export function substituteTypeVariables(context: TypeLike, dependent: TypeLike): TypeExpression {
	const mappings = VariableMappings.of(toType(context));
	return substitute(toType(dependent), mappings, new Set());
}
