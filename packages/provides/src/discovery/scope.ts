import { type ActiveDescriptor, PER_LOOKUP_SCOPE, scopeOf } from "@providence/locator";
import {
	type Annotation,
	type MemberDescription,
	type TypeExpression,
	getAnnotations,
	rawKeyOf,
} from "@providence/types";
import type { ProvidesOptions } from "../annotations.js";

function contractScope(contracts: readonly TypeExpression[]): Annotation | undefined {
	for (const contract of contracts) {
		const key = rawKeyOf(contract);
		const scope = key === null ? undefined : scopeOf(getAnnotations(key));
		if (scope !== undefined) {
			return scope;
		}
	}
	return undefined;
}

/**
 * Scope of a provided service. A nullable provider is always per-lookup,
 * since a null result cannot be cached.
 */
export function providerScope(
	options: ProvidesOptions,
	member: MemberDescription,
	contracts: readonly TypeExpression[],
	component: ActiveDescriptor | undefined,
): Annotation {
	if (options.nullable === true) {
		return PER_LOOKUP_SCOPE;
	}
	return scopeOf(member.annotations)
		?? contractScope(contracts)
		?? (member.isStatic ? undefined : component?.scopeAnnotation)
		?? PER_LOOKUP_SCOPE;
}
