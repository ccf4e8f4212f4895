import { advertisedContracts } from "@providence/locator";
import { type TypeExpression, toType, uniqueTypes } from "@providence/types";
import type { ProvidesOptions } from "../annotations.js";

/**
 * Explicit `contracts` when given and non-empty, otherwise whatever the
 * provided type advertises.
 */
export function providerContracts(options: ProvidesOptions, providedType: TypeExpression): TypeExpression[] {
	const explicit = options.contracts?.() ?? [];
	if (explicit.length > 0) {
		return uniqueTypes(explicit.map(toType));
	}
	return advertisedContracts(providedType);
}
