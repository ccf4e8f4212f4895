import { keyName } from "./class-ref.js";
import { type TypeExpression, isObjectType } from "./type-expression.js";

function join(types: readonly TypeExpression[], separator: string): string {
	return types.map(formatType).join(separator);
}

/**
 * Human-readable rendering: `List<String>`, `? extends Number`, `T[]`.
 */
export function formatType(type: TypeExpression): string {
	switch (type.kind) {
		case "raw":
			return keyName(type.key);
		case "parameterized": {
			const prefix = type.owner === null ? "" : `${formatType(type.owner)}.`;
			const args = type.args.length === 0 ? "" : `<${join(type.args, ", ")}>`;
			return `${prefix}${keyName(type.raw)}${args}`;
		}
		case "wildcard":
			if (type.lowerBounds.length > 0) {
				return `? super ${join(type.lowerBounds, " & ")}`;
			}
			if (type.upperBounds.length === 0 || isObjectType(type.upperBounds[0])) {
				return "?";
			}
			return `? extends ${join(type.upperBounds, " & ")}`;
		case "variable":
			return type.name;
		case "array":
			return `${formatType(type.component)}[]`;
	}
}
