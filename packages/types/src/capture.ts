import { type TypeExpression, TypeVariable } from "./type-expression.js";
import { formatType } from "./format-type.js";

/**
 * Mints capture variables for a single resolution call. Numbering restarts
 * with every arena, and captures from different arenas are never equal.
 */
export class CaptureArena {
	private count = 0;

	capture(bounds: readonly TypeExpression[]): TypeVariable {
		this.count++;
		const name = `capture#${this.count} of ? extends ${bounds.map(formatType).join(" & ")}`;
		const captured = [...bounds];
		return new TypeVariable(name, this, () => captured);
	}

	get size(): number {
		return this.count;
	}
}
