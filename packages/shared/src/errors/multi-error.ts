import { ProvidenceError } from "./providence-error.js";
import { toError } from "../utils/to-error.js";

function describeErrors(errors: readonly Error[]): string {
	if (errors.length === 0) {
		return "MultiError with no errors";
	}
	const lines = errors.map((err, i) => `  ${i + 1}. ${err.name}: ${err.message}`);
	return `${errors.length} error(s) occurred:\n${lines.join("\n")}`;
}

/**
 * Aggregate of one or more failures raised while creating, reading or
 * disposing a service. `cause` is the first error.
 */
export class MultiError extends ProvidenceError {
	readonly errors: readonly Error[];

	constructor(errors: Error | readonly Error[]) {
		const list = errors instanceof Error ? [errors] : [...errors];
		super(describeErrors(list), list.length > 0 ? { cause: list[0] } : undefined);
		this.errors = list;
	}

	/**
	 * Wrap a thrown value, leaving an existing MultiError untouched.
	 */
	static wrap(value: unknown): MultiError {
		return value instanceof MultiError ? value : new MultiError(toError(value));
	}

	/**
	 * Errors carried by a thrown value, unpacking a MultiError.
	 */
	static flatten(value: unknown): readonly Error[] {
		return value instanceof MultiError ? value.errors : [toError(value)];
	}

	/**
	 * True when any aggregated error is an instance of `type`.
	 */
	has(type: abstract new (...args: never[]) => Error): boolean {
		return this.errors.some((err) => err instanceof type);
	}
}
