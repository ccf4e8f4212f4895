import { MultiError } from "@providence/shared";
import { MemberAccessError, type MemberDescription, memberLabel } from "@providence/types";

/**
 * Runs a reflective call. Anything it throws reaches the caller as a
 * MultiError.
 */
export function reflectively<T>(call: () => T): T {
	try {
		return call();
	} catch (err) {
		throw MultiError.wrap(err);
	}
}

/**
 * The value a member is read from or invoked on.
 */
export function asReceiver(value: unknown, member: MemberDescription): object {
	if ((typeof value === "object" && value !== null) || typeof value === "function") {
		return value;
	}
	throw new MultiError(new MemberAccessError(`No receiver for ${memberLabel(member)}: got ${String(value)}`));
}
