import { describe, expect, it } from "vitest";
import { MultiError, ProvidenceError, formatError, toError } from "../index.js";

class SampleError extends ProvidenceError {}

describe("ProvidenceError", () => {
	it("uses the subclass name", () => {
		const err = new SampleError("boom");
		expect(err.name).toBe("SampleError");
		expect(err).toBeInstanceOf(Error);
	});
});

describe("MultiError", () => {
	it("aggregates errors and exposes the first as cause", () => {
		const first = new SampleError("first");
		const second = new Error("second");
		const multi = new MultiError([first, second]);

		expect(multi.errors).toEqual([first, second]);
		expect(multi.cause).toBe(first);
		expect(multi.message).toBe("2 error(s) occurred:\n  1. SampleError: first\n  2. Error: second");
	});

	it("accepts a single error", () => {
		const multi = new MultiError(new SampleError("only"));
		expect(multi.errors).toHaveLength(1);
		expect(multi.has(SampleError)).toBe(true);
		expect(multi.has(TypeError)).toBe(false);
	});

	it("wraps thrown values without nesting aggregates", () => {
		const existing = new MultiError(new Error("inner"));
		expect(MultiError.wrap(existing)).toBe(existing);

		const wrapped = MultiError.wrap("plain string");
		expect(wrapped.errors[0].message).toBe("plain string");
	});
});

describe("error helpers", () => {
	it("formats errors and other values", () => {
		expect(formatError(new Error("bad"))).toBe("bad");
		expect(formatError(42)).toBe("42");
	});

	it("keeps the name of error subclasses", () => {
		expect(formatError(new ProvidenceError("broken"))).toBe("ProvidenceError: broken");
		expect(formatError(new TypeError("wrong"))).toBe("TypeError: wrong");
	});

	it("converts unknown values to errors", () => {
		const err = new TypeError("t");
		expect(toError(err)).toBe(err);
		expect(toError(undefined).message).toBe("undefined");
	});
});
