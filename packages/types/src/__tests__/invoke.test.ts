import { describe, expect, it } from "vitest";
import { MemberAccessError, invokeMethod, readField } from "../index.js";

class Counter {
	static created = 0;
	count = 2;

	add(amount: number): number {
		return this.count + amount;
	}

	static make(): Counter {
		Counter.created++;
		return new Counter();
	}
}

describe("invokeMethod", () => {
	it("calls instance methods with the receiver bound", () => {
		expect(invokeMethod(new Counter(), "add", [3])).toBe(5);
	});

	it("calls static methods on the class", () => {
		expect(invokeMethod(Counter, "make", [])).toBeInstanceOf(Counter);
		expect(Counter.created).toBe(1);
	});

	it("rejects non-methods", () => {
		expect(() => invokeMethod(new Counter(), "count", [])).toThrow(MemberAccessError);
		expect(() => invokeMethod(new Counter(), "missing", [])).toThrow("missing is not a method of Counter");
	});
});

describe("readField", () => {
	it("reads instance and static fields", () => {
		expect(readField(new Counter(), "count")).toBe(2);
		expect(readField(Counter, "created")).toBeTypeOf("number");
	});

	it("rejects unknown fields", () => {
		expect(() => readField(Counter, "missing")).toThrow("missing is not a field of Counter");
	});
});
