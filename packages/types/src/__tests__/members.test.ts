import { describe, expect, it } from "vitest";
import {
	AnnotationType,
	type MemberDescription,
	Signature,
	annotate,
	findMethods,
	formatType,
	getAnnotations,
	getMembers,
	hasPrototypeMethods,
	isString,
	markerType,
	memberLabel,
	parameterized,
	withMarker,
} from "../index.js";
import { List } from "./support/generic-fixtures.js";

const Tag = new AnnotationType("Tag", isString, ["qualifier"]);
const Marker = markerType("Marker", ["scope"]);

@annotate(Marker.of(undefined))
class Sample {
	@annotate(Tag.of("field"))
	@Signature({ type: () => String })
	label = "sample";

	@annotate(Tag.of("method"))
	@Signature({
		type: () => parameterized(List, [String]),
		parameters: () => [Number, { type: String, qualifiers: [Tag.of("param")] }],
	})
	make(count: number, prefix: string): string[] {
		return Array.from({ length: count }, () => prefix);
	}

	@annotate(Tag.of("static"))
	static create(): Sample {
		return new Sample();
	}
}

class SubSample extends Sample {
	@annotate(Tag.of("override"))
	make(): string[] {
		return [];
	}
}

class Plain {
	close(): void {}

	static shutdown(_reason: string): void {}
}

class Util {
	static helper(): number {
		return 1;
	}
}

function byName(members: MemberDescription[], name: string): MemberDescription {
	const found = members.find((member) => member.name === name);
	if (!found) {
		throw new Error(`no member ${name}`);
	}
	return found;
}

describe("annotations", () => {
	it("stores class annotations", () => {
		expect(Marker.isPresent(getAnnotations(Sample))).toBe(true);
		expect(getAnnotations(SubSample)).toEqual([]);
	});

	it("reads typed values", () => {
		const make = byName(getMembers(Sample), "make");
		expect(Tag.read(make.annotations)).toBe("method");
		expect(Marker.read(make.annotations)).toBeUndefined();
	});

	it("filters by meta-marker", () => {
		expect(withMarker(getAnnotations(Sample), "scope").map(String)).toEqual(["@Marker"]);
		expect(withMarker(getAnnotations(Sample), "qualifier")).toEqual([]);
	});
});

describe("getMembers", () => {
	it("describes methods with their declared signature", () => {
		const make = byName(getMembers(Sample), "make");
		expect(make.kind).toBe("instance-method");
		if (make.kind === "instance-method") {
			expect(formatType(make.returnType)).toBe("List<String>");
			expect(make.parameters.map((p) => formatType(p.type))).toEqual(["Number", "String"]);
			expect(make.parameters[1].qualifiers.map(String)).toEqual(["@Tag(param)"]);
		}
	});

	it("describes fields and static members", () => {
		const members = getMembers(Sample);
		const label = byName(members, "label");
		const create = byName(members, "create");

		expect(label.kind).toBe("instance-field");
		expect(create.kind).toBe("static-method");
		expect(memberLabel(create)).toBe("Sample.create()");
		expect(memberLabel(label)).toBe("Sample#label");
	});

	it("lets subclasses hide inherited members", () => {
		const members = getMembers(SubSample);
		const make = byName(members, "make");

		expect(members).toHaveLength(3);
		expect(make.declaringClass).toBe(SubSample);
		expect(Tag.read(make.annotations)).toBe("override");
		expect(byName(members, "label").declaringClass).toBe(Sample);
	});
});

describe("findMethods", () => {
	it("prefers recorded signatures", () => {
		const [make] = findMethods(Sample, "make", false);
		expect(make.parameters).toHaveLength(2);
	});

	it("falls back to runtime functions", () => {
		const [close] = findMethods(Plain, "close", false);
		expect(close.parameters).toEqual([]);

		const [shutdown] = findMethods(Plain, "shutdown", true);
		expect(shutdown.parameters.map((p) => formatType(p.type))).toEqual(["Object"]);
	});

	it("matches staticness", () => {
		expect(findMethods(Plain, "close", true)).toEqual([]);
		expect(findMethods(Plain, "missing", false)).toEqual([]);
	});
});

describe("hasPrototypeMethods", () => {
	it("detects instance behaviour", () => {
		expect(hasPrototypeMethods(Plain)).toBe(true);
		expect(hasPrototypeMethods(Util)).toBe(false);
	});
});
