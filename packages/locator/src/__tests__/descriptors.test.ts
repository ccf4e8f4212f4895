import { describe, expect, it } from "vitest";
import { declareInterface, formatType, raw } from "@providence/types";
import {
	Abstract,
	CacheNotSetError,
	ClassDescriptor,
	ConstantDescriptor,
	ContractsProvided,
	Inject,
	Rank,
	Singleton,
	createLocator,
	hasUsableConstructor,
	isUtilityClass,
} from "../index.js";
import { EnglishGreeter, LoudGreeter, NeedsArgs, Pool } from "./support/fixtures.js";

const Reader = declareInterface("Reader");
const Writer = declareInterface("Writer");

@ContractsProvided(() => [Reader, Writer, Reader])
class FileStore {}

@Abstract()
class Template {}

@Singleton()
@Rank(3)
@Inject(() => [Pool])
class Ranked {
	constructor(readonly pool: Pool) {}
}

class Strings {
	static readonly EMPTY = "";

	static blank(value: string): boolean {
		return value.trim() === "";
	}
}

describe("ClassDescriptor", () => {
	const locator = createLocator("descriptors");

	it("should advertise the class and its contract interfaces", () => {
		const descriptor = new ClassDescriptor(EnglishGreeter, locator);

		expect(descriptor.contractTypes.map(formatType)).toEqual(["EnglishGreeter", "Greeter"]);
	});

	it("should advertise exactly the provided contracts", () => {
		const descriptor = new ClassDescriptor(FileStore, locator);

		expect(descriptor.contractTypes.map(formatType)).toEqual(["Reader", "Writer"]);
	});

	it("should default to per-lookup scope", () => {
		expect(new ClassDescriptor(EnglishGreeter, locator).scopeAnnotation.toString()).toBe("@PerLookup");
		expect(new ClassDescriptor(Ranked, locator).scopeAnnotation.toString()).toBe("@Singleton");
	});

	it("should read the ranking once and let an explicit value win", () => {
		const descriptor = new ClassDescriptor(LoudGreeter, locator);

		expect(descriptor.getRanking()).toBe(5);
		expect(descriptor.setRanking(8)).toBe(5);
		expect(descriptor.getRanking()).toBe(8);
		expect(descriptor.setRanking(2)).toBe(8);
	});

	it("should fail to read an unset cache", () => {
		const descriptor = new ClassDescriptor(Ranked, locator);

		expect(descriptor.isCacheSet()).toBe(false);
		expect(() => descriptor.getCache()).toThrow(new CacheNotSetError("ClassDescriptor(Ranked)"));
	});

	it("should set and release the cache", () => {
		const descriptor = new ClassDescriptor(Ranked, locator);

		descriptor.setCache("cached");
		expect(descriptor.getCache()).toBe("cached");

		descriptor.releaseCache();
		expect(descriptor.isCacheSet()).toBe(false);
	});

	it("should ignore disposal of missing instances", () => {
		const descriptor = new ClassDescriptor(Ranked, locator);

		expect(() => descriptor.dispose(null)).not.toThrow();
		expect(() => descriptor.dispose(undefined)).not.toThrow();
	});
});

describe("ConstantDescriptor", () => {
	it("should be a pre-cached singleton", () => {
		const descriptor = new ConstantDescriptor("value", raw(String), { ranking: 4 });

		expect(descriptor.getCache()).toBe("value");
		expect(descriptor.scopeAnnotation.toString()).toBe("@Singleton");
		expect(descriptor.getRanking()).toBe(4);
		expect(descriptor.contractTypes.map(formatType)).toEqual(["String"]);
	});
});

describe("constructor analysis", () => {
	it("should accept classes without parameters or with an inject list", () => {
		expect(hasUsableConstructor(Pool)).toBe(true);
		expect(hasUsableConstructor(Ranked)).toBe(true);
	});

	it("should reject abstract classes and undeclared parameters", () => {
		expect(hasUsableConstructor(Template)).toBe(false);
		expect(hasUsableConstructor(NeedsArgs)).toBe(false);
		expect(hasUsableConstructor(Reader)).toBe(false);
	});

	it("should detect classes made of static members", () => {
		expect(isUtilityClass(Strings)).toBe(true);
		expect(isUtilityClass(Pool)).toBe(false);
		expect(isUtilityClass(EnglishGreeter)).toBe(false);
	});
});
