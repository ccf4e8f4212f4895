import { beforeEach, describe, expect, it } from "vitest";
import {
	type ActiveDescriptor,
	LocatorShutdownError,
	NAMED,
	NoUsableConstructorError,
	ServiceLocator,
	ServiceNotFoundError,
	UnsatisfiedDependencyError,
	UnsupportedOperationError,
	addClasses,
	addOneConstant,
	createLocator,
} from "../index.js";
import {
	Connection,
	EnglishGreeter,
	First,
	FormalGreeter,
	Greeter,
	LoudGreeter,
	Missing,
	NeedsArgs,
	NeedsMissing,
	Pool,
	Second,
	Session,
	Widget,
	events,
} from "./support/fixtures.js";

function bestOf(locator: ServiceLocator, contract: typeof Session | typeof Greeter): ActiveDescriptor {
	const descriptor = locator.getBestDescriptor(contract);
	if (descriptor === undefined) {
		throw new Error("no descriptor");
	}
	return descriptor;
}

describe("ServiceLocator", () => {
	let locator: ServiceLocator;

	beforeEach(() => {
		events.length = 0;
		locator = createLocator("test");
	});

	describe("lookup", () => {
		it("should register itself", () => {
			expect(locator.getService(ServiceLocator)).toBe(locator);
		});

		it("should cache singletons", () => {
			addClasses(locator, Pool);

			expect(locator.getService(Pool)).toBe(locator.getService(Pool));
		});

		it("should create per-lookup services on every lookup", () => {
			addClasses(locator, Connection);

			expect(locator.getService(Connection)).not.toBe(locator.getService(Connection));
		});

		it("should inject constructor parameters", () => {
			addClasses(locator, Pool, Connection, Session);

			const session = locator.getService(Session);

			expect(session.connection).toBeInstanceOf(Connection);
			expect(session.pool).toBe(locator.getService(Pool));
		});

		it("should report missing services", () => {
			expect(() => locator.getService(Missing)).toThrow(new ServiceNotFoundError("Missing"));
			expect(locator.hasService(Missing)).toBe(false);
		});

		it("should report unsatisfied dependencies", () => {
			addClasses(locator, NeedsMissing);

			expect(() => locator.getService(NeedsMissing)).toThrow(
				"Unsatisfied dependency Missing of ClassDescriptor(NeedsMissing)",
			);
			expect(() => locator.getService(NeedsMissing)).toThrow(UnsatisfiedDependencyError);
		});

		it("should register constants", () => {
			const pool = new Pool();
			addOneConstant(locator, pool, Pool);

			expect(locator.getService(Pool)).toBe(pool);
		});
	});

	describe("ranking", () => {
		beforeEach(() => {
			addClasses(locator, EnglishGreeter, FormalGreeter, LoudGreeter);
		});

		it("should prefer the highest ranking", () => {
			expect(locator.getService(Greeter).greet()).toBe("HELLO");
		});

		it("should order all services by ranking then registration", () => {
			const greetings = locator.getAllServices(Greeter).map((greeter) => greeter instanceof EnglishGreeter
				|| greeter instanceof FormalGreeter
				|| greeter instanceof LoudGreeter
				? greeter.greet()
				: "");

			expect(greetings).toEqual(["HELLO", "Hello", "Good day"]);
		});

		it("should honour a ranking set after registration", () => {
			const formal = locator.getDescriptors((descriptor) => descriptor.implementationClass === FormalGreeter)[0];

			expect(formal.setRanking(10)).toBe(0);
			expect(locator.getService(Greeter).greet()).toBe("Good day");
		});

		it("should narrow by qualifier", () => {
			expect(locator.getService(Greeter, NAMED.of("formal")).greet()).toBe("Good day");
			expect(locator.hasService(Greeter, NAMED.of("casual"))).toBe(false);
		});

		it("should keep registration order between equal rankings", () => {
			bestOf(locator, Greeter).setRanking(0);

			expect(locator.getService(Greeter).greet()).toBe("Hello");
		});
	});

	describe("handles", () => {
		it("should reuse the service until closed", () => {
			addClasses(locator, Pool, Connection, Session);
			const handle = locator.getServiceHandle(bestOf(locator, Session));

			const session = handle.getService();

			expect(handle.getService()).toBe(session);
			expect(handle.isActive()).toBe(true);
		});

		it("should dispose the service before its dependencies", () => {
			addClasses(locator, Pool, Connection, Session);
			const handle = locator.getServiceHandle(bestOf(locator, Session));
			handle.getService();

			handle.close();

			expect(events).toEqual(["session ended", "connection closed"]);
			expect(handle.isActive()).toBe(false);
			expect(() => handle.getService()).toThrow(UnsupportedOperationError);
		});

		it("should close a handle once", () => {
			addClasses(locator, Pool, Connection, Session);
			const handle = locator.getServiceHandle(bestOf(locator, Session));
			handle.getService();

			handle.close();
			handle.close();

			expect(events).toEqual(["session ended", "connection closed"]);
		});
	});

	describe("lifecycle", () => {
		it("should run post-construct hooks superclass first", () => {
			addClasses(locator, Widget);

			locator.getService(Widget);

			expect(events).toEqual(["base", "widget"]);
		});

		it("should dispose singletons newest first on shutdown", () => {
			addClasses(locator, First, Second);
			locator.getService(First);
			locator.getService(Second);

			locator.shutdown();

			expect(events).toEqual(["second stopped", "first stopped"]);
			expect(locator.isShutdown()).toBe(true);
		});

		it("should reject lookups after shutdown", () => {
			locator.shutdown();

			expect(() => locator.getService(ServiceLocator)).toThrow(LocatorShutdownError);
			expect(() => locator.getService(ServiceLocator)).toThrow("Service locator test has been shut down");
		});

		it("should not dispose singletons that were never created", () => {
			addClasses(locator, First, Second);
			locator.getService(Second);

			locator.shutdown();

			expect(events).toEqual(["second stopped"]);
		});
	});

	describe("registration", () => {
		it("should reject classes it cannot construct", () => {
			expect(() => addClasses(locator, NeedsArgs)).toThrow(new NoUsableConstructorError("NeedsArgs"));
		});
	});
});
