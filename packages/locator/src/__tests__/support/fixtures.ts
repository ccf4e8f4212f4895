import { Generic, declareInterface } from "@providence/types";
import { CONTRACT, Inject, Named, PerLookup, PostConstruct, PreDestroy, Rank, Singleton } from "../../index.js";

/** Lifecycle events recorded by the fixtures, reset before each test. */
export const events: string[] = [];

// ============================================================================
// Greeters
// ============================================================================

export interface Greeter {
	greet(): string;
}

export const Greeter = declareInterface<Greeter>("Greeter", { annotations: [CONTRACT.of(undefined)] });

@Generic({ implements: () => [Greeter] })
export class EnglishGreeter implements Greeter {
	greet(): string {
		return "Hello";
	}
}

@Named("formal")
@Generic({ implements: () => [Greeter] })
export class FormalGreeter implements Greeter {
	greet(): string {
		return "Good day";
	}
}

@Rank(5)
@Generic({ implements: () => [Greeter] })
export class LoudGreeter implements Greeter {
	greet(): string {
		return "HELLO";
	}
}

// ============================================================================
// Lifecycle
// ============================================================================

@Singleton()
export class Pool {}

@PerLookup()
export class Connection {
	@PreDestroy()
	close(): void {
		events.push("connection closed");
	}
}

@Inject(() => [Connection, Pool])
export class Session {
	constructor(
		readonly connection: Connection,
		readonly pool: Pool,
	) {}

	@PreDestroy()
	end(): void {
		events.push("session ended");
	}
}

@Singleton()
export class First {
	@PreDestroy()
	stop(): void {
		events.push("first stopped");
	}
}

@Singleton()
export class Second {
	@PreDestroy()
	stop(): void {
		events.push("second stopped");
	}
}

export class BaseWidget {
	@PostConstruct()
	initBase(): void {
		events.push("base");
	}
}

@Singleton()
export class Widget extends BaseWidget {
	@PostConstruct()
	initWidget(): void {
		events.push("widget");
	}
}

// ============================================================================
// Misc
// ============================================================================

export class Missing {}

@Inject(() => [Missing])
export class NeedsMissing {
	constructor(readonly missing: Missing) {}
}

export class NeedsArgs {
	constructor(readonly value: string) {}
}
