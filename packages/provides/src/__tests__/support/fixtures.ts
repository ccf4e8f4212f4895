import {
	Abstract,
	CONTRACT,
	ContractsProvided,
	Inject,
	NAMED,
	Named,
	PerLookup,
	PreDestroy,
	Rank,
	SINGLETON,
	Singleton,
} from "@providence/locator";
import { Generic, Signature, declareInterface, parameterized, typeVariable } from "@providence/types";
import { DESTROYED_BY, Provides, Registers } from "../../index.js";

/** Lifecycle events recorded by the fixtures, reset before each test. */
export const events: string[] = [];

// ============================================================================
// Contracts
// ============================================================================

export const List = declareInterface("List", { typeParameters: ["E"] });

export interface Reader {
	read(): string;
}

export const Reader = declareInterface<Reader>("Reader", { annotations: [CONTRACT.of(undefined)] });

export const Writer = declareInterface("Writer", { annotations: [CONTRACT.of(undefined)] });

/** Contract declaring its own scope. */
export const Cache = declareInterface("Cache", { annotations: [CONTRACT.of(undefined), SINGLETON.of(undefined)] });

// ============================================================================
// Provided values
// ============================================================================

export class Lease {
	close(): void {
		events.push("lease closed");
	}
}

export class Receipt {
	constructor(readonly lease: Lease) {}
}

@ContractsProvided(() => [Reader, Writer])
export class FileStore implements Reader {
	read(): string {
		return "contents";
	}
}

// ============================================================================
// Providers
// ============================================================================

@Generic({ typeParameters: ["T"] })
export class Repository {
	@Provides({ type: () => parameterized(List, [typeVariable(Repository, "T")]) })
	all(): string[] {
		return ["first", "second"];
	}
}

export class Stores {
	@Provides({ type: () => FileStore })
	static fileStore(): FileStore {
		return new FileStore();
	}
}

export class Leases {
	@Provides({ type: () => Lease, destroyMethod: "close" })
	static lease(): Lease {
		events.push("leased");
		return new Lease();
	}

	@Provides({ type: () => Lease, destroyMethod: "recycle" })
	@Named("recycled")
	static recycled(): Lease {
		return new Lease();
	}

	@Provides({ type: () => Lease })
	@Named("spare")
	@Rank(3)
	static spare(): Lease {
		return new Lease();
	}
}

export class Rentals {
	@Provides({ type: () => Receipt, parameters: () => [{ type: Lease, qualifiers: [NAMED.of("spare")] }] })
	static receipt(lease: Lease): Receipt {
		return new Receipt(lease);
	}
}

export class LeaseFactory {
	@Provides({ type: () => Lease, destroyMethod: "closeLease", destroyedBy: DESTROYED_BY.PROVIDER })
	static openLease(): Lease {
		return new Lease();
	}

	@Signature({ parameters: () => [Lease] })
	static closeLease(lease: Lease): void {
		events.push(lease instanceof Lease ? "factory closed lease" : "factory closed something");
	}
}

export class Pools {
	@Provides({ type: () => Lease, destroyMethod: "release", destroyedBy: DESTROYED_BY.PROVIDER })
	lease(): Lease {
		events.push("leased");
		return new Lease();
	}

	@Signature({ parameters: () => [Lease] })
	release(lease: Lease): void {
		events.push(lease instanceof Lease ? "released" : "released something");
	}

	@PreDestroy()
	shutdown(): void {
		events.push("pools closed");
	}
}

export class FailingPools {
	@Provides({ type: () => Lease, destroyMethod: "release", destroyedBy: DESTROYED_BY.PROVIDER })
	lease(): Lease {
		return new Lease();
	}

	@Signature({ parameters: () => [Lease] })
	release(): void {
		throw new Error("release failed");
	}

	@PreDestroy()
	shutdown(): void {
		events.push("pools closed");
	}
}

@Singleton()
export class Workshop {
	@Provides({ type: () => Lease })
	@Named("component")
	component(): Lease {
		return new Lease();
	}

	@Provides({ type: () => Lease })
	@Named("member")
	@PerLookup()
	member(): Lease {
		return new Lease();
	}

	@Provides({ type: () => Lease })
	@Named("static")
	static unscoped(): Lease {
		return new Lease();
	}

	@Provides({ type: () => Cache })
	cache(): object {
		return {};
	}

	@Provides({ type: () => Lease, nullable: true })
	@Named("nullable")
	@Singleton()
	nothing(): Lease | null {
		return null;
	}
}

export class Spares {
	@Provides({ type: () => Lease, destroyMethod: "close" })
	@Named("field")
	spare = new Lease();
}

export class Tools {
	@Provides({ type: () => Lease })
	static shared(): Lease {
		return new Lease();
	}

	@Provides({ type: () => Lease })
	own(): Lease {
		return new Lease();
	}
}

// ============================================================================
// Classes the locator cannot construct
// ============================================================================

@Abstract()
export abstract class Settings {
	abstract readonly label: string;

	@Provides({ type: () => Settings })
	@Singleton()
	static defaults(): Settings {
		return new DefaultSettings();
	}
}

export class DefaultSettings extends Settings {
	readonly label = "defaults";
}

export class Fixed {
	constructor(readonly value: string) {}

	@Provides({ type: () => Lease })
	@Named("fixed")
	static lease(): Lease {
		return new Lease();
	}
}

export class Plain {
	constructor(readonly value: string) {}
}

// ============================================================================
// Registration
// ============================================================================

@Singleton()
export class Registered {}

@Registers(() => [Registered])
export class Module {}

@Inject(() => [Registered])
export class UsesRegistered {
	constructor(readonly registered: Registered) {}
}
