/**
 * Any class constructor, concrete or abstract.
 */
export type Class<T = unknown> = abstract new (...args: never[]) => T;

/**
 * Runtime stand-in for a TypeScript interface, which has no value of its own.
 * The phantom `T` ties the token to the interface it names.
 */
export class InterfaceToken<T = unknown> {
	declare readonly __type?: T;

	constructor(readonly name: string) {}

	toString(): string {
		return this.name;
	}
}

/**
 * Identity of a raw type: a class or an interface token.
 */
export type TypeKey = Class | InterfaceToken;

export function isClass(value: unknown): value is Class {
	return typeof value === "function";
}

export function isTypeKey(value: unknown): value is TypeKey {
	return isClass(value) || value instanceof InterfaceToken;
}

export function keyName(key: TypeKey): string {
	if (key instanceof InterfaceToken) {
		return key.name;
	}
	return key.name || "<anonymous>";
}
