import { MemberAccessError } from "./errors.js";

/**
 * Calls `receiver[name](...args)`. Static methods use the class as receiver.
 */
export function invokeMethod(receiver: object, name: string | symbol, args: readonly unknown[]): unknown {
	const method: unknown = Reflect.get(receiver, name);
	if (typeof method !== "function") {
		throw new MemberAccessError(`${String(name)} is not a method of ${describeReceiver(receiver)}`);
	}
	return Reflect.apply(method, receiver, args);
}

export function readField(receiver: object, name: string | symbol): unknown {
	if (!(name in receiver)) {
		throw new MemberAccessError(`${String(name)} is not a field of ${describeReceiver(receiver)}`);
	}
	return Reflect.get(receiver, name);
}

function describeReceiver(receiver: object): string {
	return typeof receiver === "function" ? receiver.name : receiver.constructor.name;
}
