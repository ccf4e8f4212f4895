import { SINGLETON_SCOPE, UnsupportedOperationError } from "@providence/locator";
import { type Class, keyName, raw } from "@providence/types";
import { ProvidesDescriptor } from "./provides-descriptor.js";

/**
 * Stands for a registered class that cannot be constructed. It advertises
 * no contracts, not even the class itself, so nothing ever resolves to it.
 */
export class UnusableClassDescriptor extends ProvidesDescriptor {
	constructor(cls: Class) {
		const name = keyName(cls);
		super({
			source: cls,
			implementationType: raw(cls),
			contracts: [],
			scope: SINGLETON_SCOPE,
			create: () => {
				throw new UnsupportedOperationError(`${name} cannot be instantiated`);
			},
			dispose: () => {
				throw new UnsupportedOperationError(`${name} cannot be disposed`);
			},
		});
	}
}
