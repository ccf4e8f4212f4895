const ids = new WeakMap<object, number>();
let nextId = 1;

/**
 * Stable numeric identity for an object, used to build structural keys.
 */
export function identityOf(value: object): number {
	let id = ids.get(value);
	if (id === undefined) {
		id = nextId++;
		ids.set(value, id);
	}
	return id;
}
