import type { ActiveDescriptor } from "@providence/locator";
import type { Class, MemberKind } from "@providence/types";

export const MEMBER_KINDS: readonly MemberKind[] = ["static-method", "static-field", "instance-method", "instance-field"];

export function isStaticKind(kind: MemberKind): boolean {
	return kind === "static-method" || kind === "static-field";
}

/**
 * Descriptors synthesized per class and member kind. Each kind of a class
 * is filled once; later writes for a filled kind are ignored.
 */
export class DiscoveryCache {
	private readonly byKind = new Map<MemberKind, Map<Class, readonly ActiveDescriptor[]>>();

	has(kind: MemberKind, cls: Class): boolean {
		return this.entries(kind).has(cls);
	}

	get(kind: MemberKind, cls: Class): readonly ActiveDescriptor[] {
		return this.entries(kind).get(cls) ?? [];
	}

	publish(cls: Class, built: ReadonlyMap<MemberKind, readonly ActiveDescriptor[]>): void {
		for (const [kind, descriptors] of built) {
			const entries = this.entries(kind);
			if (!entries.has(cls)) {
				entries.set(cls, descriptors);
			}
		}
	}

	private entries(kind: MemberKind): Map<Class, readonly ActiveDescriptor[]> {
		let entries = this.byKind.get(kind);
		if (entries === undefined) {
			entries = new Map();
			this.byKind.set(kind, entries);
		}
		return entries;
	}
}
