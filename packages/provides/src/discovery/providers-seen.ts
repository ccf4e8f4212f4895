import type { ActiveDescriptor } from "@providence/locator";
import { type MemberDescription, identityOf } from "@providence/types";

function memberKey(member: MemberDescription): string {
	return `${identityOf(member.declaringClass)}:${member.kind}:${String(member.name)}`;
}

/**
 * Providers one discovery engine has already scanned. A static member is
 * recorded once whichever component exposed it; an instance member is
 * recorded per component descriptor.
 */
export class ProvidersSeen {
	private readonly keys = new Set<string>();

	/** True when the component had not been scanned yet. */
	addComponent(component: ActiveDescriptor): boolean {
		return this.insert(`component:${identityOf(component)}`);
	}

	/** True when the member had not been scanned yet. */
	addMember(component: ActiveDescriptor, member: MemberDescription): boolean {
		return this.insert(member.isStatic
			? `static:${memberKey(member)}`
			: `instance:${identityOf(component)}:${memberKey(member)}`);
	}

	private insert(key: string): boolean {
		if (this.keys.has(key)) {
			return false;
		}
		this.keys.add(key);
		return true;
	}
}
