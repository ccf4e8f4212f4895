import type { Class } from "@providence/types";
import type { ActiveDescriptor } from "../api/active-descriptor.js";
import type { ClassRegistrationOptions, DynamicConfiguration } from "../api/dynamic-configuration.js";

/**
 * Base for configurations that intercept some calls and pass the rest on.
 */
export class ForwardingDynamicConfiguration implements DynamicConfiguration {
	constructor(protected readonly delegate: DynamicConfiguration) {}

	addActiveDescriptor(descriptor: ActiveDescriptor): ActiveDescriptor {
		return this.delegate.addActiveDescriptor(descriptor);
	}

	addActiveClass(cls: Class, options?: ClassRegistrationOptions): ActiveDescriptor {
		return this.delegate.addActiveClass(cls, options);
	}

	commit(): void {
		this.delegate.commit();
	}
}
