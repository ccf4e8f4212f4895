import { type Class, keyName } from "@providence/types";
import type { ActiveDescriptor } from "../api/active-descriptor.js";
import type { ClassRegistrationOptions, DynamicConfiguration } from "../api/dynamic-configuration.js";
import type { ServiceLocator } from "../api/service-locator.js";
import { ClassDescriptor } from "../descriptors/class-descriptor.js";
import { hasUsableConstructor } from "../descriptors/contracts.js";
import { ConfigurationCommittedError, NoUsableConstructorError } from "../errors/index.js";

/**
 * Locator side of a configuration: receives the committed batch.
 */
export interface ConfigurationTarget extends ServiceLocator {
	commitConfiguration(descriptors: readonly ActiveDescriptor[]): void;
}

export class DynamicConfigurationImpl implements DynamicConfiguration {
	private readonly added: ActiveDescriptor[] = [];
	private committed = false;

	constructor(private readonly target: ConfigurationTarget) {}

	addActiveDescriptor(descriptor: ActiveDescriptor): ActiveDescriptor {
		this.checkOpen();
		this.added.push(descriptor);
		return descriptor;
	}

	addActiveClass(cls: Class, options: ClassRegistrationOptions = {}): ActiveDescriptor {
		this.checkOpen();
		if (!hasUsableConstructor(cls)) {
			throw new NoUsableConstructorError(keyName(cls));
		}
		return this.addActiveDescriptor(new ClassDescriptor(cls, this.target, options.type));
	}

	commit(): void {
		this.checkOpen();
		this.committed = true;
		this.target.commitConfiguration(this.added);
	}

	private checkOpen(): void {
		if (this.committed) {
			throw new ConfigurationCommittedError();
		}
	}
}
