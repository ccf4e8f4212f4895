import {
	type ActiveDescriptor,
	type ConstantOptions,
	type ServiceKey,
	type ServiceLocator,
	addClasses,
	addOneConstant,
} from "@providence/locator";
import type { Logger } from "@providence/shared";
import type { Annotation, Class, TypeLike } from "@providence/types";

/**
 * Application-facing view of a locator with provider discovery installed.
 */
export class Services {
	constructor(
		readonly locator: ServiceLocator,
		private readonly logger: Logger,
	) {}

	getService<T>(contract: ServiceKey<T>, ...qualifiers: Annotation[]): T {
		return this.locator.getService(contract, ...qualifiers);
	}

	/** Lookup by a parameterized type such as `List<String>`. */
	getServiceOfType(contract: TypeLike, ...qualifiers: Annotation[]): unknown {
		return this.locator.getServiceOfType(contract, ...qualifiers);
	}

	hasService(contract: TypeLike, ...qualifiers: Annotation[]): boolean {
		return this.locator.hasService(contract, ...qualifiers);
	}

	register(...classes: Class[]): ActiveDescriptor[] {
		const added = addClasses(this.locator, ...classes);
		this.logger.debug(`Registered ${classes.map((cls) => cls.name).join(", ")}`);
		return added;
	}

	registerConstant(constant: unknown, type: TypeLike, options: ConstantOptions = {}): ActiveDescriptor {
		return addOneConstant(this.locator, constant, type, options);
	}

	shutdown(): void {
		if (this.locator.isShutdown()) {
			return;
		}
		this.locator.shutdown();
		this.logger.info(`Services ${this.locator.name} shut down`);
	}
}
