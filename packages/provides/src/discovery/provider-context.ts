import type { ActiveDescriptor, ServiceLocator } from "@providence/locator";
import type { Class, TypeExpression } from "@providence/types";

/**
 * The component whose members are being scanned.
 */
export interface ProviderContext {
	readonly locator: ServiceLocator;
	readonly componentClass: Class;
	/** Reified type the component was registered as. */
	readonly componentType: TypeExpression;
	/** Absent while only static providers are scanned. */
	readonly component: ActiveDescriptor | undefined;
}
