import type { DynamicConfiguration, DynamicConfigurationService } from "../api/dynamic-configuration.js";
import { type ConfigurationTarget, DynamicConfigurationImpl } from "./dynamic-configuration-impl.js";

/**
 * The locator's own configuration service. Registered with rank 0, so a
 * ranked replacement takes over lookups of the contract.
 */
export class DefaultConfigurationService implements DynamicConfigurationService {
	constructor(private readonly target: ConfigurationTarget) {}

	createDynamicConfiguration(): DynamicConfiguration {
		return new DynamicConfigurationImpl(this.target);
	}
}
