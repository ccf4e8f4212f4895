import { ProvidenceError } from "@providence/shared";

/**
 * Thrown by every lookup made after the locator was shut down
 */
export class LocatorShutdownError extends ProvidenceError {
	constructor(locatorName: string) {
		super(`Service locator ${locatorName} has been shut down`);
	}
}
