import { ProvidenceError } from "@providence/shared";

/**
 * Thrown, wrapped in a MultiError, when the configured destroy method of a
 * provider cannot be found.
 */
export class DestroyMethodNotFoundError extends ProvidenceError {
	constructor(readonly methodName: string, provider: string) {
		super(`Destroy method ${methodName} for ${provider} not found`);
	}
}
