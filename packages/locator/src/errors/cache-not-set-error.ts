import { ProvidenceError } from "@providence/shared";

/**
 * Thrown when a descriptor cache is read before it was set
 */
export class CacheNotSetError extends ProvidenceError {
	constructor(descriptor: string) {
		super(`No cached instance for ${descriptor}`);
	}
}
