import { ProvidenceError } from "@providence/shared";

/**
 * Thrown when no registered service advertises the requested contract
 */
export class ServiceNotFoundError extends ProvidenceError {
	constructor(readonly contract: string) {
		super(`No service advertises ${contract}`);
	}
}
