import { ProvidenceError } from "@providence/shared";

/**
 * Thrown when an injection point of a service being created has no match
 */
export class UnsatisfiedDependencyError extends ProvidenceError {
	constructor(readonly dependency: string, readonly dependent: string | undefined) {
		super(dependent === undefined
			? `Unsatisfied dependency ${dependency}`
			: `Unsatisfied dependency ${dependency} of ${dependent}`);
	}
}
