/**
 * Base class for every error raised by the providence packages.
 */
export class ProvidenceError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = this.constructor.name;
	}
}
