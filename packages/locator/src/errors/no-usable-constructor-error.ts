import { ProvidenceError } from "@providence/shared";

export class NoUsableConstructorError extends ProvidenceError {
	constructor(readonly className: string) {
		super(`${className} has no usable constructor`);
	}
}
