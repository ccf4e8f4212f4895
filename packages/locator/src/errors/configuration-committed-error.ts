import { ProvidenceError } from "@providence/shared";

export class ConfigurationCommittedError extends ProvidenceError {
	constructor() {
		super("Dynamic configuration has already been committed");
	}
}
