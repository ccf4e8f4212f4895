import { ProvidenceError } from "@providence/shared";

export class UnknownDestroyStrategyError extends ProvidenceError {
	constructor(strategy: string, provider: string) {
		super(`Unknown destroyedBy value ${strategy} on ${provider}`);
	}
}
