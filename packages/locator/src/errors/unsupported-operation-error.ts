import { ProvidenceError } from "@providence/shared";

export class UnsupportedOperationError extends ProvidenceError {}
