export { ProvidenceError } from "./providence-error.js";
export { MultiError } from "./multi-error.js";
