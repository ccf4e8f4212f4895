export { formatError } from "./format-error.js";
export { toError } from "./to-error.js";
