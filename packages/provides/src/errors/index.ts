export { DestroyMethodNotFoundError } from "./destroy-method-not-found-error.js";
export { UnknownDestroyStrategyError } from "./unknown-destroy-strategy-error.js";
