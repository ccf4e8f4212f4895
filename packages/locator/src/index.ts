/**
 * In-process service locator: descriptors, scopes, handles, configuration
 * transactions and listeners.
 */
import "reflect-metadata";

export {
	ABSTRACT,
	Abstract,
	CONTRACT,
	CONTRACTS_PROVIDED,
	Contract,
	ContractsProvided,
	INJECT,
	Inject,
	NAMED,
	Named,
	PER_LOOKUP,
	POST_CONSTRUCT,
	PRE_DESTROY,
	PerLookup,
	PostConstruct,
	PreDestroy,
	RANK,
	Rank,
	SINGLETON,
	Singleton,
} from "./annotations.js";
export * from "./api/index.js";
export * from "./descriptors/index.js";
export * from "./errors/index.js";
export * from "./locator/index.js";
export { addClasses, addOneConstant, createLocator } from "./utilities.js";
