export { AbstractActiveDescriptor } from "./abstract-active-descriptor.js";
export { ClassDescriptor } from "./class-descriptor.js";
export { type ConstantOptions, ConstantDescriptor } from "./constant-descriptor.js";
export {
	PER_LOOKUP_SCOPE,
	SINGLETON_SCOPE,
	advertisedContracts,
	hasUsableConstructor,
	isContract,
	isSingletonScope,
	isUtilityClass,
	providedContracts,
	scopeOf,
} from "./contracts.js";
