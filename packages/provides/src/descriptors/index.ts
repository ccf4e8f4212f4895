export {
	type CreateFunction,
	type DisposeFunction,
	type ProviderSource,
	ProvidesDescriptor,
	type ProvidesDescriptorInit,
	sourceLabel,
} from "./provides-descriptor.js";
export { UnusableClassDescriptor } from "./unusable-class-descriptor.js";
