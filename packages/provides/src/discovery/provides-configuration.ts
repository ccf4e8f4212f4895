import {
	type ActiveDescriptor,
	type ClassRegistrationOptions,
	type DynamicConfiguration,
	ForwardingDynamicConfiguration,
	hasUsableConstructor,
	isUtilityClass,
} from "@providence/locator";
import { type Class, getAnnotations, raw, typeEquals } from "@providence/types";
import { REGISTERS } from "../annotations.js";
import { UnusableClassDescriptor } from "../descriptors/unusable-class-descriptor.js";

/**
 * Runs the static-only scan of a class, adding what it finds to
 * `configuration`, and returns the static provider descriptors.
 */
export interface StaticProviderSource {
	staticProviders(cls: Class, configuration: DynamicConfiguration): readonly ActiveDescriptor[];
}

/**
 * Configuration that accepts classes the locator cannot construct, as long
 * as they contribute static providers or register other classes.
 */
export class ProvidesConfiguration extends ForwardingDynamicConfiguration {
	constructor(
		delegate: DynamicConfiguration,
		private readonly source: StaticProviderSource,
	) {
		super(delegate);
	}

	override addActiveClass(cls: Class, options?: ClassRegistrationOptions): ActiveDescriptor {
		const statics = this.source.staticProviders(cls, this);
		if (statics.length === 0 && !REGISTERS.isPresent(getAnnotations(cls))) {
			return super.addActiveClass(cls, options);
		}
		if (hasUsableConstructor(cls) && !isUtilityClass(cls)) {
			return super.addActiveClass(cls, options);
		}
		const self = raw(cls);
		const exact = statics.find((descriptor) =>
			descriptor.contractTypes.some((contract) => typeEquals(contract, self)));
		return exact ?? this.addActiveDescriptor(new UnusableClassDescriptor(cls));
	}
}
