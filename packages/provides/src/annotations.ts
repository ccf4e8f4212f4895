import {
	AnnotationType,
	type Class,
	type ParameterLike,
	type SignatureSpec,
	type TypeLike,
	type UniversalDecorator,
	type ValueGuard,
	annotate,
	describeMember,
} from "@providence/types";

/**
 * Who disposes a provided instance when `destroyMethod` is set.
 * - `PROVIDED_INSTANCE`: a zero-argument method of the provided instance
 * - `PROVIDER`: a one-argument method of the component declaring the provider
 */
export const DESTROYED_BY = {
	PROVIDED_INSTANCE: "PROVIDED_INSTANCE",
	PROVIDER: "PROVIDER",
} as const;

export type DestroyedBy = (typeof DESTROYED_BY)[keyof typeof DESTROYED_BY];

export interface ProvidesOptions {
	/** Declared type of the provided value. Defaults to Object. */
	type?: () => TypeLike;
	/** Declared parameter types of a provider method. */
	parameters?: () => readonly ParameterLike[];
	/** Replaces the contracts inferred from the provided type. */
	contracts?: () => readonly TypeLike[];
	destroyMethod?: string;
	destroyedBy?: DestroyedBy;
	/** The provider may return null or undefined. */
	nullable?: boolean;
}

const isProvidesOptions: ValueGuard<ProvidesOptions> = (value): value is ProvidesOptions =>
	typeof value === "object" && value !== null;

const isClassList: ValueGuard<() => readonly Class[]> = (value): value is () => readonly Class[] =>
	typeof value === "function";

export const PROVIDES = new AnnotationType("Provides", isProvidesOptions);

export const REGISTERS = new AnnotationType("Registers", isClassList);

/**
 * Marks a method or field whose value the locator should offer as a service.
 *
 * @example
 * class Clocks {
 *   @Provides({ type: () => Ticker })
 *   @Singleton()
 *   static systemTicker(): Ticker {
 *     return new SystemTicker();
 *   }
 * }
 */
export function Provides(options: ProvidesOptions = {}): UniversalDecorator {
	const attach = annotate(PROVIDES.of(options));
	const signature: SignatureSpec = {};
	if (options.type !== undefined) {
		signature.type = options.type;
	}
	if (options.parameters !== undefined) {
		signature.parameters = options.parameters;
	}
	return (target, member, descriptor) => {
		attach(target, member, descriptor);
		if (member !== undefined) {
			describeMember(target, member, typeof descriptor?.value === "function", signature);
		}
	};
}

/**
 * Registers further classes whenever the annotated class is registered.
 */
export function Registers(classes: () => readonly Class[]): UniversalDecorator {
	return annotate(REGISTERS.of(classes));
}
