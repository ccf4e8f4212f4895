import { isSingletonScope } from "@providence/locator";
import { MultiError } from "@providence/shared";
import {
	type Class,
	type MemberDescription,
	type MethodDescription,
	type TypeExpression,
	findMethods,
	invokeMethod,
	isClass,
	isSupertypeOf,
	memberLabel,
	rawClassOf,
	resolveType,
} from "@providence/types";
import { DESTROYED_BY, type ProvidesOptions } from "../annotations.js";
import type { DisposeFunction } from "../descriptors/provides-descriptor.js";
import { DestroyMethodNotFoundError, UnknownDestroyStrategyError } from "../errors/index.js";
import { asReceiver, reflectively } from "./invocation.js";
import type { ProviderContext } from "./provider-context.js";

const NO_DISPOSAL: DisposeFunction = () => {};

function runtimeClassOf(instance: unknown): Class | undefined {
	if (typeof instance !== "object" || instance === null) {
		return undefined;
	}
	const ctor: unknown = instance.constructor;
	return isClass(ctor) ? ctor : undefined;
}

// ============================================================================
// PROVIDED_INSTANCE
// ============================================================================

/**
 * Zero-argument method on the provided instance. Interface and `Object`
 * types are looked up on the runtime class of each instance.
 */
function destroyedByInstance(name: string, provider: string, providedType: TypeExpression): DisposeFunction {
	const providedKey = rawClassOf(providedType);
	const resolved = new Map<Class, MethodDescription | undefined>();

	const lookup = (cls: Class): MethodDescription | undefined => {
		if (!resolved.has(cls)) {
			resolved.set(cls, findMethods(cls, name, false).find((method) => method.parameters.length === 0));
		}
		return resolved.get(cls);
	};

	return (instance) => {
		const cls = isClass(providedKey) && providedKey !== Object ? providedKey : runtimeClassOf(instance);
		const method = cls === undefined ? undefined : lookup(cls);
		if (method === undefined || typeof instance !== "object" || instance === null) {
			throw new MultiError(new DestroyMethodNotFoundError(name, provider));
		}
		const receiver: object = instance;
		reflectively(() => invokeMethod(receiver, method.name, []));
	};
}

// ============================================================================
// PROVIDER
// ============================================================================

/**
 * One-argument method on the component whose parameter accepts the
 * provided type. Static providers are disposed by a static method.
 */
function destroyedByProvider(
	name: string,
	member: MemberDescription,
	providedType: TypeExpression,
	context: ProviderContext,
): DisposeFunction {
	const { locator, componentClass, componentType, component } = context;
	const provider = memberLabel(member);
	let resolved: MethodDescription | undefined;

	const destroyer = (): MethodDescription => {
		resolved ??= findMethods(componentClass, name, member.isStatic).find((method) =>
			method.parameters.length === 1
			&& isSupertypeOf(resolveType(componentType, method.parameters[0].type), providedType));
		if (resolved === undefined) {
			throw new MultiError(new DestroyMethodNotFoundError(name, provider));
		}
		return resolved;
	};

	if (member.isStatic || component === undefined) {
		return (instance) => {
			const method = destroyer();
			reflectively(() => invokeMethod(componentClass, method.name, [instance]));
		};
	}

	return (instance) => {
		const method = destroyer();
		const handle = locator.getServiceHandle(component);
		try {
			const receiver = asReceiver(handle.getService(), member);
			reflectively(() => invokeMethod(receiver, method.name, [instance]));
		} finally {
			if (!isSingletonScope(component.scopeAnnotation)) {
				handle.close();
			}
		}
	};
}

// ============================================================================
// Selection
// ============================================================================

export interface DisposalOptions {
	/** Fields are disposed like methods instead of being left alone. */
	disposeFields: boolean;
}

/**
 * Builds the dispose function of a provider. An unknown `destroyedBy`
 * fails here rather than at disposal.
 */
export function disposeFunctionFor(
	options: ProvidesOptions,
	member: MemberDescription,
	providedType: TypeExpression,
	context: ProviderContext,
	disposal: DisposalOptions,
): DisposeFunction {
	if (!disposal.disposeFields && (member.kind === "static-field" || member.kind === "instance-field")) {
		return NO_DISPOSAL;
	}
	const destroyMethod = options.destroyMethod ?? "";
	if (destroyMethod === "") {
		return (instance) => context.locator.preDestroy(instance);
	}
	const strategy = options.destroyedBy ?? DESTROYED_BY.PROVIDED_INSTANCE;
	switch (strategy) {
		case DESTROYED_BY.PROVIDED_INSTANCE:
			return destroyedByInstance(destroyMethod, memberLabel(member), providedType);
		case DESTROYED_BY.PROVIDER:
			return destroyedByProvider(destroyMethod, member, providedType, context);
		default:
			throw new UnknownDestroyStrategyError(String(strategy), memberLabel(member));
	}
}
