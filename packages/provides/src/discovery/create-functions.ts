import type { ServiceHandle } from "@providence/locator";
import {
	MemberAccessError,
	type MemberDescription,
	type ParameterDescription,
	invokeMethod,
	memberLabel,
	readField,
} from "@providence/types";
import type { CreateFunction } from "../descriptors/provides-descriptor.js";
import { asReceiver, reflectively } from "./invocation.js";
import type { ProviderContext } from "./provider-context.js";

/**
 * Builds the create function of a provider. Arguments are resolved before
 * the component, both as children of the request handle. The post-construct
 * hook runs on every non-null result.
 */
export function createFunctionFor(
	member: MemberDescription,
	parameters: readonly ParameterDescription[],
	context: ProviderContext,
): CreateFunction {
	const { locator, componentClass, component } = context;

	const receiverFor = (root: ServiceHandle): object => {
		if (member.isStatic) {
			return componentClass;
		}
		if (component === undefined) {
			throw new MemberAccessError(`${memberLabel(member)} has no component to be invoked on`);
		}
		return asReceiver(locator.getServiceFromDescriptor(component, root), member);
	};

	const produce = (root: ServiceHandle): unknown => {
		if (member.kind === "static-field" || member.kind === "instance-field") {
			const receiver = receiverFor(root);
			return reflectively(() => readField(receiver, member.name));
		}
		const args = parameters.map((parameter) =>
			locator.getInjecteeService(parameter.type, parameter.qualifiers, root));
		const receiver = receiverFor(root);
		return reflectively(() => invokeMethod(receiver, member.name, args));
	};

	return (root) => {
		const provided = produce(root);
		if (provided !== null && provided !== undefined) {
			locator.postConstruct(provided);
		}
		return provided;
	};
}
