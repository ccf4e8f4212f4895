import type { Logger } from "@providence/shared";
import {
	MemberAccessError,
	type MemberDescription,
	type ParameterDescription,
	containsTypeVariable,
	formatType,
	memberLabel,
	resolveType,
} from "@providence/types";
import { PROVIDES } from "../annotations.js";
import { ProvidesDescriptor } from "../descriptors/provides-descriptor.js";
import { providerContracts } from "./contracts.js";
import { createFunctionFor } from "./create-functions.js";
import { type DisposalOptions, disposeFunctionFor } from "./dispose-functions.js";
import type { ProviderContext } from "./provider-context.js";
import { providerScope } from "./scope.js";

/**
 * Turns `@Provides` members into descriptors. Shared by both discovery
 * engines; they differ only in their disposal options.
 */
export class ProvidesDescriptorFactory {
	constructor(
		private readonly disposal: DisposalOptions,
		private readonly logger: Logger,
	) {}

	/**
	 * Descriptor for `member` as seen from the component in `context`, or
	 * undefined when the member is not a provider or its types still hold
	 * type variables once resolved against the component type.
	 *
	 * @throws UnknownDestroyStrategyError
	 */
	fromMember(member: MemberDescription, context: ProviderContext): ProvidesDescriptor | undefined {
		const options = PROVIDES.read(member.annotations);
		if (options === undefined) {
			return undefined;
		}
		const label = memberLabel(member);
		if (!member.isStatic && context.component === undefined) {
			throw new MemberAccessError(`${label} is an instance member and needs a component descriptor`);
		}

		const declared = member.kind === "static-field" || member.kind === "instance-field"
			? member.type
			: member.returnType;
		const providedType = resolveType(context.componentType, declared);
		if (containsTypeVariable(providedType)) {
			this.logger.debug(`Skipping ${label}: ${formatType(providedType)} is not fully resolved`);
			return undefined;
		}

		const parameters: ParameterDescription[] = member.kind === "static-field" || member.kind === "instance-field"
			? []
			: member.parameters.map((parameter) => ({ ...parameter, type: resolveType(context.componentType, parameter.type) }));
		const unresolved = parameters.find((parameter) => containsTypeVariable(parameter.type));
		if (unresolved !== undefined) {
			this.logger.debug(`Skipping ${label}: parameter ${unresolved.index} is ${formatType(unresolved.type)}`);
			return undefined;
		}

		const contracts = providerContracts(options, providedType);
		return new ProvidesDescriptor({
			source: member,
			implementationType: providedType,
			contracts,
			scope: providerScope(options, member, contracts, context.component),
			create: createFunctionFor(member, parameters, context),
			dispose: disposeFunctionFor(options, member, providedType, context, this.disposal),
		});
	}
}
