import { type Annotation, addAnnotation, addMemberAnnotation, getMemberAnnotations } from "./annotations.js";
import { type Class, isClass } from "./class-ref.js";
import { OBJECT_TYPE, type TypeExpression, type TypeLike, toType } from "./type-expression.js";

// ============================================================================
// Member descriptions
// ============================================================================

export type MemberKind = "static-method" | "instance-method" | "static-field" | "instance-field";

export interface ParameterDescription {
	readonly index: number;
	readonly type: TypeExpression;
	readonly qualifiers: readonly Annotation[];
}

interface MemberBase {
	readonly name: string | symbol;
	/** Class whose body declares the member. */
	readonly declaringClass: Class;
	readonly annotations: readonly Annotation[];
	readonly isStatic: boolean;
}

export interface MethodDescription extends MemberBase {
	readonly kind: "static-method" | "instance-method";
	readonly returnType: TypeExpression;
	readonly parameters: readonly ParameterDescription[];
}

export interface FieldDescription extends MemberBase {
	readonly kind: "static-field" | "instance-field";
	readonly type: TypeExpression;
}

export type MemberDescription = MethodDescription | FieldDescription;

export function memberLabel(member: MemberDescription): string {
	const separator = member.isStatic ? "." : "#";
	const suffix = member.kind.endsWith("method") ? "()" : "";
	return `${member.declaringClass.name}${separator}${String(member.name)}${suffix}`;
}

// ============================================================================
// Signatures
// ============================================================================

export interface QualifiedParameter {
	type: TypeLike;
	qualifiers?: readonly Annotation[];
}

export type ParameterLike = TypeLike | QualifiedParameter;

/**
 * Declared types of a member, which TypeScript erases at runtime. `type` is
 * the method return type or the field type. Thunks run on first use.
 */
export interface SignatureSpec {
	type?: () => TypeLike;
	parameters?: () => readonly ParameterLike[];
}

function toParameter(parameter: ParameterLike, index: number): ParameterDescription {
	if (typeof parameter === "object" && "type" in parameter) {
		return { index, type: toType(parameter.type), qualifiers: parameter.qualifiers ?? [] };
	}
	return { index, type: toType(parameter), qualifiers: [] };
}

export function toParameters(parameters: readonly ParameterLike[]): ParameterDescription[] {
	return parameters.map(toParameter);
}

function objectParameters(count: number): ParameterDescription[] {
	return Array.from({ length: count }, (_, index) => ({ index, type: OBJECT_TYPE, qualifiers: [] }));
}

// ============================================================================
// Member registry
// ============================================================================

class MemberRecord {
	private spec: SignatureSpec = {};

	constructor(
		readonly name: string | symbol,
		readonly isStatic: boolean,
		readonly isMethod: boolean,
		private readonly target: object,
	) {}

	mergeSignature(spec: SignatureSpec): void {
		this.spec = { ...this.spec, ...spec };
	}

	describe(declaringClass: Class): MemberDescription {
		const annotations = getMemberAnnotations(this.target, this.name);
		const declaredType = this.spec.type ? toType(this.spec.type()) : OBJECT_TYPE;
		if (this.isMethod) {
			const parameters = this.spec.parameters
				? this.spec.parameters().map(toParameter)
				: objectParameters(functionLength(this.target, this.name));
			return {
				kind: this.isStatic ? "static-method" : "instance-method",
				name: this.name,
				declaringClass,
				annotations,
				isStatic: this.isStatic,
				returnType: declaredType,
				parameters,
			};
		}
		return {
			kind: this.isStatic ? "static-field" : "instance-field",
			name: this.name,
			declaringClass,
			annotations,
			isStatic: this.isStatic,
			type: declaredType,
		};
	}
}

function functionLength(target: object, name: string | symbol): number {
	const value: unknown = Reflect.get(target, name);
	return typeof value === "function" ? value.length : 0;
}

const records = new WeakMap<object, Map<string, MemberRecord>>();

function recordKey(name: string | symbol, isStatic: boolean): string {
	return `${isStatic ? "static" : "instance"}:${String(name)}`;
}

function ownerOf(target: object): object {
	return isClass(target) ? target : target.constructor;
}

function prototypeOf(cls: Class): object {
	const proto: unknown = cls.prototype;
	return typeof proto === "object" && proto !== null ? proto : {};
}

function recordMember(target: object, name: string | symbol, isMethod: boolean): MemberRecord {
	const isStatic = isClass(target);
	const owner = ownerOf(target);
	let byName = records.get(owner);
	if (byName === undefined) {
		byName = new Map();
		records.set(owner, byName);
	}
	const key = recordKey(name, isStatic);
	let record = byName.get(key);
	if (record === undefined) {
		record = new MemberRecord(name, isStatic, isMethod, target);
		byName.set(key, record);
	}
	return record;
}

/**
 * Decorator usable on classes, methods and fields (static or instance).
 */
export type UniversalDecorator = (target: object, member?: string | symbol, descriptor?: PropertyDescriptor) => void;

/**
 * Decorator that attaches annotations to a class or a member.
 */
export function annotate(...annotations: Annotation[]): UniversalDecorator {
	return (target, member, descriptor) => {
		if (member === undefined) {
			for (const annotation of annotations) {
				addAnnotation(target, annotation);
			}
			return;
		}
		recordMember(target, member, isMethodDescriptor(descriptor));
		for (const annotation of annotations) {
			addMemberAnnotation(target, member, annotation);
		}
	};
}

function isMethodDescriptor(descriptor: PropertyDescriptor | undefined): boolean {
	return descriptor !== undefined && typeof descriptor.value === "function";
}

/**
 * Records the erased types of a member without annotating it.
 */
export function describeMember(target: object, member: string | symbol, isMethod: boolean, spec: SignatureSpec): void {
	recordMember(target, member, isMethod).mergeSignature(spec);
}

/**
 * Member decorator declaring the erased types of a method or field.
 */
export function Signature(spec: SignatureSpec): (target: object, member: string | symbol, descriptor?: PropertyDescriptor) => void {
	return (target, member, descriptor) => {
		describeMember(target, member, isMethodDescriptor(descriptor), spec);
	};
}

// ============================================================================
// Lookup
// ============================================================================

/**
 * The class followed by its superclasses, stopping before Object.
 */
export function classChain(cls: Class): Class[] {
	const chain: Class[] = [];
	let current: unknown = cls;
	while (isClass(current) && current !== Object && current !== Function.prototype) {
		chain.push(current);
		current = Reflect.getPrototypeOf(current);
	}
	return chain;
}

/**
 * All recorded members visible on `cls`, inherited ones included. A member
 * redeclared in a subclass hides the superclass declaration.
 */
export function getMembers(cls: Class): MemberDescription[] {
	const seen = new Set<string>();
	const members: MemberDescription[] = [];
	for (const declaringClass of classChain(cls)) {
		const byName = records.get(declaringClass);
		if (byName === undefined) {
			continue;
		}
		for (const [key, record] of byName) {
			if (!seen.has(key)) {
				seen.add(key);
				members.push(record.describe(declaringClass));
			}
		}
	}
	return members;
}

/**
 * Methods named `name` callable on `cls` (static) or its instances. Methods
 * without a recorded signature are described from the runtime function with
 * `Object` parameters and return type.
 */
export function findMethods(cls: Class, name: string, isStatic: boolean): MethodDescription[] {
	const recorded = getMembers(cls).filter(
		(member): member is MethodDescription =>
			member.name === name && member.isStatic === isStatic && member.kind.endsWith("method"),
	);
	if (recorded.length > 0) {
		return recorded;
	}
	for (const declaringClass of classChain(cls)) {
		const holder = isStatic ? declaringClass : prototypeOf(declaringClass);
		const descriptor = Reflect.getOwnPropertyDescriptor(holder, name);
		if (descriptor !== undefined && typeof descriptor.value === "function") {
			const fn: unknown = descriptor.value;
			const length = typeof fn === "function" ? fn.length : 0;
			return [{
				kind: isStatic ? "static-method" : "instance-method",
				name,
				declaringClass,
				annotations: [],
				isStatic,
				returnType: OBJECT_TYPE,
				parameters: objectParameters(length),
			}];
		}
	}
	return [];
}

/**
 * True when the class declares anything on its prototype besides the
 * constructor.
 */
export function hasPrototypeMethods(cls: Class): boolean {
	return classChain(cls).some((c) => Reflect.ownKeys(prototypeOf(c)).some((key) => key !== "constructor"));
}
