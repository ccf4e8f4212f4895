import { type Class, InterfaceToken, type TypeKey, isClass, keyName } from "./class-ref.js";
import { TypeDeclarationError } from "./errors.js";
import { OBJECT_TYPE, type TypeExpression, type TypeLike, TypeVariable, raw, toType } from "./type-expression.js";
import { type Annotation, addAnnotation } from "./annotations.js";

export type TypeVariables = Readonly<Record<string, TypeVariable>>;

interface DeclarationSpec {
	typeParameters?: readonly string[];
	bounds?: (vars: TypeVariables) => Readonly<Record<string, readonly TypeLike[]>>;
}

/**
 * Generic shape of a class. Thunks run on first use, so they may refer to
 * classes declared later in the module.
 */
export interface GenericSpec extends DeclarationSpec {
	extends?: (vars: TypeVariables) => TypeLike;
	implements?: (vars: TypeVariables) => readonly TypeLike[];
}

export interface InterfaceSpec extends DeclarationSpec {
	extends?: (vars: TypeVariables) => readonly TypeLike[];
	annotations?: readonly Annotation[];
}

interface HierarchyThunks {
	superclass: () => TypeExpression | null;
	interfaces: () => readonly TypeExpression[];
}

export class TypeDeclaration {
	readonly typeParameters: readonly TypeVariable[];
	readonly variables: TypeVariables;
	private declaredBounds: Readonly<Record<string, readonly TypeLike[]>> | undefined;
	private cachedSuperclass: TypeExpression | null | undefined;
	private cachedInterfaces: readonly TypeExpression[] | undefined;

	constructor(
		readonly key: TypeKey,
		private readonly spec: DeclarationSpec,
		private readonly hierarchy: HierarchyThunks,
	) {
		this.typeParameters = (spec.typeParameters ?? []).map(
			(name) => new TypeVariable(name, key, () => this.boundsOf(name)),
		);
		this.variables = Object.fromEntries(this.typeParameters.map((v) => [v.name, v]));
	}

	get superclass(): TypeExpression | null {
		if (this.cachedSuperclass === undefined) {
			this.cachedSuperclass = this.hierarchy.superclass();
		}
		return this.cachedSuperclass;
	}

	get interfaces(): readonly TypeExpression[] {
		if (this.cachedInterfaces === undefined) {
			this.cachedInterfaces = this.hierarchy.interfaces();
		}
		return this.cachedInterfaces;
	}

	variable(name: string): TypeVariable {
		const found = this.typeParameters.find((v) => v.name === name);
		if (!found) {
			throw new TypeDeclarationError(`${keyName(this.key)} declares no type parameter ${name}`);
		}
		return found;
	}

	private boundsOf(name: string): readonly TypeExpression[] {
		if (this.declaredBounds === undefined) {
			this.declaredBounds = this.spec.bounds ? this.spec.bounds(this.variables) : {};
		}
		const bounds = this.declaredBounds[name] ?? [];
		return bounds.length === 0 ? [OBJECT_TYPE] : bounds.map(toType);
	}
}

const declarations = new WeakMap<object, TypeDeclaration>();

function runtimeSuperclass(cls: Class): TypeExpression | null {
	if (cls === Object) {
		return null;
	}
	const parent: unknown = Object.getPrototypeOf(cls);
	if (isClass(parent) && parent !== Function.prototype) {
		return raw(parent);
	}
	return OBJECT_TYPE;
}

function defaultDeclaration(key: TypeKey): TypeDeclaration {
	if (key instanceof InterfaceToken) {
		return new TypeDeclaration(key, {}, { superclass: () => null, interfaces: () => [] });
	}
	return new TypeDeclaration(key, {}, { superclass: () => runtimeSuperclass(key), interfaces: () => [] });
}

/**
 * Records the generic shape of a class.
 */
export function declareType(cls: Class, spec: GenericSpec): TypeDeclaration {
	if (declarations.has(cls)) {
		throw new TypeDeclarationError(`${keyName(cls)} already has a generic declaration`);
	}
	const declaration: TypeDeclaration = new TypeDeclaration(cls, spec, {
		superclass: () => (spec.extends ? toType(spec.extends(declaration.variables)) : runtimeSuperclass(cls)),
		interfaces: () => (spec.implements ? spec.implements(declaration.variables).map(toType) : []),
	});
	declarations.set(cls, declaration);
	return declaration;
}

/**
 * Class decorator form of {@link declareType}.
 */
export function Generic(spec: GenericSpec): (target: Class) => void {
	return (target) => {
		declareType(target, spec);
	};
}

/**
 * Creates a token for an interface and records its generic shape.
 */
export function declareInterface<T = unknown>(name: string, spec: InterfaceSpec = {}): InterfaceToken<T> {
	const token = new InterfaceToken<T>(name);
	const declaration: TypeDeclaration = new TypeDeclaration(token, spec, {
		superclass: () => null,
		interfaces: () => (spec.extends ? spec.extends(declaration.variables).map(toType) : []),
	});
	declarations.set(token, declaration);
	for (const annotation of spec.annotations ?? []) {
		addAnnotation(token, annotation);
	}
	return token;
}

export function getTypeDeclaration(key: TypeKey): TypeDeclaration {
	let declaration = declarations.get(key);
	if (declaration === undefined) {
		declaration = defaultDeclaration(key);
		declarations.set(key, declaration);
	}
	return declaration;
}

/**
 * The type variable `name` declared by `key`.
 */
export function typeVariable(key: TypeKey, name: string): TypeVariable {
	return getTypeDeclaration(key).variable(name);
}
