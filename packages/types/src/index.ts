/**
 * Runtime model of generic types and the algebra over it.
 */
export { type Class, InterfaceToken, type TypeKey, isClass, isTypeKey, keyName } from "./class-ref.js";
export {
	type ArrayType,
	OBJECT_TYPE,
	type ParameterizedType,
	type RawType,
	type TypeExpression,
	type TypeLike,
	TypeVariable,
	type VariableDeclaration,
	type WildcardType,
	arrayOf,
	isObjectType,
	parameterized,
	raw,
	toType,
	wildcard,
	wildcardExtends,
	wildcardSuper,
	wildcardType,
} from "./type-expression.js";
export { CaptureArena } from "./capture.js";
export { identityOf } from "./identity.js";
export { formatType } from "./format-type.js";
export { typeEquals, typeKeyOf, uniqueTypes } from "./type-equality.js";
export {
	Generic,
	type GenericSpec,
	type InterfaceSpec,
	TypeDeclaration,
	type TypeVariables,
	declareInterface,
	declareType,
	getTypeDeclaration,
	typeVariable,
} from "./declarations.js";
export { rawClassOf, rawKeyOf } from "./raw-types.js";
export { containsTypeVariable, resolveType, substituteTypeVariables } from "./type-utils.js";
export { getSupertypes, isSupertypeOf } from "./type-checker.js";
export {
	Annotation,
	type AnnotationMarker,
	AnnotationType,
	type ValueGuard,
	addAnnotation,
	addMemberAnnotation,
	getAnnotations,
	getMemberAnnotations,
	isNumber,
	isString,
	isUndefined,
	markerType,
	withMarker,
} from "./annotations.js";
export {
	type FieldDescription,
	type MemberDescription,
	type MemberKind,
	type MethodDescription,
	type ParameterDescription,
	type ParameterLike,
	type QualifiedParameter,
	Signature,
	type SignatureSpec,
	type UniversalDecorator,
	annotate,
	classChain,
	describeMember,
	findMethods,
	getMembers,
	hasPrototypeMethods,
	memberLabel,
	toParameters,
} from "./members.js";
export { MemberAccessError, TypeDeclarationError } from "./errors.js";
export { invokeMethod, readField } from "./invoke.js";
