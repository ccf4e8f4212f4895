import "reflect-metadata";

/**
 * Meta-markers an annotation type may carry.
 * - `scope`: selects a lifecycle policy
 * - `qualifier`: narrows which service satisfies an injection point
 * - `contract-indicator`: marks the annotated type as a contract
 */
export type AnnotationMarker = "scope" | "qualifier" | "contract-indicator";

export type ValueGuard<V> = (value: unknown) => value is V;

export const isUndefined: ValueGuard<undefined> = (value): value is undefined => value === undefined;
export const isNumber: ValueGuard<number> = (value): value is number => typeof value === "number";
export const isString: ValueGuard<string> = (value): value is string => typeof value === "string";

export class AnnotationType<V = undefined> {
	constructor(
		readonly name: string,
		private readonly guard: ValueGuard<V>,
		readonly markers: readonly AnnotationMarker[] = [],
	) {}

	of(value: V): Annotation {
		return new Annotation(this, value);
	}

	hasMarker(marker: AnnotationMarker): boolean {
		return this.markers.includes(marker);
	}

	/**
	 * Value of the first annotation of this type, if any.
	 */
	read(annotations: readonly Annotation[]): V | undefined {
		for (const annotation of annotations) {
			if (annotation.type === this && this.guard(annotation.value)) {
				return annotation.value;
			}
		}
		return undefined;
	}

	isPresent(annotations: readonly Annotation[]): boolean {
		return annotations.some((annotation) => annotation.type === this);
	}
}

/**
 * Annotation type without a value, such as a scope or a marker.
 */
export function markerType(name: string, markers: readonly AnnotationMarker[] = []): AnnotationType<undefined> {
	return new AnnotationType(name, isUndefined, markers);
}

export class Annotation {
	constructor(
		readonly type: AnnotationType<unknown>,
		readonly value: unknown,
	) {}

	hasMarker(marker: AnnotationMarker): boolean {
		return this.type.hasMarker(marker);
	}

	toString(): string {
		return this.value === undefined ? `@${this.type.name}` : `@${this.type.name}(${String(this.value)})`;
	}
}

// ============================================================================
// Storage
// ============================================================================

const ANNOTATIONS = Symbol.for("providence:annotations");

function readList(stored: unknown): Annotation[] {
	return Array.isArray(stored) ? stored.filter((item): item is Annotation => item instanceof Annotation) : [];
}

/**
 * Attaches an annotation to a class or an interface token.
 */
export function addAnnotation(target: object, annotation: Annotation): void {
	const list = readList(Reflect.getOwnMetadata(ANNOTATIONS, target));
	Reflect.defineMetadata(ANNOTATIONS, [...list, annotation], target);
}

/**
 * Annotations declared directly on a class or interface token. Annotations
 * of superclasses are not inherited.
 */
export function getAnnotations(target: object): readonly Annotation[] {
	return readList(Reflect.getOwnMetadata(ANNOTATIONS, target));
}

/**
 * `target` is the constructor for static members and the prototype for
 * instance members.
 */
export function addMemberAnnotation(target: object, member: string | symbol, annotation: Annotation): void {
	const list = readList(Reflect.getOwnMetadata(ANNOTATIONS, target, member));
	Reflect.defineMetadata(ANNOTATIONS, [...list, annotation], target, member);
}

export function getMemberAnnotations(target: object, member: string | symbol): readonly Annotation[] {
	return readList(Reflect.getOwnMetadata(ANNOTATIONS, target, member));
}

/**
 * Annotations carrying the given meta-marker.
 */
export function withMarker(annotations: readonly Annotation[], marker: AnnotationMarker): Annotation[] {
	return annotations.filter((annotation) => annotation.hasMarker(marker));
}
