import { ProvidenceError } from "@providence/shared";

/**
 * Thrown when a generic declaration is missing or inconsistent.
 */
export class TypeDeclarationError extends ProvidenceError {}

/**
 * Thrown when a named member cannot be read or called on a receiver.
 */
export class MemberAccessError extends ProvidenceError {}
