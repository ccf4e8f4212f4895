import { Generic, declareInterface, parameterized, typeVariable } from "../../index.js";

// ============================================================================
// Interfaces
// ============================================================================

export const Collection = declareInterface("Collection", { typeParameters: ["E"] });

export const List = declareInterface("List", {
	typeParameters: ["E"],
	extends: ({ E }) => [parameterized(Collection, [E])],
});

export const Comparable = declareInterface("Comparable", { typeParameters: ["T"] });

// ============================================================================
// Classes
// ============================================================================

export class Animal {}

export class Dog extends Animal {}

@Generic({ typeParameters: ["T"] })
export class Optional {}

@Generic({ typeParameters: ["Q"] })
export class Box {}

@Generic({ typeParameters: ["T"] })
export class Repo {}

@Generic({ typeParameters: ["K", "V"] })
export class Pair {}

/** `AnimalBox<A extends Animal>` */
@Generic({ typeParameters: ["A"], bounds: () => ({ A: [Animal] }) })
export class AnimalBox {}

/** `Sorted<T extends Comparable<T>>` */
@Generic({ typeParameters: ["T"], bounds: ({ T }) => ({ T: [parameterized(Comparable, [T])] }) })
export class Sorted {}

/** `StringRepo extends Repo<String>` */
@Generic({ extends: () => parameterized(Repo, [String]) })
export class StringRepo extends Repo {}

/** `ListRepo<X> extends Repo<List<X>>` */
@Generic({ typeParameters: ["X"], extends: ({ X }) => parameterized(Repo, [parameterized(List, [X])]) })
export class ListRepo extends Repo {}

export const REPO_T = typeVariable(Repo, "T");
export const BOX_Q = typeVariable(Box, "Q");
