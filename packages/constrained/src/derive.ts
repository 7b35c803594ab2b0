import {ConstrainedList} from "./constrainedList.js";
import {declareConstraints, DerivationDeclaration, TypeParameter} from "./declaration.js";
import {ConstrainedListOpts} from "./options.js";
import {AllowedTypeSet, ElementOf, TypeId, TypeOfId} from "./typeId.js";

export interface ConstrainedListClass<T> {
  new (elements?: Iterable<T>, opts?: ConstrainedListOpts): ConstrainedList<T>;
  readonly constraints: AllowedTypeSet;
  readonly isOpen: boolean;
}

/** Static element type of a container class derived from `D` */
export type DeclaredElement<D extends DerivationDeclaration> = D extends {
  constraints: infer C extends readonly [TypeId, ...TypeId[]];
}
  ? ElementOf<C>
  : D extends {parameter: TypeParameter<infer U>}
  ? U
  : D extends {parameter: infer P}
  ? TypeOfId<P>
  : unknown;

/**
 * Create a container class with class-level allowed types.
 *
 * ```ts
 * class Names extends defineConstrained({constraints: ["string"]}) {}
 * const names = new Names(["a", "b"]);
 * names.push(1); // throws CONSTRAINT_ERROR_ELEMENT_TYPE
 * ```
 *
 * Subclasses inherit the declaration. A declaration without constraints, or with a `TypeParameter`,
 * leaves the class open: each instance infers its allowed types from its initial elements.
 */
export function defineConstrained<const D extends DerivationDeclaration>(
  declaration: D,
  name?: string
): ConstrainedListClass<DeclaredElement<D>> {
  const DerivedConstrainedList = class extends ConstrainedList<DeclaredElement<D>> {};
  if (name !== undefined) {
    Object.defineProperty(DerivedConstrainedList, "name", {value: name});
  }
  declareConstraints(DerivedConstrainedList, declaration);
  return DerivedConstrainedList;
}
