import type {ConstrainedList} from "./constrainedList.js";
import {ConstraintError, ConstraintErrorCode} from "./errors.js";
import {toTypeSet} from "./guard.js";
import {AllowedTypeSet, TypeId} from "./typeId.js";

/**
 * Placeholder for a generic element type that is only known per instance.
 * `T` is the static element type, it does not exist at runtime.
 */
export class TypeParameter<T = unknown> {
  declare readonly element?: T;

  constructor(readonly name: string) {}

  toString(): string {
    return this.name;
  }
}

export function typeParameter<T = unknown>(name: string): TypeParameter<T> {
  return new TypeParameter<T>(name);
}

export type DerivationDeclaration = {
  /** Explicit allowed types, wins over `parameter` when non-empty */
  constraints?: readonly TypeId[];
  /** A single concrete allowed type, or a placeholder left open until construction */
  parameter?: TypeId | TypeParameter;
};

export type ClassConstraints =
  | {kind: "fixed"; types: AllowedTypeSet}
  | {kind: "open"; parameter: TypeParameter | null};

const openConstraints: ClassConstraints = {kind: "open", parameter: null};

// Keyed by class constructor. Only the class that was declared is a key, subclasses are
// resolved by walking up the constructor chain.
const declarations = new WeakMap<object, ClassConstraints>();

export function resolveDeclaration(declaration: DerivationDeclaration): ClassConstraints {
  const types = toTypeSet(declaration.constraints ?? [], "declare");
  if (types.size > 0) {
    return {kind: "fixed", types};
  }

  const {parameter} = declaration;
  if (parameter === undefined) {
    return openConstraints;
  }
  if (parameter instanceof TypeParameter) {
    return {kind: "open", parameter};
  }
  return {kind: "fixed", types: toTypeSet([parameter], "declare")};
}

/**
 * Fix the class-level allowed types of `cls`, consulted by every later construction of `cls`
 * and of its subclasses that carry no declaration of their own.
 */
export function declareConstraints<T>(
  cls: abstract new (...args: never[]) => ConstrainedList<T>,
  declaration: DerivationDeclaration
): ClassConstraints {
  if (declarations.has(cls)) {
    throw new ConstraintError({code: ConstraintErrorCode.DECLARATION_FROZEN, className: cls.name || "anonymous"});
  }

  const resolved = resolveDeclaration(declaration);
  declarations.set(cls, resolved);
  return resolved;
}

/**
 * Nearest declaration on the constructor chain of `cls`, open if there is none
 */
export function getClassConstraints(cls: object): ClassConstraints {
  let current: unknown = cls;
  while (typeof current === "function") {
    const declared = declarations.get(current);
    if (declared !== undefined) return declared;
    current = Object.getPrototypeOf(current);
  }
  return openConstraints;
}
