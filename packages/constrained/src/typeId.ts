/**
 * Runtime type identifiers.
 *
 * A value's runtime type is either a primitive tag or the constructor found on its prototype.
 * Numbers are split into "integer" and "float" so that sets can tell `1` from `1.5`.
 * Objects with a `null` prototype have the runtime type "object".
 */
export interface PrimitiveTypes {
  string: string;
  integer: number;
  float: number;
  boolean: boolean;
  bigint: bigint;
  symbol: symbol;
  null: null;
  undefined: undefined;
  object: object;
}

export type PrimitiveTypeName = keyof PrimitiveTypes;

export type TypeConstructor = abstract new (...args: never[]) => unknown;

export type TypeId = PrimitiveTypeName | TypeConstructor;

/**
 * Allowed types of a container or a container class. Order is not significant.
 */
export type AllowedTypeSet = ReadonlySet<TypeId>;

/** Static element type matching a runtime type identifier */
export type TypeOfId<Id> = Id extends PrimitiveTypeName
  ? PrimitiveTypes[Id]
  : Id extends abstract new (...args: never[]) => infer R
  ? R
  : never;

export type ElementOf<Ids extends readonly TypeId[]> = TypeOfId<Ids[number]>;

export const primitiveTypeNames: readonly PrimitiveTypeName[] = [
  "string",
  "integer",
  "float",
  "boolean",
  "bigint",
  "symbol",
  "null",
  "undefined",
  "object",
];

export function isPrimitiveTypeName(value: unknown): value is PrimitiveTypeName {
  return primitiveTypeNames.some((name) => name === value);
}

export function isTypeConstructor(value: unknown): value is TypeConstructor {
  return typeof value === "function";
}

export function isTypeId(value: unknown): value is TypeId {
  return isPrimitiveTypeName(value) || isTypeConstructor(value);
}

/**
 * Exact runtime type of `value`. Subclass instances map to the subclass, never to a base class.
 */
export function typeOf(value: unknown): TypeId {
  switch (typeof value) {
    case "string":
      return "string";
    case "number":
      return Number.isInteger(value) ? "integer" : "float";
    case "boolean":
      return "boolean";
    case "bigint":
      return "bigint";
    case "symbol":
      return "symbol";
    case "undefined":
      return "undefined";
    case "object":
    case "function": {
      if (value === null) return "null";
      const proto: unknown = Object.getPrototypeOf(value);
      // Function values have a function as prototype
      const ctor: unknown =
        proto !== null && (typeof proto === "object" || typeof proto === "function")
          ? Reflect.get(proto, "constructor")
          : undefined;
      return isTypeConstructor(ctor) ? ctor : "object";
    }
    default:
      return "object";
  }
}

export function typeName(id: TypeId): string {
  return isTypeConstructor(id) ? id.name || "anonymous" : id;
}

/**
 * Render a set of type identifiers as `{string, integer}`
 */
export function formatTypeSet(types: Iterable<TypeId>): string {
  return `{${Array.from(types, typeName).join(", ")}}`;
}
