import {ConstrainedList} from "./constrainedList.js";
import {ConstraintError, ConstraintErrorCode} from "./errors.js";
import {conforms} from "./marker.js";
import {isTypeConstructor, TypeConstructor, typeName, typeOf} from "./typeId.js";

/**
 * Sequence types whose element type is fixed by construction
 */
export const defaultCompatibleTypes: readonly TypeConstructor[] = [
  String,
  Int8Array,
  Uint8Array,
  Uint8ClampedArray,
  Int16Array,
  Uint16Array,
  Int32Array,
  Uint32Array,
  Float32Array,
  Float64Array,
  BigInt64Array,
  BigUint64Array,
];

/**
 * Foreign types accepted by `isCompatible` although they do not implement `HasConstraints`
 */
export class CompatibilityRegistry {
  private readonly types = new Set<TypeConstructor>();
  private readonly initialTypes: readonly TypeConstructor[];

  constructor(initialTypes: Iterable<TypeConstructor> = defaultCompatibleTypes) {
    this.initialTypes = Array.from(initialTypes);
    this.reset();
  }

  get size(): number {
    return this.types.size;
  }

  register(ctor: TypeConstructor): this {
    if (!isTypeConstructor(ctor)) {
      throw new ConstraintError({
        code: ConstraintErrorCode.ARGUMENT_SHAPE,
        op: "register",
        expected: "constructor",
        received: typeName(typeOf(ctor)),
      });
    }
    this.types.add(ctor);
    return this;
  }

  /**
   * Returns false if `ctor` was not registered
   */
  unregister(ctor: TypeConstructor): boolean {
    return this.types.delete(ctor);
  }

  /**
   * True only for a registered constructor, not for its subclasses
   */
  has(ctor: TypeConstructor): boolean {
    return this.types.has(ctor);
  }

  /**
   * True for a registered constructor or any subclass of one
   */
  covers(ctor: TypeConstructor): boolean {
    let current: unknown = ctor;
    while (isTypeConstructor(current)) {
      if (this.types.has(current)) return true;
      current = Object.getPrototypeOf(current);
    }
    return false;
  }

  entries(): TypeConstructor[] {
    return Array.from(this.types);
  }

  /**
   * Restore the types this registry was created with
   */
  reset(): void {
    this.types.clear();
    for (const ctor of this.initialTypes) {
      this.register(ctor);
    }
  }
}

export const compatibilityRegistry = new CompatibilityRegistry();

function isConstrainedListClass(value: unknown): boolean {
  return value === ConstrainedList || Reflect.get(Object(value), "prototype") instanceof ConstrainedList;
}

function primitiveConstructor(value: unknown): TypeConstructor | null {
  switch (typeof value) {
    case "string":
      return String;
    case "number":
      return Number;
    case "boolean":
      return Boolean;
    default:
      return null;
  }
}

/**
 * Broad compatibility check: anything `conforms` accepts, any `ConstrainedList` class or
 * instance, and any type covered by `registry` together with its instances
 */
export function isCompatible(value: unknown, registry: CompatibilityRegistry = compatibilityRegistry): boolean {
  if (conforms(value) || value instanceof ConstrainedList || isConstrainedListClass(value)) {
    return true;
  }

  if (isTypeConstructor(value)) {
    return registry.covers(value);
  }

  const primitive = primitiveConstructor(value);
  if (primitive !== null) {
    return registry.covers(primitive);
  }

  const id = typeOf(value);
  return isTypeConstructor(id) && registry.covers(id);
}
