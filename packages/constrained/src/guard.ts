import {Logger} from "@seqguard/utils";
import {ConstraintError, ConstraintErrorCode, ConstraintOp} from "./errors.js";
import {AllowedTypeSet, TypeId, formatTypeSet, isTypeId, typeName, typeOf} from "./typeId.js";

export function isIterable(value: unknown): value is Iterable<unknown> {
  if (value === null || value === undefined) return false;
  const iterator: unknown = Reflect.get(Object(value), Symbol.iterator);
  return typeof iterator === "function";
}

/** Largest length a JS array can hold */
export const maxArrayLength = 2 ** 32 - 1;

function receivedName(value: unknown): string {
  return typeName(typeOf(value));
}

function logAndThrow(error: ConstraintError, logger?: Logger): never {
  logger?.verbose("Constraint violation", error.getMetadata());
  throw error;
}

/**
 * Materialize `ids` into a set of type identifiers, rejecting anything that is not one.
 * Rejections are logged to `logger` when given.
 */
export function toTypeSet(ids: Iterable<TypeId>, op: ConstraintOp, logger?: Logger): Set<TypeId> {
  if (!isIterable(ids)) {
    logAndThrow(
      new ConstraintError({
        code: ConstraintErrorCode.ARGUMENT_SHAPE,
        op,
        expected: "iterable",
        received: receivedName(ids),
      }),
      logger
    );
  }

  const types = new Set<TypeId>();
  for (const id of ids) {
    if (!isTypeId(id)) {
      logAndThrow(
        new ConstraintError({
          code: ConstraintErrorCode.ARGUMENT_SHAPE,
          op,
          expected: "type identifier",
          received: receivedName(id),
        }),
        logger
      );
    }
    types.add(id);
  }
  return types;
}

/**
 * Enforces an allowed type set on every value entering a container.
 *
 * All checks run before the caller touches its storage, so a rejected call leaves the
 * container unchanged. Violations are logged at verbose level and thrown, never swallowed.
 */
export class MutationGuard {
  constructor(
    private readonly allowed: AllowedTypeSet,
    private readonly logger: Logger
  ) {}

  accepts(value: unknown): boolean {
    return this.allowed.has(typeOf(value));
  }

  /**
   * Validate a single element
   */
  element<T>(op: ConstraintOp, value: T): T {
    if (!this.accepts(value)) {
      this.reject(
        new ConstraintError({
          code: ConstraintErrorCode.ELEMENT_TYPE,
          op,
          received: receivedName(value),
          allowed: formatTypeSet(this.allowed),
        })
      );
    }
    return value;
  }

  /**
   * Consume `values` exactly once and validate every element before returning them.
   * Throws on the first offending element, nothing is committed by the caller.
   */
  batch<T>(op: ConstraintOp, values: Iterable<T>): T[] {
    const items = this.materialize(op, values);
    for (let i = 0; i < items.length; i++) {
      if (!this.accepts(items[i])) {
        const received = receivedName(items[i]);
        const allowed = formatTypeSet(this.allowed);
        this.reject(
          new ConstraintError(
            op === "construct"
              ? {code: ConstraintErrorCode.CONSTRUCTION, index: i, received, allowed}
              : {code: ConstraintErrorCode.BATCH_TYPE, op, index: i, received, allowed}
          )
        );
      }
    }
    return items;
  }

  /**
   * Copy an iterable argument into a new array
   */
  materialize<T>(op: ConstraintOp, values: Iterable<T>): T[] {
    if (!isIterable(values)) {
      this.reject(
        new ConstraintError({
          code: ConstraintErrorCode.ARGUMENT_SHAPE,
          op,
          expected: "iterable",
          received: receivedName(values),
        })
      );
    }
    return Array.from(values);
  }

  /**
   * Validate an integer argument such as a repetition count or an index
   */
  integer(op: ConstraintOp, value: number): number {
    if (!Number.isInteger(value)) {
      this.reject(
        new ConstraintError({
          code: ConstraintErrorCode.ARGUMENT_SHAPE,
          op,
          expected: "integer",
          received: receivedName(value),
        })
      );
    }
    return value;
  }

  /**
   * Validate the length a growing operation would produce
   */
  length(op: ConstraintOp, length: number): number {
    if (length > maxArrayLength) {
      this.reject(new ConstraintError({code: ConstraintErrorCode.LENGTH_LIMIT, op, length, limit: maxArrayLength}));
    }
    return length;
  }

  /**
   * Resolve a possibly negative index to a position within `[0, length)`
   */
  index(op: ConstraintOp, index: number, length: number): number {
    this.integer(op, index);
    const position = index < 0 ? length + index : index;
    if (position < 0 || position >= length) {
      this.reject(new ConstraintError({code: ConstraintErrorCode.INDEX_OUT_OF_RANGE, op, index, length}));
    }
    return position;
  }

  private reject(error: ConstraintError): never {
    logAndThrow(error, this.logger);
  }
}
