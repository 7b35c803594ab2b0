import {isIterable} from "./guard.js";
import {TypeId, isTypeId} from "./typeId.js";

/**
 * Capability of exposing allowed types. Implemented structurally, no base class required.
 */
export interface HasConstraints {
  readonly constraints: Iterable<TypeId>;
}

/**
 * True if `obj` exposes a `constraints` property holding a collection of type identifiers:
 * a `Set`, an array or any other re-iterable object. Strings and one-shot iterators such as
 * generators are rejected. Accepts instances and classes with a static `constraints`.
 * Does not consult the compatibility registry, see `isCompatible` for the broader check.
 */
export function conforms(obj: unknown): obj is HasConstraints {
  if (obj === null || (typeof obj !== "object" && typeof obj !== "function")) {
    return false;
  }

  try {
    const constraints: unknown = Reflect.get(obj, "constraints");
    if (typeof constraints !== "object" || !isIterable(constraints)) {
      return false;
    }
    // An iterator returning itself is drained by a single read
    const iterator: unknown = constraints[Symbol.iterator]();
    if (iterator === constraints) {
      return false;
    }
    for (const member of constraints) {
      if (!isTypeId(member)) return false;
    }
    return true;
  } catch {
    // A throwing accessor or iterator exposes nothing
    return false;
  }
}
