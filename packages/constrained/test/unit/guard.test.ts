import {describe, it, expect, beforeEach} from "vitest";
import {ConstraintErrorCode, isIterable, maxArrayLength, MutationGuard, toTypeSet, TypeId} from "../../src/index.js";
import {expectThrowsConstraintError} from "../utils/errors.js";
import {getMockedLogger, MockedLogger} from "../utils/logger.js";

describe("guard", () => {
  it("isIterable", () => {
    expect(isIterable([])).toBe(true);
    expect(isIterable("ab")).toBe(true);
    expect(isIterable(new Set())).toBe(true);
    expect(isIterable(5)).toBe(false);
    expect(isIterable({})).toBe(false);
    expect(isIterable(null)).toBe(false);
    expect(isIterable(undefined)).toBe(false);
  });

  describe("toTypeSet", () => {
    it("collapses duplicates", () => {
      expect(toTypeSet(["string", "string", Date], "construct")).toEqual(new Set(["string", Date]));
    });

    it("rejects a value that is not a type identifier", () => {
      expectThrowsConstraintError(() => Reflect.apply(toTypeSet, undefined, [["number"], "declare"]), {
        code: ConstraintErrorCode.ARGUMENT_SHAPE,
        op: "declare",
        expected: "type identifier",
        received: "string",
      });
    });

    it("logs a rejection to the given logger", () => {
      const logger = getMockedLogger();
      const err = expectThrowsConstraintError(
        () => Reflect.apply(toTypeSet, undefined, [["string", 3], "construct", logger]),
        ConstraintErrorCode.ARGUMENT_SHAPE
      );
      expect(logger.verbose).toHaveBeenCalledTimes(1);
      expect(logger.verbose).toHaveBeenCalledWith("Constraint violation", err.getMetadata());
    });

    it("rejects a non-iterable", () => {
      expectThrowsConstraintError(() => Reflect.apply(toTypeSet, undefined, [5, "construct"]), {
        code: ConstraintErrorCode.ARGUMENT_SHAPE,
        op: "construct",
        expected: "iterable",
        received: "integer",
      });
    });
  });

  describe("MutationGuard", () => {
    let logger: MockedLogger;
    let guard: MutationGuard;

    beforeEach(() => {
      logger = getMockedLogger();
      guard = new MutationGuard(new Set<TypeId>(["string", "integer"]), logger);
    });

    it("element", () => {
      expect(guard.element("push", "a")).toBe("a");
      expectThrowsConstraintError(() => guard.element("push", 1.5), {
        code: ConstraintErrorCode.ELEMENT_TYPE,
        op: "push",
        received: "float",
        allowed: "{string, integer}",
      });
    });

    it("batch reports the first offending index", () => {
      expect(guard.batch("extend", ["a", 1])).toEqual(["a", 1]);
      expectThrowsConstraintError(() => guard.batch("extend", ["a", true, 2.5]), {
        code: ConstraintErrorCode.BATCH_TYPE,
        op: "extend",
        index: 1,
        received: "boolean",
        allowed: "{string, integer}",
      });
    });

    it("batch reports a construction violation on construct", () => {
      expectThrowsConstraintError(() => guard.batch("construct", [null]), {
        code: ConstraintErrorCode.CONSTRUCTION,
        index: 0,
        received: "null",
        allowed: "{string, integer}",
      });
    });

    it("batch consumes a generator once", () => {
      let consumed = 0;
      function* values(): Generator<number> {
        consumed++;
        yield 1;
        yield 2;
      }
      expect(guard.batch("extend", values())).toEqual([1, 2]);
      expect(consumed).toBe(1);
    });

    it("integer", () => {
      expect(guard.integer("repeatInPlace", -2)).toBe(-2);
      expectThrowsConstraintError(() => guard.integer("repeatInPlace", 0.5), {
        code: ConstraintErrorCode.ARGUMENT_SHAPE,
        op: "repeatInPlace",
        expected: "integer",
        received: "float",
      });
    });

    it("length", () => {
      expect(guard.length("repeatInPlace", maxArrayLength)).toBe(4294967295);
      const err = expectThrowsConstraintError(() => guard.length("repeatInPlace", maxArrayLength + 1), {
        code: ConstraintErrorCode.LENGTH_LIMIT,
        op: "repeatInPlace",
        length: 4294967296,
        limit: 4294967295,
      });
      expect(err.message).toBe("Resulting length 4294967296 of repeatInPlace exceeds 4294967295");
    });

    it("index", () => {
      expect(guard.index("set", 0, 3)).toBe(0);
      expect(guard.index("set", -1, 3)).toBe(2);
      expectThrowsConstraintError(() => guard.index("set", 3, 3), {
        code: ConstraintErrorCode.INDEX_OUT_OF_RANGE,
        op: "set",
        index: 3,
        length: 3,
      });
      expectThrowsConstraintError(() => guard.index("set", -4, 3), ConstraintErrorCode.INDEX_OUT_OF_RANGE);
    });

    it("logs every violation at verbose level before throwing", () => {
      expectThrowsConstraintError(() => guard.element("insert", false), ConstraintErrorCode.ELEMENT_TYPE);
      expect(logger.verbose).toHaveBeenCalledTimes(1);
      expect(logger.verbose).toHaveBeenCalledWith("Constraint violation", {
        code: ConstraintErrorCode.ELEMENT_TYPE,
        op: "insert",
        received: "boolean",
        allowed: "{string, integer}",
      });
    });

    it("does not log accepted values", () => {
      guard.element("push", "a");
      guard.batch("extend", [1, 2]);
      expect(logger.verbose).not.toHaveBeenCalled();
    });
  });
});
