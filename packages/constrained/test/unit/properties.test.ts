import fc from "fast-check";
import {describe, it, expect} from "vitest";
import {ConstrainedList, ConstraintError, TypeId, typeOf} from "../../src/index.js";
import {getMockedLogger} from "../utils/logger.js";

describe("ConstrainedList properties", () => {
  const logger = getMockedLogger();

  const element = fc.oneof(
    fc.string(),
    fc.integer(),
    fc.integer().map((n) => n + 0.5),
    fc.boolean(),
    fc.constant(null),
    fc.constant(undefined)
  );
  const allowedTypes = fc.uniqueArray(fc.constantFrom<TypeId>("string", "integer", "float", "boolean", "null"), {
    minLength: 1,
  });

  function allConform(list: ConstrainedList<unknown>): boolean {
    const allowed = list.constraints;
    return list.toArray().every((value) => allowed.has(typeOf(value)));
  }

  it("infers the distinct runtime types of the initial elements", () => {
    fc.assert(
      fc.property(fc.array(element), (values) => {
        const list = new ConstrainedList<unknown>(values, {logger});
        expect(list.constraints).toEqual(new Set(values.map((value) => typeOf(value))));
        expect(list.toArray()).toEqual(values);
      })
    );
  });

  it("every stored element has an allowed type after any sequence of pushes", () => {
    fc.assert(
      fc.property(allowedTypes, fc.array(element), (types, values) => {
        const list = new ConstrainedList<unknown>([], {constraints: types, logger});
        for (const value of values) {
          const before = list.toArray();
          try {
            list.push(value);
            expect(list.toArray()).toEqual([...before, value]);
          } catch (e) {
            expect(e).toBeInstanceOf(ConstraintError);
            expect(list.toArray()).toEqual(before);
          }
          expect(allConform(list)).toBe(true);
        }
      })
    );
  });

  it("extend commits a batch entirely or not at all", () => {
    fc.assert(
      fc.property(allowedTypes, fc.array(element), (types, batch) => {
        const list = new ConstrainedList<unknown>([], {constraints: types, logger});
        const accepted = batch.every((value) => types.includes(typeOf(value)));
        if (accepted) {
          list.extend(batch);
          expect(list.toArray()).toEqual(batch);
        } else {
          expect(() => list.extend(batch)).toThrow(ConstraintError);
          expect(list.length).toBe(0);
        }
        expect(list.constraints).toEqual(new Set(types));
      })
    );
  });

  it("explicit constraints override inference", () => {
    fc.assert(
      fc.property(allowedTypes, (types) => {
        const list = new ConstrainedList<unknown>([], {constraints: types, logger});
        expect(list.constraintSource).toBe("explicit");
        expect(list.constraints).toEqual(new Set(types));
      })
    );
  });
});
