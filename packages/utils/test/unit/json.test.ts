import {describe, it, expect} from "vitest";
import {CodedError, Json, logDataToJson, logDataToString} from "../../src/index.js";

describe("log data rendering", () => {
  type TestCase = {
    id: string;
    arg: unknown;
    json: Json;
    str: string;
  };

  const testCases: (TestCase | (() => TestCase))[] = [
    {id: "undefined", arg: undefined, json: undefined, str: "undefined"},
    {id: "null", arg: null, json: "null", str: "null"},
    {id: "boolean", arg: true, json: true, str: "true"},
    {id: "number", arg: 3, json: 3, str: "3"},
    {id: "bigint", arg: BigInt(123), json: "123", str: "123"},
    {id: "string", arg: "{string, integer}", json: "{string, integer}", str: "{string, integer}"},
    {id: "symbol", arg: Symbol("item"), json: "Symbol(item)", str: "Symbol(item)"},
    {id: "array", arg: ["push", 2], json: ["push", 2], str: "push, 2"},
    {id: "nested array", arg: [[1], "a"], json: ["[object]", "a"], str: "[object], a"},
    {
      id: "resolved allowed types",
      arg: {source: "declared", types: "{integer}", length: 3},
      json: {source: "declared", types: "{integer}", length: 3},
      str: "source=declared, types={integer}, length=3",
    },
    {id: "nested object", arg: {allowed: {size: 1}}, json: {allowed: "[object]"}, str: "allowed=[object]"},
    {id: "error without stack", arg: Object.assign(Error("boom"), {stack: ""}), json: {message: "boom"}, str: "boom"},
    () => {
      const error = new Error("boom");
      return {
        id: "error",
        arg: error,
        json: {message: "boom", stack: error.stack},
        str: `boom\n${error.stack}`,
      };
    },
    () => {
      const error = new CodedError({code: "CONSTRAINT_ERROR_BATCH_TYPE", op: "extend", index: 1});
      return {
        id: "coded error",
        arg: error,
        json: {code: "CONSTRAINT_ERROR_BATCH_TYPE", op: "extend", index: 1, stack: error.stack},
        str: `code=CONSTRAINT_ERROR_BATCH_TYPE, op=extend, index=1\n${error.stack}`,
      };
    },
  ];

  for (const testCase of testCases) {
    const {id, arg, json, str} = typeof testCase === "function" ? testCase() : testCase;

    it(`${id} to json`, () => {
      expect(logDataToJson(arg)).toEqual(json);
    });

    it(`${id} to string`, () => {
      expect(logDataToString(arg)).toBe(str);
    });
  }
});
