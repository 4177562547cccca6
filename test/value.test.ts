import { describe, test, expect } from "vitest";
import {
  canonicalStringify,
  isSameType,
  jsonTypeOf,
  primitiveToJsonText,
  primitiveToString,
  sortKeysDeep,
} from "../src/value/json-value";
import { deepEqual } from "../src/utils/deep-equal";
import { appendSegment, joinPath, splitPath } from "../src/utils/path-utils";

describe("json value helpers", () => {
  test("classifies every JSON type", () => {
    expect(jsonTypeOf("x")).toBe("string");
    expect(jsonTypeOf(0)).toBe("number");
    expect(jsonTypeOf(false)).toBe("boolean");
    expect(jsonTypeOf(null)).toBe("null");
    expect(jsonTypeOf([])).toBe("array");
    expect(jsonTypeOf({})).toBe("object");
  });

  test("null and object are different types", () => {
    expect(isSameType(null, {})).toBe(false);
    expect(isSameType([], {})).toBe(false);
    expect(isSameType(1, 2.5)).toBe(true);
  });

  test("renders primitives the way loose comparison sees them", () => {
    expect(primitiveToString("plain")).toBe("plain");
    expect(primitiveToString(42)).toBe("42");
    expect(primitiveToString(1.5)).toBe("1.5");
    expect(primitiveToString(1e21)).toBe("1000000000000000000000");
    expect(primitiveToString(true)).toBe("true");
    expect(primitiveToString(null)).toBe("null");
    expect(primitiveToString({ b: 1, a: 2 })).toBe('{"a":2,"b":1}');
  });

  test("canonical form sorts keys at every level", () => {
    expect(canonicalStringify({ b: 1, a: [{ d: null, c: "x" }] })).toBe('{"a":[{"c":"x","d":null}],"b":1}');
  });

  test("JSON text of primitives is quoted, containers have none", () => {
    expect(primitiveToJsonText("x")).toBe('"x"');
    expect(primitiveToJsonText(3)).toBe("3");
    expect(primitiveToJsonText([1])).toBeUndefined();
  });

  test("sortKeysDeep orders nested keys", () => {
    const sorted = sortKeysDeep({ b: 1, a: { d: 1, c: 2 } });
    expect(JSON.stringify(sorted)).toBe('{"a":{"c":2,"d":1},"b":1}');
  });
});

describe("deepEqual", () => {
  test("ignores object key order", () => {
    expect(deepEqual({ a: 1, b: [1, 2] }, { b: [1, 2], a: 1 })).toBe(true);
  });

  test("respects array order and value types", () => {
    expect(deepEqual([1, 2], [2, 1])).toBe(false);
    expect(deepEqual(1, "1")).toBe(false);
    expect(deepEqual(null, {})).toBe(false);
    expect(deepEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
  });
});

describe("path utils", () => {
  test("escapes pointer segments", () => {
    expect(joinPath(["a/b", "c~d", "0"])).toBe("/a~1b/c~0d/0");
    expect(splitPath("/a~1b/c~0d/0")).toEqual(["a/b", "c~d", "0"]);
  });

  test("the root pointer is empty", () => {
    expect(joinPath([])).toBe("");
    expect(splitPath("")).toEqual([]);
  });

  test("appending never mutates the parent path", () => {
    const parent = ["items"];
    const first = appendSegment(parent, 0);
    const second = appendSegment(parent, 1);
    expect(parent).toEqual(["items"]);
    expect(first).toEqual(["items", "0"]);
    expect(second).toEqual(["items", "1"]);
  });
});
