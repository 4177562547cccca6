import { describe, test, expect } from "vitest";
import { compare } from "../src/core/JsonDiffEngine";
import { applyCollapse, collapseText, pairLines, render } from "../src/formatting/DiffRenderer";
import { prettyPrint } from "../src/formatting/prettyPrint";
import { parseJsonOrThrow } from "../src/modules/parsers/jsonc-parser";
import type { CompareOptions, DiffType, JsonValue, RenderLine } from "../src/types";

function renderValues(left: JsonValue, right: JsonValue, options?: Partial<CompareOptions>) {
  const leftText = JSON.stringify(left);
  const rightText = JSON.stringify(right);
  return { leftText, rightText, diffResult: compare(left, right, options) };
}

const kinds = (lines: readonly RenderLine[]) =>
  lines.map((line) => (line.kind.type === "content" ? line.kind.diffType : line.kind.type));

const twentyKeys = (changed?: number): JsonValue =>
  Object.fromEntries(
    Array.from({ length: 20 }, (_, i): [string, number] => [`k${String(i).padStart(2, "0")}`, i === changed ? 100 : i]),
  );

describe("prettyPrint", () => {
  test("sorts keys and indents with the requested width", () => {
    const formatted = prettyPrint('{"b":1,"a":[1]}', 2);
    expect(formatted.formatted).toBe(true);
    expect(formatted.text).toBe('{\n  "a": [\n    1\n  ],\n  "b": 1\n}');
  });

  test("records the line span of every pointer", () => {
    const { spans } = prettyPrint('{"a":[1]}', 2);
    expect(spans.get("")).toEqual({ start: 0, end: 4 });
    expect(spans.get("/a")).toEqual({ start: 1, end: 3 });
    expect(spans.get("/a/0")).toEqual({ start: 2, end: 2 });
  });

  test("a __proto__ member is printed like any other key", () => {
    const formatted = prettyPrint('{"__proto__":{"x":1},"a":1}', 2);
    expect(formatted.text).toBe('{\n  "__proto__": {\n    "x": 1\n  },\n  "a": 1\n}');
    expect(formatted.spans.get("/__proto__")).toEqual({ start: 1, end: 3 });
  });

  test("invalid text passes through unchanged", () => {
    const formatted = prettyPrint("{oops", 4);
    expect(formatted).toEqual({ text: "{oops", formatted: false, spans: new Map() });
  });
});

describe("render", () => {
  test("marks the changed member on both sides", () => {
    const { leftText, rightText, diffResult } = renderValues({ a: 1, b: 2 }, { a: 1, b: 3 });
    const result = render(leftText, rightText, diffResult);
    expect(result.leftLines.map((line) => line.text)).toEqual(["{", '    "a": 1,', '    "b": 2', "}"]);
    expect(result.rightLines.map((line) => line.text)).toEqual(["{", '    "a": 1,', '    "b": 3', "}"]);
    expect(kinds(result.leftLines)).toEqual(["unchanged", "unchanged", "modified", "unchanged"]);
    expect(kinds(result.rightLines)).toEqual(["unchanged", "unchanged", "modified", "unchanged"]);
    expect(result.diffLocations).toEqual([{ renderLineIndex: 2, diffType: "modified" }]);
    expect(result.totalLines).toBe(4);
    expect(result.truncated).toBe(false);
    expect(result.sections).toEqual([]);
  });

  test("a sibling with the same value is not highlighted", () => {
    const { leftText, rightText, diffResult } = renderValues({ a: 1, b: 1 }, { a: 1, b: 2 });
    const result = render(leftText, rightText, diffResult);
    expect(kinds(result.leftLines)).toEqual(["unchanged", "unchanged", "modified", "unchanged"]);
  });

  test("a removed container highlights every line of it and pads the other side", () => {
    const { leftText, rightText, diffResult } = renderValues({ a: { x: 1, y: 2 }, b: 1 }, { b: 1 });
    const result = render(leftText, rightText, diffResult);
    expect(kinds(result.leftLines)).toEqual([
      "unchanged",
      "removed",
      "removed",
      "removed",
      "removed",
      "unchanged",
      "unchanged",
    ]);
    expect(kinds(result.rightLines)).toEqual([
      "unchanged",
      "unchanged",
      "unchanged",
      "padding",
      "padding",
      "padding",
      "padding",
    ]);
    expect(result.rightLines[3]).toEqual({ lineIndex: -1, kind: { type: "padding" }, text: "" });
    expect(result.diffLocations.map((location) => location.renderLineIndex)).toEqual([1, 2, 3, 4]);
  });

  test("matched array elements are highlighted where each side has them", () => {
    const { leftText, rightText, diffResult } = renderValues(
      [
        { id: 1, v: "a" },
        { id: 2, v: "b" },
      ],
      [
        { id: 2, v: "c" },
        { id: 1, v: "a" },
      ],
      { ignoreArrayOrder: true },
    );
    const result = render(leftText, rightText, diffResult, [], 4, { contextLines: 10 });
    const changed = (lines: readonly RenderLine[]) =>
      lines.filter((line) => line.kind.type === "content" && line.kind.diffType !== "unchanged").map((line) => line.lineIndex);
    expect(changed(result.leftLines)).toEqual([7]);
    expect(changed(result.rightLines)).toEqual([3]);
    expect(result.diffLocations).toEqual([
      { renderLineIndex: 3, diffType: "modified" },
      { renderLineIndex: 7, diffType: "modified" },
    ]);
  });

  test("unparseable text falls back to substring matching", () => {
    const diffResult = compare({ a: "x" }, { a: "y" });
    const result = render('{"a": "x",}', '{"a": "y"}', diffResult);
    expect(result.leftFormatted.formatted).toBe(false);
    expect(result.leftLines.map((line) => line.text)).toEqual(['{"a": "x",}', "", ""]);
    expect(kinds(result.leftLines)).toEqual(["modified", "padding", "padding"]);
    expect(kinds(result.rightLines)).toEqual(["unchanged", "modified", "unchanged"]);
    expect(result.diffLocations).toEqual([
      { renderLineIndex: 0, diffType: "modified" },
      { renderLineIndex: 1, diffType: "modified" },
    ]);
  });

  test("a changed __proto__ member is highlighted on its own line", () => {
    const leftText = '{"__proto__":1,"a":1}';
    const rightText = '{"__proto__":2,"a":1}';
    const diffResult = compare(parseJsonOrThrow(leftText), parseJsonOrThrow(rightText));
    const result = render(leftText, rightText, diffResult);
    expect(result.leftLines.map((line) => line.text)).toEqual(["{", '    "__proto__": 1,', '    "a": 1', "}"]);
    expect(kinds(result.rightLines)).toEqual(["unchanged", "modified", "unchanged", "unchanged"]);
    expect(result.diffLocations).toEqual([{ renderLineIndex: 1, diffType: "modified" }]);
  });

  test("identical documents collapse into one section", () => {
    const { leftText, rightText, diffResult } = renderValues({ a: 1 }, { a: 1 });
    const result = render(leftText, rightText, diffResult);
    expect(result.leftLines).toEqual([
      {
        lineIndex: 0,
        kind: { type: "collapse", sectionIndex: 0, hiddenLineCount: 3 },
        text: "··· 3 unchanged lines ···",
      },
    ]);
    expect(result.sections).toEqual([{ sectionIndex: 0, startLine: 0, lineCount: 3, expanded: false }]);
    expect(result.diffLocations).toEqual([]);
  });

  test("unchanged runs outside the context window collapse", () => {
    const { leftText, rightText, diffResult } = renderValues(twentyKeys(), twentyKeys(10));
    const result = render(leftText, rightText, diffResult);
    expect(result.sections).toEqual([
      { sectionIndex: 0, startLine: 0, lineCount: 8, expanded: false },
      { sectionIndex: 1, startLine: 15, lineCount: 7, expanded: false },
    ]);
    expect(result.leftLines).toHaveLength(9);
    expect(result.leftLines[0]?.text).toBe(collapseText(8));
    expect(result.leftLines[8]?.text).toBe("··· 7 unchanged lines ···");
    expect(result.leftLines[4]?.text).toBe('    "k10": 10,');
    expect(result.rightLines[4]?.text).toBe('    "k10": 100,');
    expect(result.diffLocations).toEqual([{ renderLineIndex: 4, diffType: "modified" }]);
  });

  test("expanding a section restores exactly its hidden lines", () => {
    const { leftText, rightText, diffResult } = renderValues(twentyKeys(), twentyKeys(10));
    const expanded = render(leftText, rightText, diffResult, [0]);
    expect(expanded.leftLines).toHaveLength(16);
    expect(expanded.leftLines.slice(0, 8).map((line) => line.lineIndex)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(expanded.sections[0]?.expanded).toBe(true);
    expect(expanded.diffLocations).toEqual([{ renderLineIndex: 11, diffType: "modified" }]);

    const all = render(leftText, rightText, diffResult, [0, 1]);
    expect(all.leftLines.map((line) => line.lineIndex)).toEqual(Array.from({ length: 22 }, (_, i) => i));
    expect(all.rightLines).toHaveLength(22);
  });

  test("contextLines 0 keeps only the differing rows", () => {
    const { leftText, rightText, diffResult } = renderValues({ a: 1, b: 2 }, { a: 1, b: 3 });
    const result = render(leftText, rightText, diffResult, [], 4, { contextLines: 0 });
    expect(result.leftLines.map((line) => line.text)).toEqual([
      "··· 2 unchanged lines ···",
      '    "b": 2',
      "··· 1 unchanged lines ···",
    ]);
  });

  test("both sides are truncated to the same length", () => {
    const { leftText, rightText, diffResult } = renderValues(twentyKeys(), twentyKeys(10));
    const result = render(leftText, rightText, diffResult, [], 4, { maxDisplayLines: 5 });
    expect(result.truncated).toBe(true);
    expect(result.totalLines).toBe(5);
    expect(result.leftLines).toHaveLength(5);
    expect(result.rightLines).toHaveLength(5);
    expect(result.diffLocations).toEqual([{ renderLineIndex: 4, diffType: "modified" }]);
  });

  test("indent width changes the layout", () => {
    const { leftText, rightText, diffResult } = renderValues({ a: 1, b: 2 }, { a: 1, b: 3 });
    const result = render(leftText, rightText, diffResult, [], 2);
    expect(result.leftLines[2]?.text).toBe('  "b": 2');
  });
});

describe("pairLines", () => {
  test("pads the shorter side", () => {
    const paired = pairLines(["a"], ["removed"], ["a", "b"], ["unchanged", "added"]);
    expect(paired.left).toEqual([
      { lineIndex: 0, kind: { type: "content", diffType: "removed" }, text: "a" },
      { lineIndex: -1, kind: { type: "padding" }, text: "" },
    ]);
    expect(paired.right).toHaveLength(2);
  });
});

describe("applyCollapse", () => {
  test("counts sections from 0 whether or not they are expanded", () => {
    const lines = ["a", "b", "c", "d", "e"];
    const diffs: DiffType[] = ["unchanged", "unchanged", "modified", "unchanged", "unchanged"];
    const paired = pairLines(lines, diffs, lines, diffs);
    const collapsed = applyCollapse(paired.left, paired.right, new Set([1]), 0);
    expect(collapsed.sections).toEqual([
      { sectionIndex: 0, startLine: 0, lineCount: 2, expanded: false },
      { sectionIndex: 1, startLine: 3, lineCount: 2, expanded: true },
    ]);
    expect(collapsed.left.map((line) => line.text)).toEqual(["··· 2 unchanged lines ···", "c", "d", "e"]);
    expect(collapsed.right).toHaveLength(4);
  });
});
