import { stringify } from "json-source-map";
import { resolveIndentWidth } from "../config";
import { parseJson } from "../modules/parsers/jsonc-parser";
import type { FormattedText, JsonValue, LineSpan } from "../types";
import { sortKeysDeep } from "../value/json-value";

/**
 * Pretty-prints a value with sorted keys and records, for every JSON Pointer,
 * the 0-based line span of its value. A member's span starts on its key line.
 */
export function formatValue(value: JsonValue, indentWidth?: number): FormattedText {
  const { json, pointers } = stringify(sortKeysDeep(value), undefined, {
    space: resolveIndentWidth(indentWidth),
  });

  const spans = new Map<string, LineSpan>();
  for (const [pointer, location] of Object.entries(pointers)) {
    spans.set(pointer, {
      start: location.key?.line ?? location.value.line,
      end: location.valueEnd.line,
    });
  }

  return { text: json, formatted: true, spans };
}

/**
 * Parse-and-reformat. Text that is not valid JSON comes back unchanged with
 * `formatted: false` and no spans.
 */
export function prettyPrint(text: string, indentWidth?: number): FormattedText {
  const outcome = parseJson(text);
  if (!outcome.ok) {
    return { text, formatted: false, spans: new Map() };
  }
  return formatValue(outcome.value, indentWidth);
}
