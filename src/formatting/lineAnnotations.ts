import type { DiffResult } from "../aggregators/DiffResult";
import type { CompareSide, DiffItem, DiffType, FormattedText, JsonValue } from "../types";
import { joinPath } from "../utils/path-utils";
import { primitiveToJsonText } from "../value/json-value";

interface SideTarget {
  type: DiffType;
  value: JsonValue;
  path: readonly string[];
}

function targetFor(item: DiffItem, side: CompareSide): SideTarget | undefined {
  if (side === "left") {
    if ((item.type === "removed" || item.type === "modified") && item.leftValue !== undefined) {
      return { type: item.type, value: item.leftValue, path: item.path };
    }
    return undefined;
  }
  if ((item.type === "added" || item.type === "modified") && item.rightValue !== undefined) {
    return { type: item.type, value: item.rightValue, path: item.rightPath ?? item.path };
  }
  return undefined;
}

/**
 * Substring heuristic: claims the first still-unmarked line containing the
 * value's JSON text. Containers are skipped.
 */
function markFirstMatchingLine(lines: readonly string[], diffs: DiffType[], value: JsonValue, type: DiffType) {
  const needle = primitiveToJsonText(value);
  if (needle === undefined) return;

  for (const [i, line] of lines.entries()) {
    if (diffs[i] === "unchanged" && line.trim().includes(needle)) {
      diffs[i] = type;
      return;
    }
  }
}

/**
 * Per-line diff types for one pane. Lines are mapped through the formatter's
 * pointer spans when the text was formatted; unformatted text falls back to
 * substring matching. The first mark on a line wins.
 */
export function annotateLines(
  lines: readonly string[],
  formatted: FormattedText,
  diffResult: DiffResult,
  side: CompareSide,
): DiffType[] {
  const diffs = new Array<DiffType>(lines.length).fill("unchanged");

  for (const item of diffResult.flattenedDiffItems) {
    const target = targetFor(item, side);
    if (!target) continue;

    const span = formatted.formatted ? formatted.spans.get(joinPath(target.path)) : undefined;
    if (!span) {
      markFirstMatchingLine(lines, diffs, target.value, target.type);
      continue;
    }

    for (let i = span.start; i <= span.end && i < lines.length; i++) {
      if (diffs[i] === "unchanged") {
        diffs[i] = target.type;
      }
    }
  }

  return diffs;
}
