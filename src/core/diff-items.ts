import type { DiffItem, DiffType, JsonValue } from "../types";

/** Whether the item or any of its descendants differs. */
export function hasDiff(item: DiffItem): boolean {
  if (item.type !== "unchanged") return true;
  return item.children.some(hasDiff);
}

export function addedItem(rightPath: readonly string[], rightValue: JsonValue, depth: number): DiffItem {
  return {
    path: rightPath,
    rightPath,
    type: "added",
    key: rightPath[rightPath.length - 1],
    rightValue,
    children: [],
    depth,
  };
}

export function removedItem(leftPath: readonly string[], leftValue: JsonValue, depth: number): DiffItem {
  return {
    path: leftPath,
    type: "removed",
    key: leftPath[leftPath.length - 1],
    leftValue,
    children: [],
    depth,
  };
}

export function pairedItem(
  type: Exclude<DiffType, "added" | "removed">,
  leftPath: readonly string[],
  rightPath: readonly string[],
  leftValue: JsonValue,
  rightValue: JsonValue,
  depth: number,
  children: readonly DiffItem[] = [],
): DiffItem {
  return {
    path: leftPath,
    rightPath,
    type,
    key: leftPath[leftPath.length - 1],
    leftValue,
    rightValue,
    children,
    depth,
  };
}
