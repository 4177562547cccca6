import { PREFERRED_MATCHING_KEYS } from "../config";
import type { DiffItem, JsonArray, JsonValue } from "../types";
import { appendSegment } from "../utils/path-utils";
import { canonicalStringify, isContainer, isJsonObject, ownMember, primitiveToString } from "../value/json-value";
import { addedItem, pairedItem, removedItem } from "./diff-items";

export type ElementComparator = (
  left: JsonValue,
  right: JsonValue,
  leftPath: readonly string[],
  rightPath: readonly string[],
  depth: number,
) => DiffItem;

export interface ArrayDiffContext {
  leftPath: readonly string[];
  rightPath: readonly string[];
  /** Depth of the array's elements. */
  depth: number;
  compareElements: ElementComparator;
  valuesEqual: (left: JsonValue, right: JsonValue) => boolean;
}

export function diffArrayOrdered(left: JsonArray, right: JsonArray, ctx: ArrayDiffContext): DiffItem[] {
  const children: DiffItem[] = [];
  const maxCount = Math.max(left.length, right.length);

  for (let i = 0; i < maxCount; i++) {
    const leftPath = appendSegment(ctx.leftPath, i);
    const rightPath = appendSegment(ctx.rightPath, i);
    const leftValue = left[i];
    const rightValue = right[i];

    if (leftValue !== undefined && rightValue !== undefined) {
      children.push(ctx.compareElements(leftValue, rightValue, leftPath, rightPath, ctx.depth));
    } else if (leftValue !== undefined) {
      children.push(removedItem(leftPath, leftValue, ctx.depth));
    } else if (rightValue !== undefined) {
      children.push(addedItem(rightPath, rightValue, ctx.depth));
    }
  }

  return children;
}

/**
 * Greedy first-match: each left element claims the first unclaimed right
 * element it equals. Unmatched rights follow, in right-array order.
 */
export function diffPrimitiveArrayUnordered(left: JsonArray, right: JsonArray, ctx: ArrayDiffContext): DiffItem[] {
  const children: DiffItem[] = [];
  const matched = new Array<boolean>(right.length).fill(false);

  for (const [li, leftValue] of left.entries()) {
    const leftPath = appendSegment(ctx.leftPath, li);
    const match = findUnmatched(right, matched, (rightValue) => ctx.valuesEqual(leftValue, rightValue));

    if (match) {
      matched[match.index] = true;
      children.push(
        pairedItem("unchanged", leftPath, appendSegment(ctx.rightPath, match.index), leftValue, match.value, ctx.depth),
      );
    } else {
      children.push(removedItem(leftPath, leftValue, ctx.depth));
    }
  }

  pushUnmatchedRight(right, matched, ctx, children);
  return children;
}

function findUnmatched(
  items: JsonArray,
  matched: boolean[],
  predicate: (value: JsonValue, index: number) => boolean,
): { index: number; value: JsonValue } | undefined {
  for (const [index, value] of items.entries()) {
    if (!matched[index] && predicate(value, index)) {
      return { index, value };
    }
  }
  return undefined;
}

function commonKeysOf(items: JsonArray): Set<string> | undefined {
  let common: Set<string> | undefined;
  for (const item of items) {
    if (!isJsonObject(item)) return undefined;
    const keys = Object.keys(item);
    if (!common) {
      common = new Set(keys);
    } else {
      const next = new Set<string>();
      for (const key of keys) {
        if (common.has(key)) next.add(key);
      }
      common = next;
    }
  }
  return common;
}

/**
 * A key qualifies when every object in the array carries it with a primitive
 * value and no two objects share the same stringified value.
 */
export function isValidMatchingKey(key: string, items: JsonArray): boolean {
  const seen = new Set<string>();
  for (const item of items) {
    if (!isJsonObject(item)) return false;
    const value = ownMember(item, key);
    if (value === undefined || isContainer(value)) return false;
    const identity = primitiveToString(value);
    if (seen.has(identity)) return false;
    seen.add(identity);
  }
  return true;
}

/**
 * Finds a field that identifies elements uniquely in both arrays. Preferred
 * names come first, then the remaining shared keys alphabetically.
 */
export function inferMatchingKey(left: JsonArray, right: JsonArray): string | undefined {
  if (left.length === 0 || right.length === 0) return undefined;

  const leftKeys = commonKeysOf(left);
  const rightKeys = commonKeysOf(right);
  if (!leftKeys || !rightKeys) return undefined;

  const commonKeys = [...leftKeys].filter((key) => rightKeys.has(key));
  const preferred = PREFERRED_MATCHING_KEYS.filter((key) => commonKeys.includes(key));
  const rest = commonKeys.filter((key) => !PREFERRED_MATCHING_KEYS.includes(key)).sort();

  for (const candidate of [...preferred, ...rest]) {
    if (isValidMatchingKey(candidate, left) && isValidMatchingKey(candidate, right)) {
      return candidate;
    }
  }

  return undefined;
}

function indexByKey(items: JsonArray, matchingKey: string): Map<string, number> {
  const keyToIndex = new Map<string, number>();
  for (const [i, item] of items.entries()) {
    if (!isJsonObject(item)) continue;
    const keyValue = ownMember(item, matchingKey);
    if (keyValue !== undefined) {
      keyToIndex.set(primitiveToString(keyValue), i);
    }
  }
  return keyToIndex;
}

export function diffArrayByMatchingKey(
  left: JsonArray,
  right: JsonArray,
  matchingKey: string,
  ctx: ArrayDiffContext,
): DiffItem[] {
  // Phase 1: index the right array by stringified key value - O(m)
  const rightIndexByKey = indexByKey(right, matchingKey);
  const matched = new Array<boolean>(right.length).fill(false);
  const children: DiffItem[] = [];

  // Phase 2: walk the left array in original order - O(n)
  for (const [li, leftItem] of left.entries()) {
    if (!isJsonObject(leftItem)) continue;
    const keyValue = ownMember(leftItem, matchingKey);
    if (keyValue === undefined) continue;

    const leftPath = appendSegment(ctx.leftPath, li);
    const ri = rightIndexByKey.get(primitiveToString(keyValue));
    const rightItem = ri === undefined ? undefined : right[ri];

    if (ri !== undefined && rightItem !== undefined) {
      matched[ri] = true;
      children.push(ctx.compareElements(leftItem, rightItem, leftPath, appendSegment(ctx.rightPath, ri), ctx.depth));
    } else {
      children.push(removedItem(leftPath, leftItem, ctx.depth));
    }
  }

  // Phase 3: whatever was never consumed is new
  pushUnmatchedRight(right, matched, ctx, children);
  return children;
}

/**
 * Fallback for object arrays without a usable key: elements are identified by
 * their canonical JSON.
 */
export function diffArrayByHash(left: JsonArray, right: JsonArray, ctx: ArrayDiffContext): DiffItem[] {
  const rightHashes = right.map(canonicalStringify);
  const matched = new Array<boolean>(right.length).fill(false);
  const children: DiffItem[] = [];

  for (const [li, leftValue] of left.entries()) {
    const leftHash = canonicalStringify(leftValue);
    const leftPath = appendSegment(ctx.leftPath, li);
    const match = findUnmatched(right, matched, (_value, index) => rightHashes[index] === leftHash);

    if (match) {
      matched[match.index] = true;
      children.push(
        ctx.compareElements(leftValue, match.value, leftPath, appendSegment(ctx.rightPath, match.index), ctx.depth),
      );
    } else {
      children.push(removedItem(leftPath, leftValue, ctx.depth));
    }
  }

  pushUnmatchedRight(right, matched, ctx, children);
  return children;
}

function pushUnmatchedRight(right: JsonArray, matched: boolean[], ctx: ArrayDiffContext, children: DiffItem[]) {
  for (const [ri, rightValue] of right.entries()) {
    if (!matched[ri]) {
      children.push(addedItem(appendSegment(ctx.rightPath, ri), rightValue, ctx.depth));
    }
  }
}

export function diffArrayUnordered(left: JsonArray, right: JsonArray, ctx: ArrayDiffContext): DiffItem[] {
  const all = [...left, ...right];

  if (all.every((item) => !isContainer(item))) {
    return diffPrimitiveArrayUnordered(left, right, ctx);
  }

  if (all.every(isJsonObject)) {
    const matchingKey = inferMatchingKey(left, right);
    if (matchingKey !== undefined) {
      return diffArrayByMatchingKey(left, right, matchingKey, ctx);
    }
    return diffArrayByHash(left, right, ctx);
  }

  return diffArrayOrdered(left, right, ctx);
}
