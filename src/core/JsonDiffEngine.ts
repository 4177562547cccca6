import { DiffResult } from "../aggregators/DiffResult";
import { resolveCompareOptions } from "../config";
import type { CompareOptions, DiffItem, JsonArray, JsonObject, JsonValue } from "../types";
import { deepEqual } from "../utils/deep-equal";
import { appendSegment } from "../utils/path-utils";
import { isContainer, isJsonArray, isJsonObject, isSameType, ownMember, primitiveToString } from "../value/json-value";
import { type ArrayDiffContext, diffArrayOrdered, diffArrayUnordered } from "./arrayDiffAlgorithms";
import { addedItem, hasDiff, pairedItem, removedItem } from "./diff-items";

/**
 * Recursive structural comparison of two JSON values. Holds only its options,
 * so one instance can serve any number of comparisons.
 */
export class JsonDiffEngine {
  readonly options: CompareOptions;

  constructor(options?: Partial<CompareOptions>) {
    this.options = resolveCompareOptions(options);
  }

  compare(left: JsonValue, right: JsonValue): DiffResult {
    const root = this.compareValues(left, right, [], [], 0);
    return new DiffResult([root]);
  }

  private compareValues(
    left: JsonValue,
    right: JsonValue,
    leftPath: readonly string[],
    rightPath: readonly string[],
    depth: number,
  ): DiffItem {
    if (!isSameType(left, right)) {
      // A type mismatch is never decomposed further
      const type = !this.options.strictType && this.arePrimitiveEquivalent(left, right) ? "unchanged" : "modified";
      return pairedItem(type, leftPath, rightPath, left, right, depth);
    }

    if (isJsonObject(left) && isJsonObject(right)) {
      return this.compareObjects(left, right, leftPath, rightPath, depth);
    }

    if (isJsonArray(left) && isJsonArray(right)) {
      return this.compareArrays(left, right, leftPath, rightPath, depth);
    }

    const type = this.valuesEqual(left, right) ? "unchanged" : "modified";
    return pairedItem(type, leftPath, rightPath, left, right, depth);
  }

  private orderedKeys(left: JsonObject, right: JsonObject): string[] {
    const leftKeys = Object.keys(left);
    const addedKeys = Object.keys(right).filter((key) => !Object.hasOwn(left, key));

    if (this.options.ignoreKeyOrder) {
      return [...leftKeys, ...addedKeys].sort();
    }
    return [...leftKeys, ...addedKeys];
  }

  private compareObjects(
    left: JsonObject,
    right: JsonObject,
    leftPath: readonly string[],
    rightPath: readonly string[],
    depth: number,
  ): DiffItem {
    const children: DiffItem[] = [];

    for (const key of this.orderedKeys(left, right)) {
      const leftValue = ownMember(left, key);
      const rightValue = ownMember(right, key);
      const childLeftPath = appendSegment(leftPath, key);
      const childRightPath = appendSegment(rightPath, key);

      if (leftValue !== undefined && rightValue !== undefined) {
        children.push(this.compareValues(leftValue, rightValue, childLeftPath, childRightPath, depth + 1));
      } else if (leftValue !== undefined) {
        children.push(removedItem(childLeftPath, leftValue, depth + 1));
      } else if (rightValue !== undefined) {
        children.push(addedItem(childRightPath, rightValue, depth + 1));
      }
    }

    const type = children.some(hasDiff) ? "modified" : "unchanged";
    return pairedItem(type, leftPath, rightPath, left, right, depth, children);
  }

  private compareArrays(
    left: JsonArray,
    right: JsonArray,
    leftPath: readonly string[],
    rightPath: readonly string[],
    depth: number,
  ): DiffItem {
    const ctx: ArrayDiffContext = {
      leftPath,
      rightPath,
      depth: depth + 1,
      compareElements: (l, r, lp, rp, d) => this.compareValues(l, r, lp, rp, d),
      valuesEqual: (l, r) => this.valuesEqual(l, r),
    };

    const children = this.options.ignoreArrayOrder
      ? diffArrayUnordered(left, right, ctx)
      : diffArrayOrdered(left, right, ctx);

    const type = children.some(hasDiff) ? "modified" : "unchanged";
    return pairedItem(type, leftPath, rightPath, left, right, depth, children);
  }

  private valuesEqual(left: JsonValue, right: JsonValue): boolean {
    if (this.options.strictType) {
      return deepEqual(left, right);
    }
    return primitiveToString(left) === primitiveToString(right);
  }

  private arePrimitiveEquivalent(left: JsonValue, right: JsonValue): boolean {
    if (isContainer(left) || isContainer(right)) return false;
    return primitiveToString(left) === primitiveToString(right);
  }
}

/**
 * Compares two JSON values. Never throws: every pair of values yields a tree,
 * with type mismatches reported as `modified` leaves.
 */
export function compare(left: JsonValue, right: JsonValue, options?: Partial<CompareOptions>): DiffResult {
  return new JsonDiffEngine(options).compare(left, right);
}
