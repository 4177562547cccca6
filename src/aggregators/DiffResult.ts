import { hasDiff } from "../core/diff-items";
import type { DiffItem, DiffSummary, DiffType, SerializedDiffEntry } from "../types";
import { joinPath } from "../utils/path-utils";

/**
 * A node is a leaf diff when it differs and none of its children do. Parents
 * whose children differ are never counted themselves.
 */
function isLeafDiff(item: DiffItem): boolean {
  return item.type !== "unchanged" && !item.children.some(hasDiff);
}

function countType(items: readonly DiffItem[], type: DiffType): number {
  let count = 0;
  for (const item of items) {
    if (item.type === type && isLeafDiff(item)) {
      count += 1;
    } else {
      count += countType(item.children, type);
    }
  }
  return count;
}

function flattenItems(items: readonly DiffItem[], result: DiffItem[]) {
  for (const item of items) {
    if (isLeafDiff(item)) {
      result.push(item);
    } else {
      flattenItems(item.children, result);
    }
  }
}

/** JSON Pointer for the item's path (root is ""). */
export function jsonPointer(item: DiffItem): string {
  return joinPath(item.path);
}

/**
 * Read-only view over one comparison's diff tree. Every derived value is
 * recomputed from the tree on access.
 */
export class DiffResult {
  readonly items: readonly DiffItem[];

  constructor(items: readonly DiffItem[]) {
    this.items = items;
  }

  get root(): DiffItem | undefined {
    return this.items[0];
  }

  get addedCount(): number {
    return countType(this.items, "added");
  }

  get removedCount(): number {
    return countType(this.items, "removed");
  }

  get modifiedCount(): number {
    return countType(this.items, "modified");
  }

  get totalDiffCount(): number {
    return this.addedCount + this.removedCount + this.modifiedCount;
  }

  get isIdentical(): boolean {
    return this.totalDiffCount === 0;
  }

  /** Depth-first list of leaf diffs; its length always equals `totalDiffCount`. */
  get flattenedDiffItems(): DiffItem[] {
    const result: DiffItem[] = [];
    flattenItems(this.items, result);
    return result;
  }

  summary(): DiffSummary {
    const added = this.addedCount;
    const removed = this.removedCount;
    const modified = this.modifiedCount;
    return { added, removed, modified, total: added + removed + modified };
  }

  serializeDiff(): SerializedDiffEntry[] {
    return this.flattenedDiffItems.map((item) => {
      const entry: SerializedDiffEntry = { path: jsonPointer(item), type: item.type };
      if (item.leftValue !== undefined && (item.type === "removed" || item.type === "modified")) {
        entry.left = item.leftValue;
      }
      if (item.rightValue !== undefined && (item.type === "added" || item.type === "modified")) {
        entry.right = item.rightValue;
      }
      return entry;
    });
  }

  /** Pretty JSON text of `serializeDiff()`, for copying a diff as text. */
  serializeDiffText(indent = 2): string {
    return JSON.stringify(this.serializeDiff(), null, indent);
  }
}
