export type JsonValue = string | number | boolean | null | JsonObject | JsonArray;
export type JsonObject = { [key: string]: JsonValue };
export type JsonArray = JsonValue[];
export type JsonPrimitive = string | number | boolean | null;

export type JsonType = "object" | "array" | "string" | "number" | "boolean" | "null";

export interface CompareOptions {
  /** Diff object children in sorted key order instead of left-document order. */
  ignoreKeyOrder: boolean;
  /** Match array elements by content or inferred identity instead of by index. */
  ignoreArrayOrder: boolean;
  /** When false, primitives of different types are equal if their string renderings match. */
  strictType: boolean;
}

export type DiffType = "added" | "removed" | "modified" | "unchanged";

export interface DiffItem {
  /** Location in the left document; for `added` items, in the right document. */
  readonly path: readonly string[];
  /** Location of `rightValue` in the right document. Set whenever `rightValue` is. */
  readonly rightPath?: readonly string[];
  readonly type: DiffType;
  readonly key?: string;
  readonly leftValue?: JsonValue;
  readonly rightValue?: JsonValue;
  readonly children: readonly DiffItem[];
  readonly depth: number;
}

export interface SerializedDiffEntry {
  path: string;
  type: DiffType;
  left?: JsonValue;
  right?: JsonValue;
}

export interface DiffSummary {
  added: number;
  removed: number;
  modified: number;
  total: number;
}

export type CompareSide = "left" | "right";

export type RenderLineKind =
  | { type: "content"; diffType: DiffType }
  | { type: "padding" }
  | { type: "collapse"; sectionIndex: number; hiddenLineCount: number };

export interface RenderLine {
  /** Line index in the pretty-printed text, or -1 for padding. */
  lineIndex: number;
  kind: RenderLineKind;
  text: string;
}

export interface DiffLocation {
  renderLineIndex: number;
  diffType: DiffType;
}

export interface CollapseSection {
  sectionIndex: number;
  /** Index of the first hidden row in the paired sequence. */
  startLine: number;
  lineCount: number;
  expanded: boolean;
}

export interface LineSpan {
  start: number;
  end: number;
}

export interface FormattedText {
  text: string;
  /** False when the input could not be parsed and was passed through as-is. */
  formatted: boolean;
  /** JSON Pointer -> line span of the value (from its key line when it has one). */
  spans: ReadonlyMap<string, LineSpan>;
}

export interface RenderConfig {
  /** Unchanged lines kept visible on each side of a differing line. */
  contextLines: number;
  /** Cap applied to both panes after pairing and collapsing. */
  maxDisplayLines: number;
}

export interface RenderResult {
  leftLines: RenderLine[];
  rightLines: RenderLine[];
  diffLocations: DiffLocation[];
  totalLines: number;
  truncated: boolean;
  sections: CollapseSection[];
  leftFormatted: FormattedText;
  rightFormatted: FormattedText;
}

export type JsonTokenType =
  | "key"
  | "string"
  | "number"
  | "boolean"
  | "null"
  | "structure"
  | "whitespace";

export interface JsonToken {
  text: string;
  type: JsonTokenType;
}

export interface DiffTheme {
  name: string;
  key: string;
  string: string;
  number: string;
  boolean: string;
  null: string;
  structure: string;
  secondaryText: string;
  diffAddedBg: string;
  diffRemovedBg: string;
  diffModifiedBg: string;
  diffPaddingBg: string;
  diffAddedGutter: string;
  diffRemovedGutter: string;
  diffModifiedGutter: string;
}

export interface StyledSpan {
  text: string;
  tokenType?: JsonTokenType;
  foreground?: string;
  background?: string;
  muted?: boolean;
}

export interface StyledLine {
  kind: RenderLineKind["type"];
  spans: StyledSpan[];
}

export interface GutterMark {
  symbol: string;
  diffType?: Exclude<DiffType, "unchanged">;
  color?: string;
}
