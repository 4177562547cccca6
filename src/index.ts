export {JsonDiffEngine, compare} from "./core/JsonDiffEngine"
export {hasDiff} from "./core/diff-items"
export {inferMatchingKey, isValidMatchingKey} from "./core/arrayDiffAlgorithms"
export {DiffResult, jsonPointer} from "./aggregators/DiffResult"

export {render, pairLines, applyCollapse, buildDiffLocations, collapseText} from "./formatting/DiffRenderer"
export {prettyPrint, formatValue} from "./formatting/prettyPrint"
export {annotateLines} from "./formatting/lineAnnotations"
export {tokenizeLine} from "./formatting/tokenizer"
export {buildStyledLines, buildGutter, backgroundFor, defaultTheme, darkTheme} from "./formatting/styles"
export {renderSideBySide, fitToWidth} from "./formatting/terminal"
export type {SideBySideOptions} from "./formatting/terminal"

export {parseJson, parseJsonOrThrow} from "./modules/parsers/jsonc-parser"
export type {ParseOutcome} from "./modules/parsers/jsonc-parser"
export {JsonParseError} from "./errors"
export type {JsonErrorPosition} from "./errors"

export {
  DEFAULT_COMPARE_OPTIONS,
  DEFAULT_RENDER_CONFIG,
  DEFAULT_INDENT_WIDTH,
  MIN_INDENT_WIDTH,
  MAX_INDENT_WIDTH,
  PREFERRED_MATCHING_KEYS,
  resolveCompareOptions,
  resolveRenderConfig,
  resolveIndentWidth,
} from "./config"

export {
  isJsonObject,
  isJsonArray,
  isContainer,
  isPrimitive,
  jsonTypeOf,
  sortKeysDeep,
  canonicalStringify,
  primitiveToString,
} from "./value/json-value"
export {deepEqual} from "./utils/deep-equal"
export {joinPath, splitPath, escapeJsonPointer, unescapeJsonPointer} from "./utils/path-utils"

export {PerformanceTracker} from "./performance/tracker"
export type {PerformanceEntry, PerformanceSummary} from "./performance/tracker"

export {CompareSession} from "./session/CompareSession"
export type {CompareSessionInit, CompareSnapshot, CompareSessionListener} from "./session/CompareSession"

export type {
  JsonValue,
  JsonObject,
  JsonArray,
  JsonPrimitive,
  JsonType,
  CompareOptions,
  DiffType,
  DiffItem,
  SerializedDiffEntry,
  DiffSummary,
  CompareSide,
  RenderLineKind,
  RenderLine,
  DiffLocation,
  CollapseSection,
  LineSpan,
  FormattedText,
  RenderConfig,
  RenderResult,
  JsonTokenType,
  JsonToken,
  DiffTheme,
  StyledSpan,
  StyledLine,
  GutterMark,
} from "./types"
