import type { CompareOptions, RenderConfig } from "./types";

export const DEFAULT_COMPARE_OPTIONS: Readonly<CompareOptions> = Object.freeze({
  ignoreKeyOrder: true,
  ignoreArrayOrder: false,
  strictType: true,
});

export const DEFAULT_RENDER_CONFIG: Readonly<RenderConfig> = Object.freeze({
  contextLines: 3,
  maxDisplayLines: 10_000,
});

export const DEFAULT_INDENT_WIDTH = 4;
export const MIN_INDENT_WIDTH = 1;
export const MAX_INDENT_WIDTH = 8;

/** Keys tried first, in this order, when inferring an array matching key. */
export const PREFERRED_MATCHING_KEYS: readonly string[] = ["id", "_id", "uuid", "key", "name"];

export function resolveCompareOptions(options?: Partial<CompareOptions>): CompareOptions {
  return {
    ignoreKeyOrder: options?.ignoreKeyOrder ?? DEFAULT_COMPARE_OPTIONS.ignoreKeyOrder,
    ignoreArrayOrder: options?.ignoreArrayOrder ?? DEFAULT_COMPARE_OPTIONS.ignoreArrayOrder,
    strictType: options?.strictType ?? DEFAULT_COMPARE_OPTIONS.strictType,
  };
}

function clampInteger(value: number, min: number, max: number, fallback: number): number {
  if (!Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(value)));
}

export function resolveRenderConfig(config?: Partial<RenderConfig>): RenderConfig {
  return {
    contextLines: clampInteger(
      config?.contextLines ?? DEFAULT_RENDER_CONFIG.contextLines,
      0,
      Number.MAX_SAFE_INTEGER,
      DEFAULT_RENDER_CONFIG.contextLines,
    ),
    maxDisplayLines: clampInteger(
      config?.maxDisplayLines ?? DEFAULT_RENDER_CONFIG.maxDisplayLines,
      1,
      Number.MAX_SAFE_INTEGER,
      DEFAULT_RENDER_CONFIG.maxDisplayLines,
    ),
  };
}

export function resolveIndentWidth(indentWidth?: number): number {
  return clampInteger(indentWidth ?? DEFAULT_INDENT_WIDTH, MIN_INDENT_WIDTH, MAX_INDENT_WIDTH, DEFAULT_INDENT_WIDTH);
}
