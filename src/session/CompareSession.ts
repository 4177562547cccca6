import type { DiffResult } from "../aggregators/DiffResult";
import { resolveCompareOptions, resolveIndentWidth, resolveRenderConfig } from "../config";
import { compare } from "../core/JsonDiffEngine";
import type { JsonParseError } from "../errors";
import { render } from "../formatting/DiffRenderer";
import { parseJson } from "../modules/parsers/jsonc-parser";
import type { PerformanceTracker } from "../performance/tracker";
import type { CompareOptions, DiffLocation, RenderConfig, RenderResult } from "../types";

export interface CompareSessionInit {
  leftText?: string;
  rightText?: string;
  options?: Partial<CompareOptions>;
  indentWidth?: number;
  renderConfig?: Partial<RenderConfig>;
  tracker?: PerformanceTracker;
}

export interface CompareSnapshot {
  /** Incremented on every recomputation; consumers drop results older than the latest. */
  version: number;
  leftText: string;
  rightText: string;
  options: CompareOptions;
  indentWidth: number;
  expandedSections: readonly number[];
  leftError?: JsonParseError;
  rightError?: JsonParseError;
  /** Absent while either side fails to parse. */
  diffResult?: DiffResult;
  renderResult?: RenderResult;
}

export type CompareSessionListener = (snapshot: CompareSnapshot) => void;

/**
 * Owns the inputs of one side-by-side comparison. Every change recomputes the
 * result in full and notifies subscribers synchronously.
 */
export class CompareSession {
  private leftText: string;
  private rightText: string;
  private options: CompareOptions;
  private indentWidth: number;
  private readonly renderConfig: RenderConfig;
  private readonly tracker?: PerformanceTracker;
  private readonly expandedSections = new Set<number>();
  private readonly subscribers = new Set<CompareSessionListener>();
  private current: CompareSnapshot;

  constructor(init: CompareSessionInit = {}) {
    this.leftText = init.leftText ?? "";
    this.rightText = init.rightText ?? "";
    this.options = resolveCompareOptions(init.options);
    this.indentWidth = resolveIndentWidth(init.indentWidth);
    this.renderConfig = resolveRenderConfig(init.renderConfig);
    this.tracker = init.tracker;
    this.current = this.recompute(0);
  }

  snapshot(): CompareSnapshot {
    return this.current;
  }

  subscribe(listener: CompareSessionListener): () => void {
    this.subscribers.add(listener);
    return () => {
      this.subscribers.delete(listener);
    };
  }

  setLeftText(text: string): CompareSnapshot {
    this.leftText = text;
    this.expandedSections.clear();
    return this.update();
  }

  setRightText(text: string): CompareSnapshot {
    this.rightText = text;
    this.expandedSections.clear();
    return this.update();
  }

  setOptions(options: Partial<CompareOptions>): CompareSnapshot {
    this.options = resolveCompareOptions({ ...this.options, ...options });
    this.expandedSections.clear();
    return this.update();
  }

  setIndentWidth(indentWidth: number): CompareSnapshot {
    this.indentWidth = resolveIndentWidth(indentWidth);
    this.expandedSections.clear();
    return this.update();
  }

  toggleSection(sectionIndex: number): CompareSnapshot {
    if (this.expandedSections.has(sectionIndex)) {
      this.expandedSections.delete(sectionIndex);
    } else {
      this.expandedSections.add(sectionIndex);
    }
    return this.update();
  }

  expandAll(): CompareSnapshot {
    for (const section of this.current.renderResult?.sections ?? []) {
      this.expandedSections.add(section.sectionIndex);
    }
    return this.update();
  }

  collapseAll(): CompareSnapshot {
    this.expandedSections.clear();
    return this.update();
  }

  /** First difference after `fromLine`, wrapping to the top. */
  nextDiff(fromLine: number): DiffLocation | undefined {
    const locations = this.current.renderResult?.diffLocations ?? [];
    return locations.find((location) => location.renderLineIndex > fromLine) ?? locations[0];
  }

  /** Last difference before `fromLine`, wrapping to the bottom. */
  previousDiff(fromLine: number): DiffLocation | undefined {
    const locations = this.current.renderResult?.diffLocations ?? [];
    const before = locations.filter((location) => location.renderLineIndex < fromLine);
    return before[before.length - 1] ?? locations[locations.length - 1];
  }

  private update(): CompareSnapshot {
    this.current = this.recompute(this.current.version + 1);
    this.emit(this.current);
    return this.current;
  }

  private emit(snapshot: CompareSnapshot) {
    for (const listener of this.subscribers) {
      try {
        listener(snapshot);
      } catch (error) {
        console.error("Compare session listener failed:", error);
      }
    }
  }

  private measure<T>(label: string, fn: () => T): T {
    return this.tracker ? this.tracker.measure(label, fn) : fn();
  }

  private recompute(version: number): CompareSnapshot {
    const base = {
      version,
      leftText: this.leftText,
      rightText: this.rightText,
      options: this.options,
      indentWidth: this.indentWidth,
      expandedSections: [...this.expandedSections].sort((a, b) => a - b),
    };

    const left = this.measure("parse", () => parseJson(this.leftText));
    const right = this.measure("parse", () => parseJson(this.rightText));
    if (!left.ok || !right.ok) {
      return {
        ...base,
        leftError: left.ok ? undefined : left.error,
        rightError: right.ok ? undefined : right.error,
      };
    }

    const diffResult = this.measure("compare", () => compare(left.value, right.value, this.options));
    const renderResult = this.measure("render", () =>
      render(this.leftText, this.rightText, diffResult, this.expandedSections, this.indentWidth, this.renderConfig),
    );

    return { ...base, diffResult, renderResult };
  }
}
