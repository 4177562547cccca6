import type {DiffResult} from "../aggregators/DiffResult"
import {resolveIndentWidth, resolveRenderConfig} from "../config"
import type {
  CollapseSection,
  DiffLocation,
  DiffType,
  RenderConfig,
  RenderLine,
  RenderResult,
} from "../types"
import {annotateLines} from "./lineAnnotations"
import {prettyPrint} from "./prettyPrint"

export function collapseText(hiddenLineCount: number): string {
  return `··· ${hiddenLineCount} unchanged lines ···`
}

function contentLine(lineIndex: number, text: string, diffType: DiffType): RenderLine {
  return {lineIndex, kind: {type: "content", diffType}, text}
}

function paddingLine(): RenderLine {
  return {lineIndex: -1, kind: {type: "padding"}, text: ""}
}

function differs(line: RenderLine | undefined): DiffType | undefined {
  if (line?.kind.type === "content" && line.kind.diffType !== "unchanged") {
    return line.kind.diffType
  }
  return undefined
}

/**
 * Pairs the two panes index by index; the shorter side is padded so both
 * sequences always have the same length.
 */
export function pairLines(
  leftLines: readonly string[],
  leftDiffs: readonly DiffType[],
  rightLines: readonly string[],
  rightDiffs: readonly DiffType[],
): {left: RenderLine[]; right: RenderLine[]} {
  const left: RenderLine[] = []
  const right: RenderLine[] = []
  const maxCount = Math.max(leftLines.length, rightLines.length)

  for (let i = 0; i < maxCount; i++) {
    const leftText = leftLines[i]
    const rightText = rightLines[i]
    left.push(leftText === undefined ? paddingLine() : contentLine(i, leftText, leftDiffs[i] ?? "unchanged"))
    right.push(rightText === undefined ? paddingLine() : contentLine(i, rightText, rightDiffs[i] ?? "unchanged"))
  }

  return {left, right}
}

/**
 * Keeps `contextLines` rows around every differing row and folds each maximal
 * run of remaining rows into one collapse marker per side, unless that run's
 * section index is expanded. Sections are numbered in scan order from 0,
 * expanded or not.
 */
export function applyCollapse(
  leftLines: readonly RenderLine[],
  rightLines: readonly RenderLine[],
  expandedSections: ReadonlySet<number>,
  contextLines: number,
): {left: RenderLine[]; right: RenderLine[]; sections: CollapseSection[]} {
  const count = Math.min(leftLines.length, rightLines.length)
  const visible = new Array<boolean>(count).fill(false)

  for (let i = 0; i < count; i++) {
    if (differs(leftLines[i]) === undefined && differs(rightLines[i]) === undefined) continue
    const start = Math.max(0, i - contextLines)
    const end = Math.min(count - 1, i + contextLines)
    for (let j = start; j <= end; j++) {
      visible[j] = true
    }
  }

  const left: RenderLine[] = []
  const right: RenderLine[] = []
  const sections: CollapseSection[] = []
  let i = 0

  while (i < count) {
    const leftLine = leftLines[i]
    const rightLine = rightLines[i]
    if (visible[i] && leftLine && rightLine) {
      left.push(leftLine)
      right.push(rightLine)
      i++
      continue
    }

    const startLine = i
    while (i < count && !visible[i]) i++
    const lineCount = i - startLine
    const sectionIndex = sections.length
    const expanded = expandedSections.has(sectionIndex)
    sections.push({sectionIndex, startLine, lineCount, expanded})

    if (expanded) {
      left.push(...leftLines.slice(startLine, i))
      right.push(...rightLines.slice(startLine, i))
    } else {
      const marker: RenderLine = {
        lineIndex: startLine,
        kind: {type: "collapse", sectionIndex, hiddenLineCount: lineCount},
        text: collapseText(lineCount),
      }
      left.push(marker)
      right.push({...marker, kind: {...marker.kind}})
    }
  }

  return {left, right, sections}
}

/** One location per row that differs on either side; the left side's type wins. */
export function buildDiffLocations(
  leftLines: readonly RenderLine[],
  rightLines: readonly RenderLine[],
): DiffLocation[] {
  const locations: DiffLocation[] = []
  for (const [i, line] of leftLines.entries()) {
    const diffType = differs(line) ?? differs(rightLines[i])
    if (diffType !== undefined) {
      locations.push({renderLineIndex: i, diffType})
    }
  }
  return locations
}

/**
 * Builds both panes of the side-by-side view. Never throws: text that does
 * not parse is shown as-is and annotated on a best-effort basis.
 */
export function render(
  leftText: string,
  rightText: string,
  diffResult: DiffResult,
  expandedSections: Iterable<number> = [],
  indentWidth?: number,
  config?: Partial<RenderConfig>,
): RenderResult {
  const {contextLines, maxDisplayLines} = resolveRenderConfig(config)
  const indent = resolveIndentWidth(indentWidth)

  // 1. Pretty-print both sides independently
  const leftFormatted = prettyPrint(leftText, indent)
  const rightFormatted = prettyPrint(rightText, indent)
  const leftSource = leftFormatted.text.split("\n")
  const rightSource = rightFormatted.text.split("\n")

  // 2. Line-level annotations
  const leftDiffs = annotateLines(leftSource, leftFormatted, diffResult, "left")
  const rightDiffs = annotateLines(rightSource, rightFormatted, diffResult, "right")

  // 3. Pair with padding
  const paired = pairLines(leftSource, leftDiffs, rightSource, rightDiffs)

  // 4. Collapse unchanged runs
  const collapsed = applyCollapse(paired.left, paired.right, new Set(expandedSections), contextLines)

  // 5. Same cap on both sides keeps them equal length
  const leftLines = collapsed.left.slice(0, maxDisplayLines)
  const rightLines = collapsed.right.slice(0, maxDisplayLines)

  return {
    leftLines,
    rightLines,
    diffLocations: buildDiffLocations(leftLines, rightLines),
    totalLines: leftLines.length,
    truncated: collapsed.left.length > maxDisplayLines,
    sections: collapsed.sections,
    leftFormatted,
    rightFormatted,
  }
}
