import type { DiffTheme, DiffType, GutterMark, RenderLine, StyledLine, StyledSpan } from "../types";
import { tokenizeLine } from "./tokenizer";

export const defaultTheme: DiffTheme = {
  name: "light",
  key: "#0451a5",
  string: "#a31515",
  number: "#098658",
  boolean: "#0000ff",
  null: "#795e26",
  structure: "#333333",
  secondaryText: "#8a8a8a",
  diffAddedBg: "#e6ffec",
  diffRemovedBg: "#ffebe9",
  diffModifiedBg: "#fff8c5",
  diffPaddingBg: "#f0f0f0",
  diffAddedGutter: "#2da44e",
  diffRemovedGutter: "#cf222e",
  diffModifiedGutter: "#bf8700",
};

export const darkTheme: DiffTheme = {
  name: "dark",
  key: "#9cdcfe",
  string: "#ce9178",
  number: "#b5cea8",
  boolean: "#569cd6",
  null: "#c586c0",
  structure: "#d4d4d4",
  secondaryText: "#808080",
  diffAddedBg: "#12261e",
  diffRemovedBg: "#2d1517",
  diffModifiedBg: "#2b2611",
  diffPaddingBg: "#1e1e1e",
  diffAddedGutter: "#3fb950",
  diffRemovedGutter: "#f85149",
  diffModifiedGutter: "#d29922",
};

export function backgroundFor(diffType: DiffType, theme: DiffTheme): string | undefined {
  switch (diffType) {
    case "added":
      return theme.diffAddedBg;
    case "removed":
      return theme.diffRemovedBg;
    case "modified":
      return theme.diffModifiedBg;
    case "unchanged":
      return undefined;
  }
}

function gutterColorFor(diffType: Exclude<DiffType, "unchanged">, theme: DiffTheme): string {
  switch (diffType) {
    case "added":
      return theme.diffAddedGutter;
    case "removed":
      return theme.diffRemovedGutter;
    case "modified":
      return theme.diffModifiedGutter;
  }
}

/**
 * Turns already-computed render lines into coloured spans. Pure, so a theme
 * change only needs this step, not a new diff.
 */
export function buildStyledLines(lines: readonly RenderLine[], theme: DiffTheme = defaultTheme): StyledLine[] {
  return lines.map((line): StyledLine => {
    switch (line.kind.type) {
      case "content": {
        const background = backgroundFor(line.kind.diffType, theme);
        const spans = tokenizeLine(line.text).map((token): StyledSpan => {
          const span: StyledSpan = { text: token.text, tokenType: token.type };
          if (token.type !== "whitespace") span.foreground = theme[token.type];
          if (background) span.background = background;
          return span;
        });
        return { kind: "content", spans };
      }
      case "padding":
        return { kind: "padding", spans: [{ text: " ", background: theme.diffPaddingBg }] };
      case "collapse":
        return {
          kind: "collapse",
          spans: [{ text: line.text, foreground: theme.secondaryText, muted: true }],
        };
    }
  });
}

export function buildGutter(lines: readonly RenderLine[], theme: DiffTheme = defaultTheme): GutterMark[] {
  return lines.map((line): GutterMark => {
    if (line.kind.type !== "content" || line.kind.diffType === "unchanged") {
      return { symbol: " " };
    }
    const diffType = line.kind.diffType;
    return { symbol: "▎", diffType, color: gutterColorFor(diffType, theme) };
  });
}
