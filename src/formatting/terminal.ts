import chalk, { Chalk, type ChalkInstance, type ColorSupportLevel } from "chalk";
import type { DiffTheme, RenderLine, RenderResult } from "../types";
import { buildGutter, buildStyledLines, defaultTheme } from "./styles";

export interface SideBySideOptions {
  /** Characters per pane, excluding gutter and line numbers. */
  width?: number;
  lineNumbers?: boolean;
  theme?: DiffTheme;
  /** Overrides the detected terminal colour support; 0 disables colour. */
  colorLevel?: ColorSupportLevel;
}

const SEPARATOR = " │ ";

/** Pads or truncates to `width` code points. */
export function fitToWidth(text: string, width: number): string {
  const chars = [...text];
  if (chars.length > width) {
    return `${chars.slice(0, Math.max(0, width - 1)).join("")}…`;
  }
  return text + " ".repeat(width - chars.length);
}

function paint(c: ChalkInstance, text: string, foreground?: string, background?: string): string {
  let style = c;
  if (foreground) style = style.hex(foreground);
  if (background) style = style.bgHex(background);
  return style === c ? text : style(text);
}

function renderCell(
  c: ChalkInstance,
  line: RenderLine,
  width: number,
  theme: DiffTheme,
): string {
  // Truncate first, then style
  const fitted: RenderLine = { ...line, text: fitToWidth(line.text, width) };
  if (line.kind.type === "padding") {
    return paint(c, " ".repeat(width), undefined, theme.diffPaddingBg);
  }
  const [styled] = buildStyledLines([fitted], theme);
  return (styled?.spans ?? []).map((span) => paint(c, span.text, span.foreground, span.background)).join("");
}

/**
 * Renders both panes as terminal rows: gutter mark, line number, text, then
 * the same for the right pane after a separator.
 */
export function renderSideBySide(
  result: Pick<RenderResult, "leftLines" | "rightLines">,
  options: SideBySideOptions = {},
): string {
  const width = Math.max(1, options.width ?? 60);
  const theme = options.theme ?? defaultTheme;
  const showNumbers = options.lineNumbers ?? true;
  const c = options.colorLevel === undefined ? chalk : new Chalk({ level: options.colorLevel });

  const maxLineNumber = [...result.leftLines, ...result.rightLines].reduce(
    (max, line) => (line.kind.type === "content" ? Math.max(max, line.lineIndex + 1) : max),
    0,
  );
  const numberWidth = String(maxLineNumber).length;

  const leftGutter = buildGutter(result.leftLines, theme);
  const rightGutter = buildGutter(result.rightLines, theme);

  const side = (line: RenderLine, mark: { symbol: string; color?: string } | undefined): string => {
    const symbol = mark ? paint(c, mark.symbol, mark.color) : " ";
    const number = line.kind.type === "content" ? String(line.lineIndex + 1) : "";
    const prefix = showNumbers ? `${number.padStart(numberWidth)} ` : "";
    return `${symbol}${prefix}${renderCell(c, line, width, theme)}`;
  };

  const rows: string[] = [];
  const rowCount = Math.min(result.leftLines.length, result.rightLines.length);
  for (let i = 0; i < rowCount; i++) {
    const left = result.leftLines[i];
    const right = result.rightLines[i];
    if (!left || !right) continue;
    rows.push(`${side(left, leftGutter[i])}${SEPARATOR}${side(right, rightGutter[i])}`);
  }

  return rows.join("\n");
}
