import type { JsonToken } from "../types";

const STRUCTURE_CHARS = new Set(["{", "}", "[", "]", ":", ","]);
const NUMBER_START = /^-?\d/;
const NUMBER_CHARS = /^[-+0-9.eE]+/;
const LITERALS: ReadonlyArray<[string, JsonToken["type"]]> = [
  ["true", "boolean"],
  ["false", "boolean"],
  ["null", "null"],
];

/** Index just past the closing quote, or the line length when unterminated. */
function findStringEnd(line: string, start: number): number {
  let escaped = false;
  for (let i = start + 1; i < line.length; i++) {
    const char = line[i];
    if (escaped) {
      escaped = false;
    } else if (char === "\\") {
      escaped = true;
    } else if (char === '"') {
      return i + 1;
    }
  }
  return line.length;
}

/**
 * Splits one line of pretty-printed JSON into coloured token classes. A
 * string is a key when the next non-space character is a colon. Anything
 * unrecognised becomes a one-character structure token.
 */
export function tokenizeLine(line: string): JsonToken[] {
  const tokens: JsonToken[] = [];
  let pos = 0;

  while (pos < line.length) {
    const rest = line.slice(pos);
    const char = rest.charAt(0);

    const whitespace = /^[ \t]+/.exec(rest);
    if (whitespace) {
      tokens.push({ text: whitespace[0], type: "whitespace" });
      pos += whitespace[0].length;
      continue;
    }

    if (STRUCTURE_CHARS.has(char)) {
      tokens.push({ text: char, type: "structure" });
      pos += 1;
      continue;
    }

    if (char === '"') {
      const end = findStringEnd(line, pos);
      const isKey = line.slice(end).trimStart().startsWith(":");
      tokens.push({ text: line.slice(pos, end), type: isKey ? "key" : "string" });
      pos = end;
      continue;
    }

    if (NUMBER_START.test(rest)) {
      const number = NUMBER_CHARS.exec(rest);
      if (number) {
        tokens.push({ text: number[0], type: "number" });
        pos += number[0].length;
        continue;
      }
    }

    const literal = LITERALS.find(([text]) => rest.startsWith(text));
    if (literal) {
      tokens.push({ text: literal[0], type: literal[1] });
      pos += literal[0].length;
      continue;
    }

    tokens.push({ text: char, type: "structure" });
    pos += 1;
  }

  return tokens;
}
