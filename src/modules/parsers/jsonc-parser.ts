import * as JSONC from "jsonc-parser";
import type { Node } from "jsonc-parser";
import { JsonParseError, type JsonErrorPosition } from "../../errors";
import type { JsonValue } from "../../types";

export type ParseOutcome =
  | { ok: true; value: JsonValue }
  | { ok: false; error: JsonParseError };

const STRICT_OPTIONS: JSONC.ParseOptions = {
  disallowComments: true,
  allowTrailingComma: false,
  allowEmptyContent: false,
};

function getLineAndCharacter(text: string, offset: number): JsonErrorPosition {
  let line = 1;
  let column = 1;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text[i] === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { offset, line, column };
}

/**
 * Strict JSON parse: comments, trailing commas and empty input are errors.
 * Only the first error is reported.
 */
export function parseJson(text: string): ParseOutcome {
  if (text.trim() === "") {
    return {
      ok: false,
      error: new JsonParseError("Empty document", getLineAndCharacter(text, text.length)),
    };
  }

  const errors: JSONC.ParseError[] = [];
  const root: Node | undefined = JSONC.parseTree(text, errors, STRICT_OPTIONS);
  const first = errors[0];

  if (first) {
    return {
      ok: false,
      error: new JsonParseError(
        `Invalid JSON (${JSONC.printParseErrorCode(first.error)})`,
        getLineAndCharacter(text, first.offset),
      ),
    };
  }

  if (!root) {
    return {
      ok: false,
      error: new JsonParseError("Empty document", getLineAndCharacter(text, text.length)),
    };
  }

  const value: JsonValue = JSONC.getNodeValue(root);
  return { ok: true, value };
}

export function parseJsonOrThrow(text: string): JsonValue {
  const outcome = parseJson(text);
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}
