/**
 * Unescapes JSON Pointer special characters
 * ~1 becomes /, ~0 becomes ~
 */
export function unescapeJsonPointer(part: string): string {
  return part.replace(/~1/g, "/").replace(/~0/g, "~");
}

/**
 * Escapes JSON Pointer special characters
 * ~ becomes ~0, / becomes ~1
 */
export function escapeJsonPointer(part: string): string {
  return part.replace(/~/g, "~0").replace(/\//g, "~1");
}

/**
 * Splits a JSON Pointer into its segments, handling escaping
 */
export function splitPath(path: string): string[] {
  if (path === "") return [];
  return path.split("/").slice(1).map(unescapeJsonPointer);
}

/**
 * Joins segments into a JSON Pointer, handling escaping. The root is "".
 */
export function joinPath(parts: readonly string[]): string {
  if (parts.length === 0) return "";
  return `/${parts.map(escapeJsonPointer).join("/")}`;
}

/**
 * Returns a new segment list; the parent list is never mutated, so sibling
 * branches can share it.
 */
export function appendSegment(path: readonly string[], segment: string | number): readonly string[] {
  return [...path, String(segment)];
}
