import type { JsonArray, JsonObject, JsonPrimitive, JsonType, JsonValue } from "../types";

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJsonArray(value: JsonValue | undefined): value is JsonArray {
  return Array.isArray(value);
}

export function isContainer(value: JsonValue): value is JsonObject | JsonArray {
  return typeof value === "object" && value !== null;
}

export function isPrimitive(value: JsonValue): value is JsonPrimitive {
  return !isContainer(value);
}

export function jsonTypeOf(value: JsonValue): JsonType {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  switch (typeof value) {
    case "string":
      return "string";
    case "number":
      return "number";
    case "boolean":
      return "boolean";
    default:
      return "object";
  }
}

/** Own member lookup; names like `constructor` never resolve through the prototype. */
export function ownMember(object: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(object, key) ? object[key] : undefined;
}

export function isSameType(left: JsonValue, right: JsonValue): boolean {
  return jsonTypeOf(left) === jsonTypeOf(right);
}

/**
 * Returns a copy of the value with object keys sorted recursively.
 * Integer-like keys still enumerate first, as they do for every JS object.
 */
export function sortKeysDeep(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (!isJsonObject(value)) {
    return value;
  }
  // fromEntries keeps "__proto__" as an own member
  return Object.fromEntries(
    Object.keys(value)
      .sort()
      .flatMap((key): [string, JsonValue][] => {
        const child = ownMember(value, key);
        return child === undefined ? [] : [[key, sortKeysDeep(child)]];
      }),
  );
}

/**
 * Compact JSON with keys emitted in sorted order at every level. Used as the
 * content hash for array element matching.
 */
export function canonicalStringify(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalStringify).join(",")}]`;
  }
  if (isJsonObject(value)) {
    const members: string[] = [];
    for (const key of Object.keys(value).sort()) {
      const child = value[key];
      if (child !== undefined) {
        members.push(`${JSON.stringify(key)}:${canonicalStringify(child)}`);
      }
    }
    return `{${members.join(",")}}`;
  }
  return JSON.stringify(value);
}

function renderNumber(value: number): string {
  if (Number.isInteger(value)) {
    // BigInt keeps every digit where String() would switch to exponent form.
    return BigInt(value).toString();
  }
  return String(value);
}

/**
 * String form used for loose (non-strict) equality and for matching-key
 * identity. Strings render without quotes.
 */
export function primitiveToString(value: JsonValue): string {
  if (value === null) return "null";
  switch (typeof value) {
    case "string":
      return value;
    case "number":
      return renderNumber(value);
    case "boolean":
      return value ? "true" : "false";
    default:
      return canonicalStringify(value);
  }
}

/**
 * The way a primitive appears in pretty-printed JSON text (strings quoted and
 * escaped). Containers have no single-line form and yield undefined.
 */
export function primitiveToJsonText(value: JsonValue): string | undefined {
  if (isContainer(value)) return undefined;
  return JSON.stringify(value);
}
