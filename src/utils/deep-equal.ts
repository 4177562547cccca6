import type { JsonValue } from "../types";
import { isJsonObject } from "../value/json-value";

/**
 * Structural, type-sensitive equality of two JSON values. Object key order is
 * ignored; array order is not.
 */
export function deepEqual(obj1: JsonValue | undefined, obj2: JsonValue | undefined): boolean {
  if (obj1 === obj2) return true;
  if (obj1 === undefined || obj2 === undefined) return false;

  let i: number;
  let length: number;

  if (Array.isArray(obj1) && Array.isArray(obj2)) {
    length = obj1.length;
    if (length !== obj2.length) return false;
    for (i = length; i-- !== 0; )
      if (!deepEqual(obj1[i], obj2[i])) return false;
    return true;
  }

  if (isJsonObject(obj1) && isJsonObject(obj2)) {
    const keys = Object.keys(obj1);
    length = keys.length;

    if (length !== Object.keys(obj2).length) return false;

    for (i = length; i-- !== 0; ) {
      const currentKey = keys[i];
      if (currentKey === undefined || !Object.hasOwn(obj2, currentKey))
        return false;
    }

    for (i = length; i-- !== 0; ) {
      const key = keys[i];
      if (key === undefined || !deepEqual(obj1[key], obj2[key]))
        return false;
    }

    return true;
  }

  return false;
}
