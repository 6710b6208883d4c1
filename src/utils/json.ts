/**
 * @file src/utils/json.ts
 * @description Lossless JSON read/write for record payloads.
 *
 * Numbers are kept as `LosslessNumber`, so a 64-bit ID, `1.10` or `1e400`
 * is written back with the digits it was read with.
 */

import { isLosslessNumber, parse, stringify } from "lossless-json";
import type { JSONNumber, JSONValue } from "../types";

/** True for number leaves in either representation */
export function isJSONNumber(value: unknown): value is JSONNumber {
  return typeof value === "number" || isLosslessNumber(value);
}

function isPlainObject(value: object): boolean {
  return Object.getPrototypeOf(value) === Object.prototype;
}

/**
 * Walks the parsed tree with an explicit stack. Objects whose prototype
 * was replaced through a `"__proto__"` member are rejected.
 */
export function isJSONValue(value: unknown): value is JSONValue {
  const pending: unknown[] = [value];

  while (pending.length) {
    const item = pending.pop();
    if (item === null || typeof item === "string" || typeof item === "boolean") continue;
    if (typeof item === "number") {
      if (!Number.isFinite(item)) return false;
      continue;
    }
    if (isJSONNumber(item)) continue;
    if (Array.isArray(item)) {
      for (const element of item) pending.push(element);
      continue;
    }
    if (typeof item === "object" && isPlainObject(item)) {
      for (const member of Object.values(item)) pending.push(member);
      continue;
    }
    return false;
  }
  return true;
}

/**
 * @throws SyntaxError on malformed text, duplicate keys with different
 * values, or a `"__proto__"` member holding an object
 */
export function parseJSON(text: string): JSONValue {
  const value: unknown = parse(text);
  if (!isJSONValue(value)) {
    throw new SyntaxError("JSON text uses an unsupported construct");
  }
  return value;
}

/** Compact single-line serialization; numbers keep their source digits */
export function serializeJSON(value: JSONValue): string {
  const text = stringify(value);
  if (text === undefined) {
    throw new TypeError("Value has no JSON representation");
  }
  return text;
}
