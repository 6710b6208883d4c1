/**
 * @module anonymizer
 * @description Replacement values for single JSON scalars.
 *
 * Two policies:
 * - **structure**: every scalar becomes a type placeholder
 *   ("[STRING]", "[NUMBER]", "[BOOLEAN]", "[NULL]")
 * - **scrub**: strings are replaced by category (email, URL, IPv4, phone,
 *   generic text); numbers, booleans and null pass through, numbers
 *   with their original digits
 *
 * Pure functions; statistics are the walker's concern.
 */

import { classifyPattern } from "./matchers";
import { digestId } from "./utils/hash";
import { isJSONNumber } from "./utils/json";
import type {
  AnonymizationPolicy,
  JSONScalar,
  ScalarKind,
} from "./types";

export const TYPE_PLACEHOLDERS: Readonly<Record<ScalarKind, string>> = {
  string: "[STRING]",
  number: "[NUMBER]",
  boolean: "[BOOLEAN]",
  null: "[NULL]",
};

export function scalarKind(value: JSONScalar): ScalarKind {
  if (value === null) return "null";
  if (typeof value === "string") return "string";
  if (isJSONNumber(value)) return "number";
  return "boolean";
}

/**
 * True when the key name contains the policy's ID keyword, ignoring case.
 * "guidance" and "video" match as well.
 */
export function isIdField(
  field: string | undefined,
  policy: Pick<AnonymizationPolicy, "idKeyword">
): boolean {
  if (field === undefined) return false;
  return field.toLowerCase().includes(policy.idKeyword.toLowerCase());
}

/**
 * Generic text replacement: one filler character per character of the
 * input (code points, so surrogate pairs count once).
 */
export function fillText(value: string, fillerChar: string): string {
  return fillerChar.repeat([...value].length);
}

function scrubString(
  value: string,
  field: string | undefined,
  policy: Readonly<AnonymizationPolicy>
): string {
  if (value.trim() === "") return value;

  if (policy.preserveIds && isIdField(field, policy)) {
    return digestId(value, policy);
  }

  const pattern = classifyPattern(value);
  if (pattern) return policy.placeholders[pattern];

  return policy.preserveLengths
    ? fillText(value, policy.fillerChar)
    : TYPE_PLACEHOLDERS.string;
}

/**
 * Replacement for one scalar under the active policy.
 *
 * @param field - key the value sits under; undefined at the top level
 *
 * @example
 * ```typescript
 * const scrub = defaultPolicy("scrub");
 * anonymizeValue("user@corp.io", "email", scrub) // "user@example.com"
 * anonymizeValue("Bob", "name", scrub)           // "XXX"
 * anonymizeValue(42, "age", scrub)               // 42
 * anonymizeValue(42, "age", defaultPolicy("structure")) // "[NUMBER]"
 * ```
 */
export function anonymizeValue(
  value: JSONScalar,
  field: string | undefined,
  policy: Readonly<AnonymizationPolicy>
): JSONScalar {
  if (policy.mode === "structure") {
    return TYPE_PLACEHOLDERS[scalarKind(value)];
  }

  if (typeof value === "string") {
    return scrubString(value, field, policy);
  }
  return value;
}
