import { parseJSON, serializeJSON } from "./utils/json";
import type { JSONValue } from "./types";

export const DEFAULT_RAWSTRING_FIELD = "@rawstring";

export type SkipReason =
  | "not-an-object"
  | "missing-field"
  | "not-a-string"
  | "blank"
  | "malformed-json";

export interface SkippedRecord {
  /** Position in the input array */
  index: number;
  reason: SkipReason;
}

export interface ExtractResult {
  values: JSONValue[];
  /** Payload text written to the output, one line each, parallel to `values` */
  payloads: string[];
  valid: number;
  invalid: number;
  skipped: SkippedRecord[];
}

type Unwrapped =
  | { ok: true; value: JSONValue; payload: string }
  | { ok: false; reason: SkipReason };

function unwrap(record: unknown, field: string): Unwrapped {
  if (typeof record !== "object" || record === null || Array.isArray(record)) {
    return { ok: false, reason: "not-an-object" };
  }
  if (!Object.prototype.hasOwnProperty.call(record, field)) {
    return { ok: false, reason: "missing-field" };
  }

  const raw: unknown = Reflect.get(record, field);
  if (typeof raw !== "string") return { ok: false, reason: "not-a-string" };
  if (raw.trim() === "") return { ok: false, reason: "blank" };

  try {
    const value = parseJSON(raw);
    // line breaks can only sit between tokens; only those payloads are re-serialized
    const text = raw.trim();
    const payload = /[\r\n]/.test(text) ? serializeJSON(value) : text;
    return { ok: true, value, payload };
  } catch {
    return { ok: false, reason: "malformed-json" };
  }
}

/**
 * Parse the embedded JSON payload of every wrapper record.
 *
 * Records without a usable payload are dropped and counted; output order
 * follows input order. Never throws for a bad record. `payloads` keeps the
 * trimmed source text so numbers are written back digit for digit.
 *
 * @example
 * ```typescript
 * extract([{ "@rawstring": ' {"a":1.10} ' }, { "@rawstring": "not json" }])
 * // { values: [{ a: LosslessNumber("1.10") }], payloads: ['{"a":1.10}'],
 * //   valid: 1, invalid: 1, skipped: [{ index: 1, reason: "malformed-json" }] }
 * ```
 */
export function extract(
  records: readonly unknown[],
  field: string = DEFAULT_RAWSTRING_FIELD
): ExtractResult {
  const result: ExtractResult = {
    values: [],
    payloads: [],
    valid: 0,
    invalid: 0,
    skipped: [],
  };

  records.forEach((record, index) => {
    const outcome = unwrap(record, field);
    if (outcome.ok) {
      result.values.push(outcome.value);
      result.payloads.push(outcome.payload);
      result.valid++;
    } else {
      result.skipped.push({ index, reason: outcome.reason });
      result.invalid++;
    }
  });

  return result;
}
