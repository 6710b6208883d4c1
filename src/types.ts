/* ------------------------------------------------------------------
 * types.ts · shared types for rawscrub
 * ------------------------------------------------------------------ */

import type { LosslessNumber } from "lossless-json";

/**
 * A JSON number. Records read from disk carry `LosslessNumber`, which
 * keeps the source digits (`12345678901234567890`, `1.10`, `1e400`);
 * plain numbers come from callers building values in code.
 */
export type JSONNumber = number | LosslessNumber;

/**
 * Represents any valid JSON value as produced by `parseJSON`.
 *
 * @example
 * ```typescript
 * const doc: JSONValue = { id: "u_1", tags: [], nested: { ok: true } };
 * ```
 *
 * @remarks
 * `undefined`, functions, symbols and BigInt are excluded, so every value
 * round-trips through `serializeJSON` unchanged.
 */
export type JSONValue =
  | string
  | JSONNumber
  | boolean
  | null
  | JSONValue[]
  | { [key: string]: JSONValue };

export type JSONObject = { [key: string]: JSONValue };

/** Leaf values; the only values the anonymizer ever sees */
export type JSONScalar = string | JSONNumber | boolean | null;

/**
 * Closed tagged view of a JSON value. Dispatch switches over `kind`
 * so the compiler checks that every kind is handled.
 */
export type JSONNode =
  | { kind: "object"; value: JSONObject }
  | { kind: "array"; value: JSONValue[] }
  | { kind: "string"; value: string }
  | { kind: "number"; value: JSONNumber }
  | { kind: "boolean"; value: boolean }
  | { kind: "null"; value: null };

export type JSONKind = JSONNode["kind"];

export type ScalarKind = Exclude<JSONKind, "object" | "array">;

/** Processing modes accepted on the command line */
export type ProcessingMode = "extract" | "scrub" | "structure";

/** Modes that run the structural walker */
export type TransformMode = Exclude<ProcessingMode, "extract">;

/** Digest algorithm for preserved IDs */
export type HashAlgo = "blake3" | "sha256";

export type LogLevel = "error" | "warn" | "info" | "verbose" | "debug";

/** Sensitive-data shapes recognised by the pattern matchers */
export type PatternKind = "email" | "url" | "ipv4" | "phone";

export type Placeholders = Record<PatternKind, string>;

/** Frozen policy handed to the walker and anonymizer */
export interface AnonymizationPolicy {
  mode: TransformMode;

  /** Replace ID-like fields with a stable digest (scrub only) */
  preserveIds: boolean;

  /** Keep generic text length with filler characters (default: true) */
  preserveLengths: boolean;

  /** Hex characters kept from the ID digest (default: 8) */
  digestLength: number;

  /** Algorithm used for ID digests (default: 'blake3') */
  hashAlgo: HashAlgo;

  /** Single character used for generic text (default: 'X') */
  fillerChar: string;

  /** Case-insensitive substring marking a key as an ID field (default: 'id') */
  idKeyword: string;

  placeholders: Placeholders;

  /** Deepest nesting level walked before a record is rejected */
  maxDepth: number;
}

/* ------------------------------------------------------------------
 * Run reporting
 * ------------------------------------------------------------------ */

/** Counter values captured at the end of a run */
export interface RunStats {
  totalRecords: number;
  validRecords: number;
  invalidRecords: number;
  /** Empty or whitespace-only input lines, skipped before parsing */
  blankLines: number;
  strings: number;
  numbers: number;
  booleans: number;
  nulls: number;
  emptyArrays: number;
  emptyObjects: number;
}

export interface RunReport {
  mode: ProcessingMode;
  inputFile: string;
  outputFile: string;
  stats: RunStats;
  /** First serialized output lines, for the operator summary */
  samplePreview: string[];
}
