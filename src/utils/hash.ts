/* ------------------------------------------------------------------
 * hash.ts  •  Stable digests for preserved ID fields
 * ------------------------------------------------------------------
 *  ▸ digest(str, algo)        – BLAKE3 (default) or SHA-256 hex digest
 *  ▸ digestId(str, policy)    – digest truncated to policy.digestLength
 *
 *  Notes
 *  -----
 *  • No salt and no clock input: the same ID maps to the same digest in
 *    every run, so anonymized exports can still be joined on it.
 *  • SHA-256 path uses Node's built-in crypto
 * ------------------------------------------------------------------ */

import { createHash as createNodeHash } from "node:crypto";
import { blake3 } from "@napi-rs/blake-hash";

import type { AnonymizationPolicy, HashAlgo } from "../types";

export function digest(payload: string, algo: HashAlgo = "blake3"): string {
  if (algo === "blake3") {
    // @napi-rs/blake-hash returns a Buffer → hex string
    return blake3(payload).toString("hex");
  }
  return createNodeHash("sha256").update(payload, "utf8").digest("hex");
}

export function digestId(
  value: string,
  policy: Pick<AnonymizationPolicy, "hashAlgo" | "digestLength">
): string {
  return digest(value, policy.hashAlgo).slice(0, policy.digestLength);
}
