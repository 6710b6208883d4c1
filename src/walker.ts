/**
 * @module walker
 * @description Shape-preserving transform over arbitrary JSON values.
 *
 * Objects keep their keys in insertion order, arrays keep their length,
 * and only scalar leaves are replaced (via {@link anonymizeValue}).
 * Empty containers are emitted as fresh `{}` / `[]` and counted.
 */

import { anonymizeValue } from "./anonymizer";
import { DepthLimitError } from "./errors";
import { isJSONNumber } from "./utils/json";
import type { StatsAccumulator } from "./stats";
import type {
  AnonymizationPolicy,
  JSONNode,
  JSONObject,
  JSONValue,
} from "./types";

export function toNode(value: JSONValue): JSONNode {
  if (value === null) return { kind: "null", value };
  if (Array.isArray(value)) return { kind: "array", value };
  if (typeof value === "string") return { kind: "string", value };
  if (isJSONNumber(value)) return { kind: "number", value };
  if (typeof value === "boolean") return { kind: "boolean", value };
  return { kind: "object", value };
}

function assertNever(node: never): never {
  throw new Error(`Unhandled JSON node: ${JSON.stringify(node)}`);
}

function walk(
  value: JSONValue,
  field: string | undefined,
  depth: number,
  policy: Readonly<AnonymizationPolicy>,
  stats: StatsAccumulator | undefined
): JSONValue {
  const node = toNode(value);

  switch (node.kind) {
    case "object": {
      const keys = Object.keys(node.value);
      if (keys.length === 0) {
        stats?.countEmptyObject();
        return {};
      }
      if (depth >= policy.maxDepth) throw new DepthLimitError(policy.maxDepth);

      // fromEntries defines own properties, so a "__proto__" key survives
      const out: JSONObject = Object.fromEntries(
        keys.map((key): [string, JSONValue] => [
          key,
          walk(node.value[key], key, depth + 1, policy, stats),
        ])
      );
      return out;
    }

    case "array": {
      if (node.value.length === 0) {
        stats?.countEmptyArray();
        return [];
      }
      if (depth >= policy.maxDepth) throw new DepthLimitError(policy.maxDepth);

      // elements inherit the array's own field context
      return node.value.map((item) => walk(item, field, depth + 1, policy, stats));
    }

    case "string":
    case "number":
    case "boolean":
    case "null":
      stats?.countScalar(node.kind);
      return anonymizeValue(node.value, field, policy);

    default:
      return assertNever(node);
  }
}

/**
 * Rebuild `value` with every scalar passed through the anonymizer.
 *
 * @param stats - optional accumulator; scalars and empty containers are counted
 * @throws DepthLimitError when nesting exceeds `policy.maxDepth`
 *
 * @example
 * ```typescript
 * transform({ email: "a@b.io", tags: [] }, defaultPolicy("structure"))
 * // { email: "[STRING]", tags: [] }
 * ```
 */
export function transform(
  value: JSONValue,
  policy: Readonly<AnonymizationPolicy>,
  stats?: StatsAccumulator
): JSONValue {
  return walk(value, undefined, 0, policy, stats);
}
