export type RawscrubErrorCode =
  | "INPUT_NOT_FOUND"
  | "INPUT_UNREADABLE"
  | "INVALID_JSON"
  | "NOT_AN_ARRAY"
  | "OUTPUT_WRITE_FAILED"
  | "CONFIG_NOT_FOUND"
  | "CONFIG_INVALID"
  | "USAGE";

/**
 * Fatal error: aborts the whole run. Per-record problems never surface
 * as a RawscrubError; they are counted and skipped.
 */
export class RawscrubError extends Error {
  readonly code: RawscrubErrorCode;

  constructor(code: RawscrubErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RawscrubError";
    this.code = code;
  }
}

/** Raised by the walker when a record nests deeper than the policy allows */
export class DepthLimitError extends Error {
  readonly maxDepth: number;

  constructor(maxDepth: number) {
    super(`Document nests deeper than ${maxDepth} levels`);
    this.name = "DepthLimitError";
    this.maxDepth = maxDepth;
  }
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof RawscrubError && error.code === "USAGE") return 2;
  return 1;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
