import type { RunReport, RunStats, ScalarKind } from "./types";

const STAT_KEYS: ReadonlyArray<keyof RunStats> = [
  "totalRecords",
  "validRecords",
  "invalidRecords",
  "blankLines",
  "strings",
  "numbers",
  "booleans",
  "nulls",
  "emptyArrays",
  "emptyObjects",
];

const SCALAR_COUNTER: Record<ScalarKind, keyof RunStats> = {
  string: "strings",
  number: "numbers",
  boolean: "booleans",
  null: "nulls",
};

/**
 * Mutable per-run counters. One accumulator belongs to one pipeline
 * invocation; the walker gets its own per record and the pipeline merges
 * it in once the record succeeds.
 */
export class StatsAccumulator {
  private counts: RunStats = emptyStats();

  countRecord(valid: boolean): void {
    this.counts.totalRecords++;
    if (valid) this.counts.validRecords++;
    else this.counts.invalidRecords++;
  }

  addRecords(valid: number, invalid: number): void {
    this.counts.totalRecords += valid + invalid;
    this.counts.validRecords += valid;
    this.counts.invalidRecords += invalid;
  }

  countBlankLine(): void {
    this.counts.blankLines++;
  }

  countScalar(kind: ScalarKind): void {
    this.counts[SCALAR_COUNTER[kind]]++;
  }

  countEmptyArray(): void {
    this.counts.emptyArrays++;
  }

  countEmptyObject(): void {
    this.counts.emptyObjects++;
  }

  merge(other: StatsAccumulator): void {
    const theirs = other.snapshot();
    for (const key of STAT_KEYS) {
      this.counts[key] += theirs[key];
    }
  }

  snapshot(): RunStats {
    return { ...this.counts };
  }
}

export function emptyStats(): RunStats {
  return {
    totalRecords: 0,
    validRecords: 0,
    invalidRecords: 0,
    blankLines: 0,
    strings: 0,
    numbers: 0,
    booleans: 0,
    nulls: 0,
    emptyArrays: 0,
    emptyObjects: 0,
  };
}

const PREVIEW_WIDTH = 100;
const PREVIEW_LINES = 2;

export function previewLine(line: string): string {
  return line.length > PREVIEW_WIDTH
    ? `${line.slice(0, PREVIEW_WIDTH)}...`
    : line;
}

/** Operator-facing summary printed by the CLI after a run */
export function formatSummary(report: RunReport): string[] {
  const { stats } = report;
  const lines = ["Processing complete!", `Output file: ${report.outputFile}`];

  if (report.mode === "extract") {
    lines.push(
      `Total entries: ${stats.totalRecords}`,
      `Valid rawstrings: ${stats.validRecords}`,
      `Invalid entries: ${stats.invalidRecords}`
    );
  } else {
    lines.push(
      `Total lines processed: ${stats.validRecords}`,
      `Invalid lines: ${stats.invalidRecords}`,
      `Blank lines skipped: ${stats.blankLines}`,
      `String fields: ${stats.strings}`,
      `Number fields: ${stats.numbers}`,
      `Boolean fields: ${stats.booleans}`,
      `Null fields: ${stats.nulls}`,
      `Empty arrays: ${stats.emptyArrays}`,
      `Empty objects: ${stats.emptyObjects}`
    );
  }

  const samples = report.samplePreview.slice(0, PREVIEW_LINES);
  if (samples.length) {
    lines.push("", "Sample preview:");
    samples.forEach((sample, i) => lines.push(`  ${i + 1}. ${previewLine(sample)}`));
  }
  return lines;
}
