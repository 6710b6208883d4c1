import { describe, expect, it } from "vitest";
import { StatsAccumulator, emptyStats, formatSummary, previewLine } from "../../src/stats";
import type { RunReport } from "../../src/types";

describe("stats.ts", () => {
  describe("StatsAccumulator", () => {
    it("should start at zero", () => {
      expect(new StatsAccumulator().snapshot()).toEqual(emptyStats());
    });

    it("should count records by outcome", () => {
      const stats = new StatsAccumulator();
      stats.countRecord(true);
      stats.countRecord(false);
      stats.addRecords(3, 2);
      stats.countBlankLine();

      expect(stats.snapshot()).toMatchObject({
        totalRecords: 7,
        validRecords: 4,
        invalidRecords: 3,
        blankLines: 1,
      });
    });

    it("should merge another accumulator", () => {
      const run = new StatsAccumulator();
      const record = new StatsAccumulator();
      record.countScalar("string");
      record.countScalar("string");
      record.countScalar("null");
      record.countEmptyArray();
      record.countEmptyObject();

      run.merge(record);
      run.merge(record);

      expect(run.snapshot()).toMatchObject({
        strings: 4,
        nulls: 2,
        emptyArrays: 2,
        emptyObjects: 2,
      });
    });

    it("should return detached snapshots", () => {
      const stats = new StatsAccumulator();
      const before = stats.snapshot();
      stats.countScalar("number");

      expect(before.numbers).toBe(0);
      expect(stats.snapshot().numbers).toBe(1);
    });
  });

  describe("previewLine", () => {
    it("should cut long lines at 100 characters", () => {
      expect(previewLine("a".repeat(120))).toBe(`${"a".repeat(100)}...`);
      expect(previewLine("a".repeat(100))).toBe("a".repeat(100));
    });
  });

  describe("formatSummary", () => {
    it("should describe an extract run", () => {
      const report: RunReport = {
        mode: "extract",
        inputFile: "in.json",
        outputFile: "in_rawstring_only.json",
        stats: { ...emptyStats(), totalRecords: 2, validRecords: 1, invalidRecords: 1 },
        samplePreview: ['{"a":1}'],
      };

      expect(formatSummary(report)).toEqual([
        "Processing complete!",
        "Output file: in_rawstring_only.json",
        "Total entries: 2",
        "Valid rawstrings: 1",
        "Invalid entries: 1",
        "",
        "Sample preview:",
        '  1. {"a":1}',
      ]);
    });

    it("should describe a transform run without samples", () => {
      const report: RunReport = {
        mode: "structure",
        inputFile: "in.jsonl",
        outputFile: "in_structure_only.jsonl",
        stats: {
          ...emptyStats(),
          totalRecords: 3,
          validRecords: 3,
          blankLines: 2,
          strings: 5,
          numbers: 2,
          booleans: 1,
          emptyArrays: 1,
        },
        samplePreview: [],
      };

      expect(formatSummary(report)).toEqual([
        "Processing complete!",
        "Output file: in_structure_only.jsonl",
        "Total lines processed: 3",
        "Invalid lines: 0",
        "Blank lines skipped: 2",
        "String fields: 5",
        "Number fields: 2",
        "Boolean fields: 1",
        "Null fields: 0",
        "Empty arrays: 1",
        "Empty objects: 0",
      ]);
    });

    it("should print at most two samples", () => {
      const report: RunReport = {
        mode: "extract",
        inputFile: "in.json",
        outputFile: "out.json",
        stats: emptyStats(),
        samplePreview: ["1", "2", "3"],
      };

      expect(formatSummary(report).slice(-3)).toEqual(["Sample preview:", "  1. 1", "  2. 2"]);
    });
  });
});
