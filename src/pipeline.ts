import fs from "node:fs/promises";
import path from "node:path";
import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import { DEFAULT_RAWSTRING_FIELD, extract } from "./extractor";
import { DepthLimitError, RawscrubError, errorMessage } from "./errors";
import { StatsAccumulator } from "./stats";
import { transform } from "./walker";
import { parseJSON, serializeJSON } from "./utils/json";
import { log } from "./utils/logger";
import type {
  AnonymizationPolicy,
  JSONValue,
  ProcessingMode,
  RunReport,
} from "./types";

const OUTPUT_SUFFIX: Record<ProcessingMode, string> = {
  extract: "_rawstring_only",
  scrub: "_scrubbed",
  structure: "_structure_only",
};

const EXTRACT_PREVIEW = 3;
const TRANSFORM_PREVIEW = 2;

/** `data/export.json` → `data/export_scrubbed.json` */
export function defaultOutputPath(inputFile: string, mode: ProcessingMode): string {
  const parsed = path.parse(inputFile);
  return path.join(parsed.dir, `${parsed.name}${OUTPUT_SUFFIX[mode]}${parsed.ext}`);
}

function isErrnoError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

async function assertReadable(inputFile: string): Promise<void> {
  try {
    const info = await fs.stat(inputFile);
    if (!info.isFile()) {
      throw new RawscrubError("INPUT_UNREADABLE", `Input is not a file: ${inputFile}`);
    }
  } catch (error) {
    if (error instanceof RawscrubError) throw error;
    if (isErrnoError(error) && error.code === "ENOENT") {
      throw new RawscrubError("INPUT_NOT_FOUND", `Input file not found: ${inputFile}`, {
        cause: error,
      });
    }
    throw new RawscrubError(
      "INPUT_UNREADABLE",
      `Cannot read input file ${inputFile}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

async function readInput(inputFile: string): Promise<string> {
  await assertReadable(inputFile);
  try {
    return await fs.readFile(inputFile, "utf8");
  } catch (error) {
    throw new RawscrubError(
      "INPUT_UNREADABLE",
      `Cannot read input file ${inputFile}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

async function writeLines(outputFile: string, lines: string[]): Promise<void> {
  const body = lines.map((line) => `${line}\n`).join("");
  try {
    await fs.mkdir(path.dirname(path.resolve(outputFile)), { recursive: true });
    await fs.writeFile(outputFile, body, "utf8");
  } catch (error) {
    throw new RawscrubError(
      "OUTPUT_WRITE_FAILED",
      `Cannot write output file ${outputFile}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  log.verbose("Output written", { outputFile, lines: lines.length });
}

/* ------------------------------------------------------------------
 * extract
 * ------------------------------------------------------------------ */

export interface ExtractOptions {
  inputFile: string;
  outputFile?: string;
  rawstringField?: string;
}

export async function runExtract(opts: ExtractOptions): Promise<RunReport> {
  const outputFile = opts.outputFile ?? defaultOutputPath(opts.inputFile, "extract");
  const field = opts.rawstringField ?? DEFAULT_RAWSTRING_FIELD;
  const raw = await readInput(opts.inputFile);

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new RawscrubError(
      "INVALID_JSON",
      `Input file is not valid JSON: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  if (!Array.isArray(data)) {
    throw new RawscrubError("NOT_AN_ARRAY", "Input file must contain a JSON array");
  }

  const result = extract(data, field);
  for (const skip of result.skipped) {
    log.debug("Skipped record", { index: skip.index, reason: skip.reason });
  }

  const lines = result.payloads;
  await writeLines(outputFile, lines);

  const stats = new StatsAccumulator();
  stats.addRecords(result.valid, result.invalid);

  log.info("Extraction finished", {
    total: data.length,
    valid: result.valid,
    invalid: result.invalid,
  });

  return {
    mode: "extract",
    inputFile: opts.inputFile,
    outputFile,
    stats: stats.snapshot(),
    samplePreview: lines.slice(0, EXTRACT_PREVIEW),
  };
}

/* ------------------------------------------------------------------
 * scrub / structure
 * ------------------------------------------------------------------ */

export interface TransformOptions {
  inputFile: string;
  outputFile?: string;
  policy: Readonly<AnonymizationPolicy>;
  /** Each line holds a JSON string whose content is the record */
  rawstring?: boolean;
}

type ParsedLine = { ok: true; value: JSONValue } | { ok: false; reason: string };

export function parseLine(line: string, rawstring: boolean): ParsedLine {
  let value: JSONValue;
  try {
    value = parseJSON(line);
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${errorMessage(error)}` };
  }
  if (!rawstring) return { ok: true, value };

  if (typeof value !== "string") {
    return { ok: false, reason: "expected a JSON string holding a rawstring" };
  }
  try {
    return { ok: true, value: parseJSON(value) };
  } catch (error) {
    return { ok: false, reason: `invalid embedded JSON: ${errorMessage(error)}` };
  }
}

export async function runTransform(opts: TransformOptions): Promise<RunReport> {
  const { policy } = opts;
  const outputFile = opts.outputFile ?? defaultOutputPath(opts.inputFile, policy.mode);
  await assertReadable(opts.inputFile);

  const stats = new StatsAccumulator();
  const lines: string[] = [];
  let lineNum = 0;

  const rl = createInterface({
    input: createReadStream(opts.inputFile, { encoding: "utf8" }),
    crlfDelay: Infinity,
  });

  try {
    for await (const rawLine of rl) {
      lineNum++;
      const line = rawLine.trim();
      if (!line) {
        log.debug(`Skipping blank line ${lineNum}`);
        stats.countBlankLine();
        continue;
      }

      const parsed = parseLine(line, opts.rawstring ?? false);
      if (!parsed.ok) {
        log.warn(`Skipping line ${lineNum}: ${parsed.reason}`);
        stats.countRecord(false);
        continue;
      }

      const recordStats = new StatsAccumulator();
      try {
        lines.push(serializeJSON(transform(parsed.value, policy, recordStats)));
      } catch (error) {
        if (!(error instanceof DepthLimitError)) throw error;
        log.warn(`Skipping line ${lineNum}: ${error.message}`);
        stats.countRecord(false);
        continue;
      }
      stats.merge(recordStats);
      stats.countRecord(true);
    }
  } catch (error) {
    if (!isErrnoError(error)) throw error;
    throw new RawscrubError(
      "INPUT_UNREADABLE",
      `Cannot read input file ${opts.inputFile}: ${errorMessage(error)}`,
      { cause: error }
    );
  } finally {
    rl.close();
  }

  await writeLines(outputFile, lines);

  const snapshot = stats.snapshot();
  log.info("Transform finished", {
    mode: policy.mode,
    processed: snapshot.validRecords,
    invalid: snapshot.invalidRecords,
    blank: snapshot.blankLines,
  });

  return {
    mode: policy.mode,
    inputFile: opts.inputFile,
    outputFile,
    stats: snapshot,
    samplePreview: lines.slice(0, TRANSFORM_PREVIEW),
  };
}
