/**
 * @file src/cli.ts
 * @module CLI
 * @description Command-line front end: parses arguments, resolves the
 * configuration, runs one pipeline and prints the summary.
 */

import { parseArgs } from "node:util";
import { z } from "zod";
import { ConfigManager, buildPolicy, type ProcessorConfigInput } from "./config";
import { RawscrubError, errorMessage, exitCodeFor } from "./errors";
import { runExtract, runTransform } from "./pipeline";
import { formatSummary } from "./stats";
import { configureLogger, log } from "./utils/logger";
import type { ProcessingMode, RunReport } from "./types";

const ModeSchema = z.enum(["extract", "scrub", "structure"]);
const HashAlgoSchema = z.enum(["blake3", "sha256"]);

export const USAGE = `Usage: rawscrub <mode> <input_file> [options]

Modes:
  extract      pull the @rawstring payload out of every record of a JSON array
  scrub        anonymize sensitive values, keeping the document shape
  structure    replace every value with a type placeholder

Options:
  -o, --output <path>       output file (default: derived from the input name)
  --preserve-ids            digest ID-like fields instead of masking them (scrub)
  --rawstring               each line is a JSON string holding the record (scrub/structure)
  --no-preserve-lengths     mask generic text as [STRING] instead of filler characters (scrub)
  -c, --config <path>       YAML configuration file
  --hash-algo <algo>        digest for --preserve-ids: blake3 (default) or sha256
  --digest-length <n>       hex characters kept from the digest (default: 8)
  -v, --verbose             debug logging on stderr
  -q, --quiet               do not print the summary
  -h, --help                show this help

Examples:
  rawscrub extract export.json
  rawscrub scrub export_rawstring_only.json --preserve-ids
  rawscrub structure export_rawstring_only.json`;

export interface CliArgs {
  mode: ProcessingMode;
  inputFile: string;
  outputFile?: string;
  preserveIds: boolean;
  rawstring: boolean;
  configFile?: string;
  overrides: ProcessorConfigInput;
  verbose: boolean;
  quiet: boolean;
}

export type ParsedCli = { help: true } | ({ help: false } & CliArgs);

function usageError(message: string): RawscrubError {
  return new RawscrubError("USAGE", `${message}\nRun with --help for usage.`);
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        output: { type: "string", short: "o" },
        "preserve-ids": { type: "boolean" },
        rawstring: { type: "boolean" },
        "no-preserve-lengths": { type: "boolean" },
        config: { type: "string", short: "c" },
        "hash-algo": { type: "string" },
        "digest-length": { type: "string" },
        verbose: { type: "boolean", short: "v" },
        quiet: { type: "boolean", short: "q" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    throw usageError(errorMessage(error));
  }
}

export function parseCli(argv: string[]): ParsedCli {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { help: true };

  const [modeArg, inputFile, ...extra] = positionals;
  if (!modeArg || !inputFile) {
    throw usageError("Expected a mode and an input file");
  }
  if (extra.length) {
    throw usageError(`Unexpected argument: ${extra[0]}`);
  }

  const mode = ModeSchema.safeParse(modeArg);
  if (!mode.success) {
    throw usageError(
      `Unknown mode "${modeArg}" (expected extract, scrub or structure)`
    );
  }

  let hashAlgo: z.infer<typeof HashAlgoSchema> | undefined;
  if (values["hash-algo"] !== undefined) {
    const algo = HashAlgoSchema.safeParse(values["hash-algo"]);
    if (!algo.success) {
      throw usageError(
        `Unknown hash algorithm "${values["hash-algo"]}" (expected blake3 or sha256)`
      );
    }
    hashAlgo = algo.data;
  }

  let digestLength: number | undefined;
  if (values["digest-length"] !== undefined) {
    digestLength = Number(values["digest-length"]);
    if (!Number.isInteger(digestLength)) {
      throw usageError(
        `--digest-length must be an integer, got "${values["digest-length"]}"`
      );
    }
  }

  const overrides: ProcessorConfigInput = {
    ...(hashAlgo && { hashAlgo }),
    ...(digestLength !== undefined && { digestLength }),
    ...(values["no-preserve-lengths"] && { preserveLengths: false }),
  };

  return {
    help: false,
    mode: mode.data,
    inputFile,
    outputFile: values.output,
    preserveIds: values["preserve-ids"] ?? false,
    rawstring: values.rawstring ?? false,
    configFile: values.config,
    overrides,
    verbose: values.verbose ?? false,
    quiet: values.quiet ?? false,
  };
}

function warnIgnoredFlags(args: CliArgs): void {
  if (args.preserveIds && args.mode !== "scrub") {
    log.warn(`--preserve-ids only applies to scrub mode; ignored for ${args.mode}`);
  }
  if (args.rawstring && args.mode === "extract") {
    log.warn("--rawstring only applies to scrub and structure modes; ignored");
  }
}

/** Each call resolves its own configuration from `args` */
export async function execute(args: CliArgs): Promise<RunReport> {
  ConfigManager.reset();
  const cfg = ConfigManager.load({
    configFile: args.configFile,
    overrides: args.overrides,
  });
  configureLogger({ logLevel: args.verbose ? "debug" : cfg.logLevel });
  warnIgnoredFlags(args);

  log.verbose("Starting run", {
    mode: args.mode,
    inputFile: args.inputFile,
    outputFile: args.outputFile,
  });

  if (args.mode === "extract") {
    return runExtract({
      inputFile: args.inputFile,
      outputFile: args.outputFile,
      rawstringField: cfg.rawstringField,
    });
  }

  return runTransform({
    inputFile: args.inputFile,
    outputFile: args.outputFile,
    rawstring: args.rawstring,
    policy: buildPolicy(cfg, { mode: args.mode, preserveIds: args.preserveIds }),
  });
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/** Runs one invocation and resolves to the process exit code; never rejects */
export async function main(argv: string[], io: CliIO = consoleIO): Promise<number> {
  try {
    const parsed = parseCli(argv);
    if (parsed.help) {
      io.out(USAGE);
      return 0;
    }

    const report = await execute(parsed);
    if (!parsed.quiet) formatSummary(report).forEach((line) => io.out(line));
    return 0;
  } catch (error) {
    if (error instanceof RawscrubError) {
      io.err(`Error: ${error.message}`);
      log.debug("Run aborted", { code: error.code });
    } else {
      io.err(`Unexpected error: ${errorMessage(error)}`);
      log.error("Unexpected failure", {
        stack: error instanceof Error ? error.stack : undefined,
      });
    }
    return exitCodeFor(error);
  }
}
