import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "yaml";
import { z } from "zod";
import { RawscrubError } from "./errors";
import type { AnonymizationPolicy, TransformMode } from "./types";

export const DEFAULT_PLACEHOLDERS = {
  email: "user@example.com",
  url: "https://example.com",
  ipv4: "192.168.1.1",
  phone: "555-000-0000",
} as const;

const PlaceholdersSchema = z.object({
  email: z.string().default(DEFAULT_PLACEHOLDERS.email),
  url: z.string().default(DEFAULT_PLACEHOLDERS.url),
  ipv4: z.string().default(DEFAULT_PLACEHOLDERS.ipv4),
  phone: z.string().default(DEFAULT_PLACEHOLDERS.phone),
});

export const ProcessorConfigSchema = z
  .object({
    rawstringField: z.string().min(1).default("@rawstring"),
    digestLength: z.number().int().min(4).max(64).default(8),
    hashAlgo: z.enum(["blake3", "sha256"]).default("blake3"),
    fillerChar: z
      .string()
      .refine((s) => [...s].length === 1, "must be a single character")
      .default("X"),
    idKeyword: z.string().min(1).default("id"),
    preserveLengths: z.boolean().default(true),
    maxDepth: z.number().int().positive().default(512),
    placeholders: PlaceholdersSchema.default({}),
    logLevel: z
      .enum(["error", "warn", "info", "verbose", "debug"])
      .default("warn"),
  })
  .strict();

export type ProcessorConfigInput = z.input<typeof ProcessorConfigSchema>;
export type ProcessorConfig = z.output<typeof ProcessorConfigSchema>;

function readYaml(filePath: string): unknown {
  const abs = path.resolve(process.cwd(), filePath);

  if (!fs.existsSync(abs)) {
    throw new RawscrubError(
      "CONFIG_NOT_FOUND",
      `Config file not found: ${abs}`
    );
  }

  try {
    return yaml.parse(fs.readFileSync(abs, "utf8")) ?? {};
  } catch (error) {
    throw new RawscrubError(
      "CONFIG_INVALID",
      `Failed to read config file ${abs}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      { cause: error }
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseConfig(input: unknown): ProcessorConfig {
  const result = ProcessorConfigSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new RawscrubError("CONFIG_INVALID", `Invalid configuration: ${detail}`);
  }
  return result.data;
}

class ConfigManagerClass {
  private _cfg?: Readonly<ProcessorConfig>;

  /**
   * Resolve the run configuration once: defaults ← YAML file ← overrides.
   * Later calls are ignored until `reset()`.
   */
  load(opts: { configFile?: string; overrides?: ProcessorConfigInput } = {}): Readonly<ProcessorConfig> {
    if (this._cfg) return this._cfg;

    const fileCfg = opts.configFile ? readYaml(opts.configFile) : {};
    if (!isRecord(fileCfg)) {
      throw new RawscrubError(
        "CONFIG_INVALID",
        "Invalid configuration: top level must be a mapping"
      );
    }

    const overrides = opts.overrides ?? {};
    const merged = {
      ...fileCfg,
      ...overrides,
      placeholders: {
        ...(isRecord(fileCfg.placeholders) ? fileCfg.placeholders : {}),
        ...overrides.placeholders,
      },
    };

    this._cfg = Object.freeze(parseConfig(merged));
    return this._cfg;
  }

  get loaded(): boolean {
    return this._cfg !== undefined;
  }

  get cfg(): Readonly<ProcessorConfig> {
    if (!this._cfg) {
      throw new Error("rawscrub: ConfigManager.load() must be called first");
    }
    return this._cfg;
  }

  reset(): void {
    this._cfg = undefined;
  }
}

export const ConfigManager = new ConfigManagerClass();

/** Derive the frozen walker policy from a resolved configuration */
export function buildPolicy(
  cfg: Readonly<ProcessorConfig>,
  opts: { mode: TransformMode; preserveIds?: boolean }
): Readonly<AnonymizationPolicy> {
  return Object.freeze({
    mode: opts.mode,
    preserveIds: opts.mode === "scrub" && (opts.preserveIds ?? false),
    preserveLengths: cfg.preserveLengths,
    digestLength: cfg.digestLength,
    hashAlgo: cfg.hashAlgo,
    fillerChar: cfg.fillerChar,
    idKeyword: cfg.idKeyword,
    placeholders: Object.freeze({ ...cfg.placeholders }),
    maxDepth: cfg.maxDepth,
  });
}

/** Policy with every default applied, for library callers and tests */
export function defaultPolicy(
  mode: TransformMode,
  overrides: Partial<Omit<AnonymizationPolicy, "mode">> = {}
): Readonly<AnonymizationPolicy> {
  const base = buildPolicy(parseConfig({}), { mode });
  return Object.freeze({ ...base, ...overrides, mode });
}
