import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  ConfigManager,
  buildPolicy,
  defaultPolicy,
  parseConfig,
} from "../../src/config";
import { RawscrubError } from "../../src/errors";

describe("config.ts", () => {
  let dir: string;

  beforeEach(() => {
    ConfigManager.reset();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "rawscrub-config-"));
  });

  afterEach(() => {
    ConfigManager.reset();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function errorCode(fn: () => unknown): string | undefined {
    try {
      fn();
    } catch (error) {
      return error instanceof RawscrubError ? error.code : "not-a-RawscrubError";
    }
    return undefined;
  }

  function writeYaml(body: string): string {
    const file = path.join(dir, "rawscrub.yml");
    fs.writeFileSync(file, body);
    return file;
  }

  describe("parseConfig", () => {
    it("should apply defaults to an empty object", () => {
      expect(parseConfig({})).toEqual({
        rawstringField: "@rawstring",
        digestLength: 8,
        hashAlgo: "blake3",
        fillerChar: "X",
        idKeyword: "id",
        preserveLengths: true,
        maxDepth: 512,
        placeholders: {
          email: "user@example.com",
          url: "https://example.com",
          ipv4: "192.168.1.1",
          phone: "555-000-0000",
        },
        logLevel: "warn",
      });
    });

    it("should reject out-of-range and unknown settings", () => {
      expect(() => parseConfig({ digestLength: 2 })).toThrow(RawscrubError);
      expect(() => parseConfig({ fillerChar: "XY" })).toThrow(/fillerChar/);
      expect(() => parseConfig({ hashAlgo: "md5" })).toThrow(/hashAlgo/);
      expect(() => parseConfig({ colour: "red" })).toThrow(/Invalid configuration/);
    });
  });

  describe("ConfigManager", () => {
    it("should throw before load", () => {
      expect(ConfigManager.loaded).toBe(false);
      expect(() => ConfigManager.cfg).toThrow(/load\(\) must be called first/);
    });

    it("should merge file values under CLI overrides", () => {
      const file = writeYaml(
        [
          "hashAlgo: sha256",
          "digestLength: 12",
          "fillerChar: '#'",
          "placeholders:",
          "  email: nobody@invalid",
        ].join("\n")
      );

      const cfg = ConfigManager.load({
        configFile: file,
        overrides: { digestLength: 10, placeholders: { url: "https://invalid" } },
      });

      expect(cfg.hashAlgo).toBe("sha256");
      expect(cfg.digestLength).toBe(10);
      expect(cfg.fillerChar).toBe("#");
      expect(cfg.placeholders).toEqual({
        email: "nobody@invalid",
        url: "https://invalid",
        ipv4: "192.168.1.1",
        phone: "555-000-0000",
      });
      expect(Object.isFrozen(cfg)).toBe(true);
    });

    it("should keep the first loaded configuration until reset", () => {
      ConfigManager.load({ overrides: { digestLength: 10 } });
      ConfigManager.load({ overrides: { digestLength: 20 } });

      expect(ConfigManager.cfg.digestLength).toBe(10);
    });

    it("should accept an empty config file", () => {
      const file = writeYaml("");
      expect(ConfigManager.load({ configFile: file }).digestLength).toBe(8);
    });

    it("should fail on a missing config file", () => {
      const missing = path.join(dir, "nope.yml");
      expect(errorCode(() => ConfigManager.load({ configFile: missing }))).toBe(
        "CONFIG_NOT_FOUND"
      );
    });

    it("should fail on a non-mapping config file", () => {
      const file = writeYaml("- a\n- b\n");
      expect(errorCode(() => ConfigManager.load({ configFile: file }))).toBe(
        "CONFIG_INVALID"
      );
    });

    it("should fail on invalid YAML", () => {
      const file = writeYaml("digestLength: [1, 2\n");
      expect(errorCode(() => ConfigManager.load({ configFile: file }))).toBe(
        "CONFIG_INVALID"
      );
    });
  });

  describe("buildPolicy", () => {
    it("should only honour preserveIds in scrub mode", () => {
      const cfg = parseConfig({});

      expect(buildPolicy(cfg, { mode: "scrub", preserveIds: true }).preserveIds).toBe(true);
      expect(buildPolicy(cfg, { mode: "structure", preserveIds: true }).preserveIds).toBe(
        false
      );
    });

    it("should copy walker settings and freeze the result", () => {
      const policy = buildPolicy(parseConfig({ maxDepth: 9, idKeyword: "key" }), {
        mode: "scrub",
      });

      expect(policy).toMatchObject({ mode: "scrub", maxDepth: 9, idKeyword: "key" });
      expect(Object.isFrozen(policy)).toBe(true);
      expect(Object.isFrozen(policy.placeholders)).toBe(true);
    });
  });

  describe("defaultPolicy", () => {
    it("should apply overrides on top of defaults", () => {
      expect(defaultPolicy("scrub", { fillerChar: "*" })).toMatchObject({
        mode: "scrub",
        fillerChar: "*",
        digestLength: 8,
        preserveIds: false,
      });
    });
  });
});
