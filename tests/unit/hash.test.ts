import { describe, expect, it } from "vitest";
import { digest, digestId } from "../../src/utils/hash";

describe("hash.ts", () => {
  describe("digest", () => {
    it("should generate consistent hashes for the same input", () => {
      const hash1 = digest("test string");
      const hash2 = digest("test string");

      expect(hash1).toBe(hash2);
      expect(hash1).toMatch(/^[0-9a-f]{64}$/);
    });

    it("should generate different hashes for different inputs", () => {
      expect(digest("input1")).not.toBe(digest("input2"));
    });

    it("should produce SHA-256 hex when asked", () => {
      expect(digest("abc123", "sha256")).toBe(
        "6ca13d52ca70c883e0f0bb101e425a89e8624de51db2d2392593af6a84118090"
      );
    });

    it("should differ between algorithms", () => {
      expect(digest("same input", "blake3")).not.toBe(digest("same input", "sha256"));
    });
  });

  describe("digestId", () => {
    it("should truncate to the configured length", () => {
      expect(digestId("ord-7", { hashAlgo: "sha256", digestLength: 8 })).toBe("d31e3f4e");
      expect(digestId("ord-7", { hashAlgo: "sha256", digestLength: 16 })).toBe(
        "d31e3f4ed61a764d"
      );
    });

    it("should be a prefix of the full digest", () => {
      const full = digest("u_42");
      expect(digestId("u_42", { hashAlgo: "blake3", digestLength: 8 })).toBe(full.slice(0, 8));
    });
  });
});
