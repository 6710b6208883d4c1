import { LosslessNumber } from "lossless-json";
import { describe, expect, it } from "vitest";
import { isJSONNumber, isJSONValue, parseJSON, serializeJSON } from "../../src/utils/json";

describe("json.ts", () => {
  describe("parseJSON / serializeJSON", () => {
    it("should keep numbers with their source digits", () => {
      const text = '{"n":12345678901234567890,"v":1.10,"big":1e400,"neg":-0.0}';
      expect(serializeJSON(parseJSON(text))).toBe(text);
    });

    it("should parse numbers into LosslessNumber", () => {
      expect(parseJSON("[1, 2.50]")).toEqual([new LosslessNumber("1"), new LosslessNumber("2.50")]);
    });

    it("should write compact output", () => {
      expect(serializeJSON(parseJSON('{ "a" : [ true , null , "x" ] }'))).toBe(
        '{"a":[true,null,"x"]}'
      );
    });

    it("should reject malformed text", () => {
      expect(() => parseJSON("{oops")).toThrow();
      expect(() => parseJSON("")).toThrow();
    });

    it("should serialize plain numbers built in code", () => {
      expect(serializeJSON({ a: 1, b: [2.5] })).toBe('{"a":1,"b":[2.5]}');
    });
  });

  describe("isJSONNumber", () => {
    it("should accept both number representations", () => {
      expect(isJSONNumber(3)).toBe(true);
      expect(isJSONNumber(new LosslessNumber("1e400"))).toBe(true);
      expect(isJSONNumber("3")).toBe(false);
    });
  });

  describe("isJSONValue", () => {
    it("should accept nested JSON values", () => {
      expect(isJSONValue({ a: [1, "x", null, { b: false }], c: new LosslessNumber("7") })).toBe(
        true
      );
    });

    it("should reject values JSON cannot carry", () => {
      expect(isJSONValue(undefined)).toBe(false);
      expect(isJSONValue({ a: [Number.NaN] })).toBe(false);
      expect(isJSONValue({ when: new Date(0) })).toBe(false);
      expect(isJSONValue([() => 1])).toBe(false);
    });
  });
});
