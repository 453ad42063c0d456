/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseDelimiter, parseNonNegativeInt } from "../src/lib/arg.js";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid integers", () => {
      expect(parseNonNegativeInt("0", "test")).toBe(0);
      expect(parseNonNegativeInt(" 160 ", "test")).toBe(160);
    });

    it("should reject negative numbers", () => {
      expect(() => parseNonNegativeInt("-1", "--length")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("-1", "--length")).toThrow("--length must be a non-negative integer");
    });

    it("should reject non-numeric input", () => {
      expect(() => parseNonNegativeInt("abc", "test")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("1.5", "test")).toThrow(InvalidArgumentError);
    });

    it("should reject values that do not fit an index field", () => {
      expect(() => parseNonNegativeInt("4294967295", "test")).toThrow("test must be < 4294967295");
      expect(parseNonNegativeInt("4294967294", "test")).toBe(4294967294);
    });
  });

  describe("parseDelimiter", () => {
    it("should return the byte of a single character", () => {
      expect(parseDelimiter("%")).toBe(0x25);
      expect(parseDelimiter("#")).toBe(0x23);
    });

    it("should reject multi-byte delimiters", () => {
      expect(() => parseDelimiter("ab")).toThrow('delimiter must be a single byte, got "ab"');
      expect(() => parseDelimiter("é")).toThrow(InvalidArgumentError);
      expect(() => parseDelimiter("")).toThrow(InvalidArgumentError);
    });

    it("should reject a newline", () => {
      expect(() => parseDelimiter("\n")).toThrow("delimiter cannot be a newline");
    });
  });
});
