import { describe, it, expect } from "vitest";
import {
  DEFAULT_FORTUNE_PATH,
  envTruthy,
  parseHardCodedValues,
  resolveLocales,
  resolveRngConfig,
  resolveSearchPath,
} from "./config.js";
import { InvalidRequestError } from "./errors.js";
import { FIXED_SEED } from "./rng.js";

describe("environment configuration", () => {
  describe("envTruthy", () => {
    it("should treat common false spellings as off", () => {
      expect(envTruthy(undefined)).toBe(false);
      expect(envTruthy("")).toBe(false);
      expect(envTruthy("0")).toBe(false);
      expect(envTruthy("False")).toBe(false);
      expect(envTruthy("1")).toBe(true);
      expect(envTruthy("yes")).toBe(true);
    });
  });

  describe("parseHardCodedValues", () => {
    it("should split on commas, semicolons and whitespace", () => {
      expect(parseHardCodedValues("3,1 4;1")).toEqual([3, 1, 4, 1]);
      expect(parseHardCodedValues(" 0 ")).toEqual([0]);
    });

    it("should reject empty or non-numeric lists", () => {
      expect(() => parseHardCodedValues("")).toThrow(InvalidRequestError);
      expect(() => parseHardCodedValues("1,x")).toThrow('Invalid hard-coded RNG value "x"');
      expect(() => parseHardCodedValues("-1")).toThrow(InvalidRequestError);
    });
  });

  describe("resolveRngConfig", () => {
    it("should default to system randomness", () => {
      expect(resolveRngConfig({})).toEqual({ kind: "system" });
    });

    it("should prefer hard-coded values over seeding", () => {
      expect(
        resolveRngConfig({ FORTUNE_MOD_RAND_HARD_CODED_VALS: "5,6", FORTUNE_MOD_USE_SRAND: "1" })
      ).toEqual({ kind: "hardcoded", values: [5, 6] });
    });

    it("should seed with the fixed seed unless one is given", () => {
      expect(resolveRngConfig({ FORTUNE_MOD_USE_SRAND: "1" })).toEqual({ kind: "seeded", seed: FIXED_SEED });
      expect(resolveRngConfig({ FORTUNE_MOD_USE_SRAND: "1", FORTUNE_MOD_SRAND_SEED: "77" })).toEqual({
        kind: "seeded",
        seed: 77,
      });
    });

    it("should ignore the seed when seeding is off", () => {
      expect(resolveRngConfig({ FORTUNE_MOD_USE_SRAND: "0", FORTUNE_MOD_SRAND_SEED: "77" })).toEqual({
        kind: "system",
      });
    });

    it("should reject a malformed seed", () => {
      expect(() => resolveRngConfig({ FORTUNE_MOD_USE_SRAND: "1", FORTUNE_MOD_SRAND_SEED: "abc" })).toThrow(
        InvalidRequestError
      );
    });
  });

  describe("resolveSearchPath", () => {
    it("should split FORTUNE_PATH on colons", () => {
      expect(resolveSearchPath({ FORTUNE_PATH: "/a::/b" })).toEqual(["/a", "/b"]);
    });

    it("should fall back to the built-in directories", () => {
      expect(resolveSearchPath({})).toEqual(DEFAULT_FORTUNE_PATH);
    });
  });

  describe("resolveLocales", () => {
    it("should probe the full locale and then the language", () => {
      expect(resolveLocales({ LANG: "de_DE.UTF-8" })).toEqual(["de_DE", "de"]);
      expect(resolveLocales({ LANG: "sr_RS@latin" })).toEqual(["sr_RS", "sr"]);
    });

    it("should shorten three-letter names to two", () => {
      expect(resolveLocales({ LANG: "eng" })).toEqual(["eng", "en"]);
      expect(resolveLocales({ LANG: "fr" })).toEqual(["fr"]);
    });

    it("should skip the C and POSIX locales", () => {
      expect(resolveLocales({ LANG: "C.UTF-8" })).toEqual([]);
      expect(resolveLocales({ LANG: "POSIX" })).toEqual([]);
      expect(resolveLocales({})).toEqual([]);
    });

    it("should not repeat names", () => {
      expect(resolveLocales({ LANG: "de_DE:de_AT" })).toEqual(["de_DE", "de", "de_AT"]);
    });
  });
});
