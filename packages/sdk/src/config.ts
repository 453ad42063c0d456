/**
 * Environment-driven configuration
 *
 * The environment is read here and nowhere else; everything downstream takes
 * explicit configuration objects.
 */

import { InvalidRequestError } from "./errors.js";
import { FIXED_SEED } from "./rng.js";
import type { RngConfig } from "./types.js";

export const DEFAULT_FORTUNE_PATH = [
  "/usr/share/fortune",
  "/usr/local/share/fortune",
  "/usr/share/games/fortunes",
  "/usr/local/share/games/fortunes",
];

export const ENV = {
  HARD_CODED_VALS: "FORTUNE_MOD_RAND_HARD_CODED_VALS",
  USE_SRAND: "FORTUNE_MOD_USE_SRAND",
  SRAND_SEED: "FORTUNE_MOD_SRAND_SEED",
  FORTUNE_PATH: "FORTUNE_PATH",
  LANG: "LANG",
} as const;

const FALSY = new Set(["", "0", "false", "no", "off"]);

export function envTruthy(value: string | undefined): boolean {
  return value !== undefined && !FALSY.has(value.trim().toLowerCase());
}

/**
 * Parse a list of hard-coded RNG values ("0", "3,1,4", "1 2;3")
 * @throws InvalidRequestError for empty lists or non-numeric tokens
 */
export function parseHardCodedValues(raw: string): number[] {
  const tokens = raw.split(/[\s,;]+/).filter(Boolean);
  if (tokens.length === 0) {
    throw new InvalidRequestError(`${ENV.HARD_CODED_VALS} is set but contains no numeric values`);
  }

  return tokens.map((token) => {
    if (!/^\d+$/.test(token)) {
      throw new InvalidRequestError(`Invalid hard-coded RNG value "${token}"`);
    }
    const value = Number.parseInt(token, 10);
    if (!Number.isSafeInteger(value)) {
      throw new InvalidRequestError(`Hard-coded RNG value "${token}" is too large`);
    }
    return value;
  });
}

/**
 * Select the RNG provider
 * Priority: hard-coded values > seeded toggle > system randomness
 */
export function resolveRngConfig(env: NodeJS.ProcessEnv = process.env): RngConfig {
  const hardCoded = env[ENV.HARD_CODED_VALS];
  if (hardCoded !== undefined) {
    return { kind: "hardcoded", values: parseHardCodedValues(hardCoded) };
  }

  if (envTruthy(env[ENV.USE_SRAND])) {
    const rawSeed = env[ENV.SRAND_SEED]?.trim();
    if (rawSeed) {
      if (!/^\d+$/.test(rawSeed)) {
        throw new InvalidRequestError(`Invalid ${ENV.SRAND_SEED} value "${rawSeed}"`);
      }
      return { kind: "seeded", seed: Number.parseInt(rawSeed, 10) >>> 0 };
    }
    return { kind: "seeded", seed: FIXED_SEED };
  }

  return { kind: "system" };
}

/**
 * Default corpus directories: FORTUNE_PATH (colon-separated) or the built-in list
 */
export function resolveSearchPath(env: NodeJS.ProcessEnv = process.env): string[] {
  const raw = env[ENV.FORTUNE_PATH];
  if (raw === undefined) {
    return [...DEFAULT_FORTUNE_PATH];
  }
  return raw.split(":").filter((entry) => entry.length > 0);
}

/**
 * Locale directory names to probe, most specific first
 * @example LANG="de_DE.UTF-8" → ["de_DE", "de"]
 */
export function resolveLocales(env: NodeJS.ProcessEnv = process.env): string[] {
  const raw = env[ENV.LANG];
  if (!raw) {
    return [];
  }

  const locales: string[] = [];
  for (const lang of raw.split(":")) {
    const normalized = (lang.split(".")[0] ?? "").split("@")[0]?.trim() ?? "";
    if (!normalized || normalized === "C" || normalized === "POSIX") {
      continue;
    }
    locales.push(normalized);
    const underscore = normalized.indexOf("_");
    if (underscore > 0) {
      locales.push(normalized.slice(0, underscore));
    } else if (normalized.length > 2) {
      locales.push(normalized.slice(0, 2));
    }
  }

  return [...new Set(locales)];
}
