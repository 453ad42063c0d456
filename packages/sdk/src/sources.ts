/**
 * Source token parsing: `[N%] path` arguments to source specs
 */

import { InvalidWeightError, WeightOverflowError } from "./errors.js";
import { logger } from "./observability/logs.js";
import type { SourceSpec } from "./types.js";

const PERCENT_PREFIX = /^([0-9.]+)%(.*)$/s;
const PERCENT_VALUE = /^\d+(?:\.\d+)?$/;

/**
 * Tolerance when summing percentages
 */
export const WEIGHT_EPSILON = 1e-9;

/**
 * Split a leading `N%` from a token
 * @returns The weight as a fraction and the remainder, or null when the token has no prefix
 * @throws InvalidWeightError for malformed or out-of-range percentages
 */
export function parsePercentPrefix(token: string): { weight: number; rest: string } | null {
  const match = PERCENT_PREFIX.exec(token);
  if (!match) {
    return null;
  }

  const [, raw = "", rest = ""] = match;
  if (!PERCENT_VALUE.test(raw)) {
    throw new InvalidWeightError(token, `malformed percentage "${raw}"`);
  }

  const percent = Number.parseFloat(raw);
  if (percent < 0 || percent > 100) {
    throw new InvalidWeightError(token, "percentage must be between 0 and 100");
  }

  return { weight: percent / 100, rest: rest.trimStart() };
}

/**
 * Parse command-line source tokens
 *
 * Accepted forms: `path`, `10%path`, `"10% path"`, and `10%` followed by a separate `path` token.
 * @throws InvalidWeightError for bad prefixes or a trailing prefix with no path
 * @throws WeightOverflowError if explicit weights total more than 100%
 */
export function parseSourceSpecs(tokens: readonly string[]): SourceSpec[] {
  const specs: SourceSpec[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? "";
    const prefix = parsePercentPrefix(token);

    if (!prefix) {
      specs.push({ path: token, weight: null });
      continue;
    }

    if (prefix.rest) {
      specs.push({ path: prefix.rest, weight: prefix.weight });
      continue;
    }

    const next = tokens[i + 1];
    if (next === undefined || next.length === 0) {
      throw new InvalidWeightError(token, "missing path after percentage");
    }
    specs.push({ path: next, weight: prefix.weight });
    i++;
  }

  const total = totalExplicitWeight(specs);
  if (total > 1 + WEIGHT_EPSILON) {
    throw new WeightOverflowError(total * 100);
  }

  logger.debug("sources.parsed", { details: { count: specs.length, explicitPercent: total * 100 } });
  return specs;
}

export function totalExplicitWeight(specs: ReadonlyArray<{ weight: number | null }>): number {
  return specs.reduce((sum, spec) => sum + (spec.weight ?? 0), 0);
}
