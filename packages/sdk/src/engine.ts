/**
 * Selection engine: weighted two-stage sampling and match enumeration
 *
 * Stage 1 picks a source from an integer cumulative table; stage 2 picks
 * uniformly among that source's eligible entries. Both draws go through the
 * `RandomSource` capability only.
 *
 * Bucket layout: sources are laid out by descending probability (ties keep
 * catalog order), so a draw of 0 always lands in the heaviest source.
 */

import { entryLength, entryText, rot13 } from "./builder.js";
import { IndexFlags, hasFlag } from "./codec.js";
import { allowsOffensive, normalizeWeights } from "./catalog.js";
import { InvalidPatternError, NoMatchingQuotationError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type {
  Catalog,
  LengthFilter,
  Quotation,
  RandomSource,
  SelectionRequest,
  SourceEntry,
  SourceProbability,
} from "./types.js";

/**
 * Integer domain of the stage-1 draw
 */
export const SELECTION_SCALE = 1_000_000_000;

export interface Bucket {
  /** Position of the source in the catalog */
  source: number;
  /** Exclusive cumulative upper bound in [1, SELECTION_SCALE] */
  bound: number;
}

/**
 * Compile a search pattern; `^` and `$` anchor to the whole quotation
 * @throws InvalidPatternError if the pattern is not a valid regular expression
 */
export function compilePattern(pattern: string | undefined, ignoreCase = false): RegExp | null {
  if (pattern === undefined) {
    return null;
  }
  try {
    return new RegExp(pattern, ignoreCase ? "i" : "");
  } catch (err) {
    throw new InvalidPatternError(pattern, { cause: err });
  }
}

export function acceptsLength(filter: LengthFilter, longThreshold: number, length: number): boolean {
  switch (filter) {
    case "all":
      return true;
    case "long":
      return length >= longThreshold;
    case "short":
      return length < longThreshold;
  }
}

/**
 * Quotation at a position of a source's offset table
 */
export function quotationAt(entry: SourceEntry, index: number): Quotation {
  const offset = entry.offsets[index];
  if (offset === undefined || index >= entry.header.numStrings) {
    throw new RangeError(`Entry ${index} is out of range for ${entry.path}`);
  }

  const raw = entryText(entry.text, offset, entry.header.delimChar);
  return {
    text: hasFlag(entry.header, IndexFlags.ROTATED) ? rot13(raw) : raw,
    sourcePath: entry.path,
    index,
    offset,
  };
}

/**
 * Table positions passing the length filter and pattern
 */
function eligibleEntries(entry: SourceEntry, request: SelectionRequest, matcher: RegExp | null): number[] {
  const eligible: number[] = [];
  for (let i = 0; i < entry.header.numStrings; i++) {
    const offset = entry.offsets[i] ?? 0;
    const length = entryLength(entry.text, offset, entry.header.delimChar);
    if (!acceptsLength(request.filter, request.longThreshold, length)) continue;
    if (matcher && !matcher.test(quotationAt(entry, i).text)) continue;
    eligible.push(i);
  }
  return eligible;
}

/**
 * Sources passing the request's offensive filter, renormalized for its weight mode
 */
function applicableEntries(catalog: Catalog, request: SelectionRequest): SourceEntry[] {
  const entries = catalog.entries.filter((entry) => allowsOffensive(request.offensive, entry.isOffensive));
  if (entries.length === 0) {
    return [];
  }
  return normalizeWeights(entries, request.equalProbability ? "equal" : "count");
}

/**
 * Lay out cumulative buckets over positive probabilities
 */
export function buildBuckets(probabilities: readonly number[]): Bucket[] {
  const order = probabilities
    .map((probability, source) => ({ probability, source }))
    .filter((item) => item.probability > 0)
    .sort((a, b) => b.probability - a.probability);

  const total = order.reduce((sum, item) => sum + item.probability, 0);
  if (total <= 0) {
    return [];
  }

  let cumulative = 0;
  const buckets = order.map((item) => {
    cumulative += item.probability;
    return { source: item.source, bound: Math.round((cumulative / total) * SELECTION_SCALE) };
  });

  const last = buckets[buckets.length - 1];
  if (last) {
    last.bound = SELECTION_SCALE;
  }
  return buckets;
}

/**
 * Source whose bucket contains the draw
 */
export function pickBucket(buckets: readonly Bucket[], draw: number): number {
  for (const bucket of buckets) {
    if (draw < bucket.bound) {
      return bucket.source;
    }
  }
  const last = buckets[buckets.length - 1];
  if (!last) {
    throw new RangeError("Cannot pick from an empty bucket table");
  }
  return last.source;
}

function describeRequest(request: SelectionRequest): string {
  const parts: string[] = [];
  if (request.filter !== "all") {
    parts.push(`${request.filter} quotations (threshold ${request.longThreshold} bytes)`);
  }
  if (request.pattern !== undefined) {
    parts.push(`pattern /${request.pattern}/${request.ignoreCase ? "i" : ""}`);
  }
  return parts.length > 0 ? parts.join(", ") : "no quotations available";
}

/**
 * Select one quotation
 *
 * A source with no eligible entries is zeroed for this call and stage 1 is
 * redrawn, at most once per source.
 * @throws InvalidPatternError before any draw if the pattern does not compile
 * @throws NoMatchingQuotationError if no source has an eligible entry
 */
export function selectOne(catalog: Catalog, request: SelectionRequest, rng: RandomSource): Quotation {
  const matcher = compilePattern(request.pattern, request.ignoreCase);
  const entries = applicableEntries(catalog, request);
  const probabilities = entries.map((entry) => entry.probability);

  for (let attempt = 0; attempt < entries.length; attempt++) {
    const buckets = buildBuckets(probabilities);
    if (buckets.length === 0) break;

    const source = pickBucket(buckets, rng.nextU32Below(SELECTION_SCALE));
    const entry = entries[source];
    if (!entry) break;

    const eligible = eligibleEntries(entry, request, matcher);
    if (eligible.length === 0) {
      logger.debug("select.source_exhausted", { path: entry.path });
      metrics.recordRetry();
      probabilities[source] = 0;
      continue;
    }

    const index = eligible[rng.nextU32Below(eligible.length)] ?? 0;
    metrics.recordDraw();
    logger.debug("select.chosen", { path: entry.path, details: { index } });
    return quotationAt(entry, index);
  }

  throw new NoMatchingQuotationError(describeRequest(request));
}

/**
 * Every eligible quotation in catalog order, then offset-table order
 *
 * The result is lazy and can be iterated any number of times with the same output.
 * @throws InvalidPatternError immediately if the pattern does not compile
 */
export function enumerateMatches(catalog: Catalog, request: SelectionRequest): Iterable<Quotation> {
  const matcher = compilePattern(request.pattern, request.ignoreCase);
  const entries = catalog.entries.filter((entry) => allowsOffensive(request.offensive, entry.isOffensive));

  return {
    *[Symbol.iterator](): Iterator<Quotation> {
      for (const entry of entries) {
        for (let i = 0; i < entry.header.numStrings; i++) {
          const offset = entry.offsets[i] ?? 0;
          const length = entryLength(entry.text, offset, entry.header.delimChar);
          if (!acceptsLength(request.filter, request.longThreshold, length)) continue;

          const quotation = quotationAt(entry, i);
          if (matcher && !matcher.test(quotation.text)) continue;
          yield quotation;
        }
      }
    },
  };
}

/**
 * Source paths with their selection percentages, in catalog order
 */
export function listProbabilities(catalog: Catalog): SourceProbability[] {
  return catalog.entries.map((entry) => ({
    path: entry.path,
    percentage: Math.round(entry.probability * 10_000) / 100,
    probability: entry.probability,
  }));
}
