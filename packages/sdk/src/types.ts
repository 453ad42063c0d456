/**
 * Core types for the fortune index and selection engine
 */

/**
 * Fixed-size header of a `.dat` index
 */
export interface IndexHeader {
  /** Format revision */
  version: number;
  /** Number of quotations in the corpus */
  numStrings: number;
  /** Longest quotation in bytes, delimiter excluded */
  longestLen: number;
  /** Shortest quotation in bytes, delimiter excluded */
  shortestLen: number;
  /** Bit set of `IndexFlags` */
  flags: number;
  /** Record separator byte */
  delimChar: number;
}

/**
 * Byte offsets of each quotation, followed by the text's byte length
 */
export type OffsetTable = readonly number[];

export interface DecodedIndex {
  header: IndexHeader;
  offsets: OffsetTable;
}

/**
 * Corpus path with an optional explicit weight
 */
export interface SourceSpec {
  path: string;
  /** Fraction in [0, 1] from an `N%` prefix, or null when implicit */
  weight: number | null;
}

/**
 * One loaded corpus file
 */
export interface SourceEntry {
  path: string;
  indexPath: string;
  header: IndexHeader;
  offsets: OffsetTable;
  /** Raw corpus bytes */
  text: Uint8Array;
  /** Explicit weight as a fraction, or null when derived */
  weight: number | null;
  isOffensive: boolean;
  /** Normalized selection probability; 0 until weights are normalized */
  probability: number;
}

/**
 * Ordered set of sources built once per invocation
 */
export interface Catalog {
  readonly entries: readonly SourceEntry[];
}

/**
 * How implicit weights are derived
 * - count: proportional to entry count
 * - equal: identical for every unweighted source
 */
export type WeightMode = "count" | "equal";

/**
 * Offensive source handling
 * - exclude: skip offensive sources (default)
 * - include: use every source (-a)
 * - only: use offensive sources only (-o)
 */
export type OffensiveMode = "exclude" | "include" | "only";

export type LengthFilter = "all" | "long" | "short";

/**
 * Immutable selection configuration
 */
export interface SelectionRequest {
  readonly filter: LengthFilter;
  /** Minimum byte length of a "long" quotation; shorter ones are "short" */
  readonly longThreshold: number;
  readonly offensive: OffensiveMode;
  readonly equalProbability: boolean;
  readonly pattern?: string;
  readonly ignoreCase: boolean;
  readonly listSources: boolean;
}

/**
 * A retrieved quotation
 */
export interface Quotation {
  text: string;
  sourcePath: string;
  /** Position in the source's offset table */
  index: number;
  /** Byte offset in the source text */
  offset: number;
}

/**
 * Display row for source probabilities
 */
export interface SourceProbability {
  path: string;
  /** Percentage rounded to two decimals */
  percentage: number;
  /** Full-precision probability in [0, 1] */
  probability: number;
}

/**
 * Randomness capability consumed by the selection engine
 */
export interface RandomSource {
  /** Uniform unsigned 32-bit integer */
  nextU32(): number;
  /** Integer in [0, bound); bound must be a positive integer no larger than 2^32 */
  nextU32Below(bound: number): number;
}

/**
 * RNG provider configuration
 */
export type RngConfig =
  | { kind: "system" }
  | { kind: "hardcoded"; values: number[] }
  | { kind: "seeded"; seed: number };

/**
 * Options for building an index from corpus text
 */
export interface BuildOptions {
  /** Separator byte (default "%") */
  delimiter?: number;
  /** Shuffle the offset table and set RANDOM */
  randomize?: boolean;
  /** Mark the corpus as ROT13-encoded */
  rotated?: boolean;
  /** Keep empty quotations between consecutive delimiters */
  allowEmpty?: boolean;
  /** Randomness for shuffling (default SystemRandom) */
  random?: RandomSource;
}

export interface BuildStats {
  count: number;
  longest: number;
  shortest: number;
}

export interface BuiltIndex extends DecodedIndex {
  stats: BuildStats;
}

/**
 * Options for discovery and index loading
 */
export interface DiscoverOptions {
  offensive?: OffensiveMode;
  weightMode?: WeightMode;
  /** Regenerate every index regardless of freshness */
  rebuild?: boolean;
  /** Default search directories (defaults to FORTUNE_PATH or the built-in list) */
  searchPath?: string[];
  /** Locale names probed under each search directory (defaults to LANG) */
  locales?: string[];
  /** Write regenerated indexes back to disk (default true) */
  persistIndexes?: boolean;
}

export interface EnsureIndexOptions {
  weight?: number | null;
  isOffensive?: boolean;
  rebuild?: boolean;
  persist?: boolean;
}
