/**
 * Fortune SDK
 *
 * Binary `.dat` indexes, source discovery and weighted quotation selection
 */

// Re-export types
export type {
  IndexHeader,
  OffsetTable,
  DecodedIndex,
  SourceSpec,
  SourceEntry,
  Catalog,
  WeightMode,
  OffensiveMode,
  LengthFilter,
  SelectionRequest,
  Quotation,
  SourceProbability,
  RandomSource,
  RngConfig,
  BuildOptions,
  BuildStats,
  BuiltIndex,
  DiscoverOptions,
  EnsureIndexOptions,
} from "./types.js";

// Codec and index builder
export {
  INDEX_VERSION,
  HEADER_SIZE,
  DEFAULT_DELIMITER,
  IndexFlags,
  encodeIndex,
  decodeIndex,
  validateOffsets,
  indexPathFor,
  hasFlag,
} from "./codec.js";
export { buildIndex, parseEntrySpans, entrySpan, entryLength, entryText, rot13 } from "./builder.js";
export type { EntrySpan } from "./builder.js";

// Randomness
export {
  FIXED_SEED,
  SystemRandom,
  HardCodedRandom,
  SeededRandom,
  createRandomSource,
  shuffle,
} from "./rng.js";

// Catalog
export { parseSourceSpecs, parsePercentPrefix } from "./sources.js";
export {
  ALL_SOURCES,
  OFFENSIVE_DIR,
  discover,
  ensureIndex,
  normalizeWeights,
  isOffensive,
  allowsOffensive,
} from "./catalog.js";

// Selection
export {
  SELECTION_SCALE,
  selectOne,
  enumerateMatches,
  listProbabilities,
  compilePattern,
  acceptsLength,
  quotationAt,
  buildBuckets,
  pickBucket,
} from "./engine.js";
export type { Bucket } from "./engine.js";
export {
  DEFAULT_SHORT_MAX,
  DEFAULT_LONG_THRESHOLD,
  selectionRequestSchema,
  validateRequest,
  defaultRequest,
} from "./request.js";
export type { SelectionRequestInput } from "./request.js";

// Configuration
export {
  DEFAULT_FORTUNE_PATH,
  ENV,
  envTruthy,
  parseHardCodedValues,
  resolveRngConfig,
  resolveSearchPath,
  resolveLocales,
} from "./config.js";

// I/O
export { atomicWrite, readSource } from "./io.js";

// Observability
export { logger, resolveLogLevel, isLogLevel } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { FortuneMetrics } from "./observability/metrics.js";

// Errors
export {
  FortuneError,
  CorruptIndexError,
  InvalidWeightError,
  WeightOverflowError,
  NoSourcesFoundError,
  NoMatchingQuotationError,
  InvalidPatternError,
  InvalidRequestError,
  SourceReadError,
  IndexWriteError,
  DirectoryError,
} from "./errors.js";
