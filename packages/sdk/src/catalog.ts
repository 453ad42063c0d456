/**
 * Source catalog: discovers corpora, loads or regenerates their indexes and
 * normalizes selection weights
 *
 * Invariants:
 * - Normalized probabilities sum to 1 over the catalog
 * - Explicit weights are kept as given; unweighted sources share the remaining mass
 * - An index on disk is used only when it decodes, is not older than its text and
 *   ends at the text's byte length; otherwise it is rebuilt and written atomically
 * - Failing to write a rebuilt index never fails discovery
 */

import { basename, dirname, join } from "node:path";
import { performance } from "node:perf_hooks";
import { buildIndex } from "./builder.js";
import { IndexFlags, INDEX_VERSION, decodeIndex, encodeIndex, hasFlag, indexPathFor } from "./codec.js";
import { resolveLocales, resolveSearchPath } from "./config.js";
import {
  CorruptIndexError,
  InvalidWeightError,
  NoSourcesFoundError,
  WeightOverflowError,
} from "./errors.js";
import { atomicWrite, listCorpusFiles, readIndexBytes, readSource, statOrNull } from "./io.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { WEIGHT_EPSILON, parseSourceSpecs, totalExplicitWeight } from "./sources.js";
import type {
  BuildOptions,
  Catalog,
  DecodedIndex,
  DiscoverOptions,
  EnsureIndexOptions,
  OffensiveMode,
  SourceEntry,
  SourceSpec,
  WeightMode,
} from "./types.js";

/**
 * Source token that expands to every corpus in the search path
 */
export const ALL_SOURCES = "all";

/**
 * Subdirectory holding offensive corpora inside a corpus directory
 */
export const OFFENSIVE_DIR = "off";

interface ResolvedSource {
  path: string;
  weight: number | null;
  isOffensive: boolean;
}

/**
 * Offensive convention: a `-o` name suffix or an `off/` parent directory
 */
export function isOffensive(path: string): boolean {
  return basename(path).endsWith("-o") || basename(dirname(path)) === OFFENSIVE_DIR;
}

/**
 * Whether a source passes the offensive filter
 */
export function allowsOffensive(mode: OffensiveMode, offensive: boolean): boolean {
  switch (mode) {
    case "include":
      return true;
    case "only":
      return offensive;
    case "exclude":
      return !offensive;
  }
}

/**
 * `name` ↔ `name-o`
 */
function offensiveAlternate(path: string): string {
  const name = basename(path);
  const alt = name.endsWith("-o") ? name.slice(0, -2) : `${name}-o`;
  return join(dirname(path), alt);
}

async function isDirectory(path: string): Promise<boolean> {
  const stats = await statOrNull(path);
  return stats?.isDirectory() ?? false;
}

/**
 * Corpus files of a directory, plus its `off/` subdirectory when offensive sources are wanted
 */
async function collectDirectory(dir: string, offensive: OffensiveMode): Promise<string[]> {
  const files = await listCorpusFiles(dir);
  const offDir = join(dir, OFFENSIVE_DIR);
  if (offensive !== "exclude" && (await isDirectory(offDir))) {
    files.push(...(await listCorpusFiles(offDir)));
  }
  return files;
}

/**
 * Expand one spec to corpus file paths
 */
async function resolveSpecPaths(spec: SourceSpec, searchPath: readonly string[], offensive: OffensiveMode): Promise<string[]> {
  if (spec.path === ALL_SOURCES) {
    const seen = new Set<string>();
    for (const dir of searchPath) {
      if (!(await isDirectory(dir))) continue;
      for (const file of await collectDirectory(dir, offensive)) {
        seen.add(file);
      }
    }
    return [...seen];
  }

  const stats = await statOrNull(spec.path);
  if (stats?.isDirectory()) {
    return collectDirectory(spec.path, offensive);
  }
  if (stats?.isFile()) {
    return [spec.path];
  }

  const alternate = offensiveAlternate(spec.path);
  const altStats = await statOrNull(alternate);
  if (altStats?.isFile()) {
    logger.debug("catalog.alternate", { path: spec.path, message: `using ${alternate}` });
    return [alternate];
  }

  logger.debug("catalog.missing", { path: spec.path });
  return [];
}

/**
 * Apply the offensive filter and split an explicit weight evenly across a spec's files
 */
function toResolvedSources(paths: readonly string[], weight: number | null, offensive: OffensiveMode): ResolvedSource[] {
  const kept = paths
    .map((path) => ({ path, isOffensive: isOffensive(path) }))
    .filter((source) => allowsOffensive(offensive, source.isOffensive));

  const share = weight === null || kept.length === 0 ? null : weight / kept.length;
  return kept.map((source) => ({ ...source, weight: share }));
}

/**
 * Default search: for each search directory, its locale subdirectories then
 * the directory itself; the first candidate with usable sources wins
 */
async function resolveDefaultSources(
  searchPath: readonly string[],
  locales: readonly string[],
  offensive: OffensiveMode
): Promise<{ sources: ResolvedSource[]; searched: string[] }> {
  const searched: string[] = [];

  for (const base of searchPath) {
    const candidates = [...locales.map((locale) => join(base, locale)), base];
    for (const candidate of candidates) {
      searched.push(candidate);
      if (!(await isDirectory(candidate))) continue;

      const sources = toResolvedSources(await collectDirectory(candidate, offensive), null, offensive);
      if (sources.length > 0) {
        logger.debug("catalog.default_dir", { path: candidate, details: { sources: sources.length } });
        return { sources, searched };
      }
    }
  }

  return { sources: [], searched };
}

/**
 * Check an on-disk index against its text
 * @returns null if the index is usable, otherwise why it is stale
 */
async function staleReason(
  textPath: string,
  indexPath: string,
  decoded: DecodedIndex,
  textLength: number
): Promise<string | null> {
  if (decoded.header.version !== INDEX_VERSION) {
    return `version ${decoded.header.version}`;
  }

  const end = decoded.offsets[decoded.offsets.length - 1];
  if (end !== textLength) {
    return `end offset ${end} does not match text length ${textLength}`;
  }

  const [textStats, indexStats] = await Promise.all([statOrNull(textPath), statOrNull(indexPath)]);
  if (textStats && indexStats && indexStats.mtimeMs < textStats.mtimeMs) {
    return "index is older than text";
  }

  return null;
}

/**
 * Load a source's index, regenerating it when missing, stale or corrupt
 */
export async function ensureIndex(textPath: string, options: EnsureIndexOptions = {}): Promise<SourceEntry> {
  const start = performance.now();
  const indexPath = indexPathFor(textPath);
  const text = await readSource(textPath);

  let index: DecodedIndex | null = null;
  const rebuildOptions: BuildOptions = {};

  if (!options.rebuild) {
    const bytes = await readIndexBytes(indexPath);
    if (bytes) {
      try {
        const decoded = decodeIndex(bytes, indexPath);
        // Keep the existing layout if the index has to be rebuilt
        rebuildOptions.delimiter = decoded.header.delimChar;
        rebuildOptions.randomize = hasFlag(decoded.header, IndexFlags.RANDOM);
        rebuildOptions.rotated = hasFlag(decoded.header, IndexFlags.ROTATED);

        const reason = await staleReason(textPath, indexPath, decoded, text.length);
        if (reason === null) {
          index = decoded;
        } else {
          logger.info("index.stale", { path: indexPath, message: reason });
        }
      } catch (err) {
        if (!(err instanceof CorruptIndexError)) throw err;
        logger.warn("index.corrupt", { path: indexPath, message: err.reason });
      }
    }
  }

  if (index) {
    metrics.recordIndexHit();
  } else {
    const built = buildIndex(text, rebuildOptions);
    index = { header: built.header, offsets: built.offsets };
    metrics.recordIndexRebuild();

    if (options.persist ?? true) {
      try {
        await atomicWrite(indexPath, encodeIndex(index.header, index.offsets));
        logger.info("index.rebuilt", { path: indexPath, details: { strings: built.stats.count } });
      } catch (err) {
        metrics.recordIndexWriteFailure();
        logger.warn("index.write_failed", {
          path: indexPath,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  metrics.recordLoadTime(performance.now() - start);

  return {
    path: textPath,
    indexPath,
    header: index.header,
    offsets: index.offsets,
    text,
    weight: options.weight ?? null,
    isOffensive: options.isOffensive ?? isOffensive(textPath),
    probability: 0,
  };
}

/**
 * Compute per-source probabilities
 *
 * Explicit weights are kept; `1 - Σexplicit` is split among unweighted sources
 * by entry count (`count`) or equally (`equal`). With no unweighted sources the
 * explicit weights are rescaled to sum to 1.
 * @throws WeightOverflowError if explicit weights exceed 100%
 * @throws InvalidWeightError if every source ends up with zero weight
 */
export function normalizeWeights(entries: readonly SourceEntry[], mode: WeightMode = "count"): SourceEntry[] {
  const explicit = totalExplicitWeight(entries);
  if (explicit > 1 + WEIGHT_EPSILON) {
    throw new WeightOverflowError(explicit * 100);
  }

  const baseWeight = (entry: SourceEntry): number => (mode === "equal" ? 1 : entry.header.numStrings);
  const totalBase = entries
    .filter((entry) => entry.weight === null)
    .reduce((sum, entry) => sum + baseWeight(entry), 0);

  if (totalBase === 0) {
    if (explicit <= 0) {
      throw new InvalidWeightError(entries.map((entry) => entry.path).join(", "), "every source has zero weight");
    }
    return entries.map((entry) => ({ ...entry, probability: (entry.weight ?? 0) / explicit }));
  }

  const remaining = Math.max(0, 1 - explicit);
  return entries.map((entry) => ({
    ...entry,
    probability: entry.weight ?? (remaining * baseWeight(entry)) / totalBase,
  }));
}

/**
 * Build the catalog for a run
 *
 * @param paths - Source tokens (`[N%] path`, `all`) or pre-parsed specs; empty for the default search
 * @throws NoSourcesFoundError if nothing usable is found
 */
export async function discover(
  paths: ReadonlyArray<string | SourceSpec>,
  options: DiscoverOptions = {}
): Promise<Catalog> {
  const offensive = options.offensive ?? "exclude";
  const searchPath = options.searchPath ?? resolveSearchPath();

  const specs = paths.every((path): path is string => typeof path === "string")
    ? parseSourceSpecs(paths)
    : paths.map((path) => (typeof path === "string" ? { path, weight: null } : path));

  let resolved: ResolvedSource[] = [];
  let searched: string[];

  if (specs.length === 0) {
    const result = await resolveDefaultSources(searchPath, options.locales ?? resolveLocales(), offensive);
    resolved = result.sources;
    searched = result.searched;
  } else {
    searched = specs.map((spec) => spec.path);
    const seen = new Set<string>();
    for (const spec of specs) {
      const files = await resolveSpecPaths(spec, searchPath, offensive);
      for (const source of toResolvedSources(files, spec.weight, offensive)) {
        if (seen.has(source.path)) continue;
        seen.add(source.path);
        resolved.push(source);
      }
    }
  }

  const entries: SourceEntry[] = [];
  for (const source of resolved) {
    const entry = await ensureIndex(source.path, {
      weight: source.weight,
      isOffensive: source.isOffensive,
      rebuild: options.rebuild,
      persist: options.persistIndexes,
    });
    if (entry.header.numStrings === 0) {
      logger.debug("catalog.empty_source", { path: entry.path });
      continue;
    }
    entries.push(entry);
  }

  if (entries.length === 0) {
    throw new NoSourcesFoundError(searched);
  }

  const normalized = normalizeWeights(entries, options.weightMode ?? "count");
  logger.debug("catalog.built", { details: { sources: normalized.length } });
  return { entries: normalized };
}
