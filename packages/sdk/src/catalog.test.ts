import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildIndex } from "./builder.js";
import { INDEX_VERSION, IndexFlags, decodeIndex, encodeIndex, indexPathFor } from "./codec.js";
import { discover, ensureIndex, isOffensive, normalizeWeights } from "./catalog.js";
import { InvalidWeightError, NoSourcesFoundError, WeightOverflowError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { BuildOptions, SourceEntry } from "./types.js";

async function writeSource(
  dir: string,
  name: string,
  quotes: readonly string[],
  options: BuildOptions & { index?: boolean } = {}
): Promise<string> {
  const { index = true, ...buildOptions } = options;
  const delimiter = String.fromCharCode(buildOptions.delimiter ?? 0x25);
  const path = join(dir, name);
  const text = Buffer.from(quotes.map((quote) => `${quote}\n`).join(`${delimiter}\n`));
  await writeFile(path, text);
  if (index) {
    const built = buildIndex(text, buildOptions);
    await writeFile(indexPathFor(path), encodeIndex(built.header, built.offsets));
  }
  return path;
}

function fakeEntry(path: string, numStrings: number, weight: number | null = null): SourceEntry {
  return {
    path,
    indexPath: `${path}.dat`,
    header: {
      version: INDEX_VERSION,
      numStrings,
      longestLen: 1,
      shortestLen: 1,
      flags: IndexFlags.ORDERED,
      delimChar: 0x25,
    },
    offsets: Array.from({ length: numStrings + 1 }, (_, i) => i * 2),
    text: new Uint8Array(numStrings * 2),
    weight,
    isOffensive: false,
    probability: 0,
  };
}

const past = new Date("2000-01-01T00:00:00Z");

describe("catalog", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "fortune-catalog-"));
    logger.setEnabled(false);
    metrics.reset();
  });

  afterEach(async () => {
    logger.setEnabled(true);
    await rm(testDir, { recursive: true, force: true });
  });

  describe("isOffensive", () => {
    it("should flag -o names and off/ directories", () => {
      expect(isOffensive("/data/jokes-o")).toBe(true);
      expect(isOffensive("/data/off/jokes")).toBe(true);
      expect(isOffensive("/data/jokes")).toBe(false);
      expect(isOffensive("/data/office/jokes")).toBe(false);
    });
  });

  describe("ensureIndex", () => {
    it("should build and persist a missing index", async () => {
      const path = await writeSource(testDir, "quotes", ["one", "two"], { index: false });

      const entry = await ensureIndex(path);

      expect(entry.header.numStrings).toBe(2);
      expect(entry.offsets).toEqual([0, 6, 10]);
      const onDisk = decodeIndex(await readFile(indexPathFor(path)));
      expect(onDisk.offsets).toEqual([0, 6, 10]);
      expect(metrics.snapshot().indexRebuilds).toBe(1);
    });

    it("should reuse a fresh index", async () => {
      const path = await writeSource(testDir, "quotes", ["one", "two"]);

      await ensureIndex(path);

      const snapshot = metrics.snapshot();
      expect(snapshot.indexHits).toBe(1);
      expect(snapshot.indexRebuilds).toBe(0);
      expect(snapshot.loadTimeMs).toHaveLength(1);
    });

    it("should rebuild an index older than its text", async () => {
      const path = await writeSource(testDir, "quotes", ["one", "two"]);
      await utimes(indexPathFor(path), past, past);

      await ensureIndex(path);

      expect(metrics.snapshot().indexRebuilds).toBe(1);
    });

    it("should rebuild an index whose end offset disagrees with the text", async () => {
      const path = await writeSource(testDir, "quotes", ["one", "two"]);
      await writeFile(path, "one\n%\ntwo\n%\nthree\n");
      await utimes(path, past, past);

      const entry = await ensureIndex(path);

      expect(entry.offsets).toEqual([0, 6, 12, 18]);
      expect(metrics.snapshot().indexRebuilds).toBe(1);
    });

    it("should rebuild a corrupt index", async () => {
      const path = await writeSource(testDir, "quotes", ["one", "two"], { index: false });
      await writeFile(indexPathFor(path), new Uint8Array([1, 2, 3]));

      const entry = await ensureIndex(path);

      expect(entry.header.numStrings).toBe(2);
      expect(decodeIndex(await readFile(indexPathFor(path))).header.numStrings).toBe(2);
    });

    it("should keep the delimiter and flags of a stale index", async () => {
      const path = await writeSource(testDir, "quotes", ["Bar", "Onm"], {
        delimiter: 0x23,
        rotated: true,
      });
      await utimes(indexPathFor(path), past, past);

      const entry = await ensureIndex(path);

      expect(metrics.snapshot().indexRebuilds).toBe(1);
      expect(entry.header.delimChar).toBe(0x23);
      expect(entry.header.flags).toBe(IndexFlags.ORDERED | IndexFlags.ROTATED);
      expect(entry.offsets).toEqual([0, 6, 10]);
    });

    it("should regenerate every index when forced", async () => {
      const path = await writeSource(testDir, "quotes", ["one"]);

      await ensureIndex(path, { rebuild: true });

      expect(metrics.snapshot()).toMatchObject({ indexHits: 0, indexRebuilds: 1 });
    });

    it("should not write when persistence is off", async () => {
      const path = await writeSource(testDir, "quotes", ["one"], { index: false });

      await ensureIndex(path, { persist: false });

      expect(await readdir(testDir)).toEqual(["quotes"]);
    });

    it("should fall back to the in-memory index when the write fails", async () => {
      const path = await writeSource(testDir, "quotes", ["one", "two"], { index: false });
      await mkdir(indexPathFor(path));

      const entry = await ensureIndex(path);

      expect(entry.header.numStrings).toBe(2);
      expect(metrics.snapshot().indexWriteFailures).toBe(1);
      const leftovers = (await readdir(testDir)).filter((name) => name.endsWith(".tmp"));
      expect(leftovers).toEqual([]);
    });

    it("should leave a valid index after concurrent rebuilds", async () => {
      const quotes = Array.from({ length: 40 }, (_, i) => `quotation number ${i}`);
      const path = await writeSource(testDir, "quotes", quotes, { index: false });

      await Promise.all(Array.from({ length: 6 }, () => ensureIndex(path, { rebuild: true })));

      const onDisk = decodeIndex(await readFile(indexPathFor(path)));
      expect(onDisk.header.numStrings).toBe(40);
      expect((await readdir(testDir)).sort()).toEqual(["quotes", "quotes.dat"]);
    });

    it("should take the offensive flag from the path unless given", async () => {
      const path = await writeSource(testDir, "rude-o", ["one"]);

      expect((await ensureIndex(path)).isOffensive).toBe(true);
      expect((await ensureIndex(path, { isOffensive: false })).isOffensive).toBe(false);
    });
  });

  describe("normalizeWeights", () => {
    it("should weight unweighted sources by entry count", () => {
      const result = normalizeWeights([fakeEntry("a", 10), fakeEntry("b", 30)]);
      expect(result.map((entry) => entry.probability)).toEqual([0.25, 0.75]);
    });

    it("should share the remaining mass after explicit weights", () => {
      const result = normalizeWeights([fakeEntry("a", 99, 0.5), fakeEntry("b", 1), fakeEntry("c", 3)]);
      expect(result.map((entry) => entry.probability)).toEqual([0.5, 0.125, 0.375]);
    });

    it("should split equally in equal mode", () => {
      const result = normalizeWeights([fakeEntry("a", 1), fakeEntry("b", 10), fakeEntry("c", 100)], "equal");
      for (const entry of result) {
        expect(entry.probability).toBeCloseTo(1 / 3, 12);
      }
    });

    it("should rescale when every source is explicitly weighted", () => {
      const result = normalizeWeights([fakeEntry("a", 5, 0.2), fakeEntry("b", 5, 0.3)]);
      expect(result[0]?.probability).toBeCloseTo(0.4, 12);
      expect(result[1]?.probability).toBeCloseTo(0.6, 12);
    });

    it("should reject explicit weights above 100%", () => {
      expect(() => normalizeWeights([fakeEntry("a", 1, 0.7), fakeEntry("b", 1, 0.4)])).toThrow(
        WeightOverflowError
      );
    });

    it("should reject a catalog with no weight at all", () => {
      expect(() => normalizeWeights([fakeEntry("a", 3, 0)])).toThrow(InvalidWeightError);
    });

    it("should not mutate its input", () => {
      const entries = [fakeEntry("a", 1)];
      normalizeWeights(entries);
      expect(entries[0]?.probability).toBe(0);
    });
  });

  describe("discover", () => {
    it("should load every corpus in a directory in name order", async () => {
      await writeSource(testDir, "zebra", ["z"]);
      await writeSource(testDir, "apple", ["a1", "a2", "a3"]);

      const catalog = await discover([testDir]);

      expect(catalog.entries.map((entry) => entry.path)).toEqual([join(testDir, "apple"), join(testDir, "zebra")]);
      expect(catalog.entries.map((entry) => entry.probability)).toEqual([0.75, 0.25]);
    });

    it("should apply percentage prefixes", async () => {
      const a = await writeSource(testDir, "a", ["a1"]);
      const b = await writeSource(testDir, "b", ["b1", "b2"]);

      const catalog = await discover(["30%", a, b]);

      expect(catalog.entries.map((entry) => [entry.path, entry.weight])).toEqual([
        [a, 0.3],
        [b, null],
      ]);
      expect(catalog.entries[1]?.probability).toBeCloseTo(0.7, 12);
    });

    it("should split a directory's percentage across its files", async () => {
      const dir = join(testDir, "set");
      await mkdir(dir);
      await writeSource(dir, "x", ["x1"]);
      await writeSource(dir, "y", ["y1"]);
      const other = await writeSource(testDir, "other", ["o1"]);

      const catalog = await discover(["50%", dir, other]);

      expect(catalog.entries.map((entry) => entry.weight)).toEqual([0.25, 0.25, null]);
      expect(catalog.entries[2]?.probability).toBeCloseTo(0.5, 12);
    });

    it("should accept pre-parsed specs", async () => {
      const a = await writeSource(testDir, "a", ["a1"]);

      const catalog = await discover([{ path: a, weight: 1 }]);

      expect(catalog.entries[0]?.probability).toBe(1);
    });

    it("should drop duplicate paths", async () => {
      const a = await writeSource(testDir, "a", ["a1"]);

      const catalog = await discover([a, testDir, a]);

      expect(catalog.entries).toHaveLength(1);
    });

    it("should skip offensive sources by default", async () => {
      await writeSource(testDir, "clean", ["c"]);
      await writeSource(testDir, "rude-o", ["r"]);
      await mkdir(join(testDir, "off"));
      await writeSource(join(testDir, "off"), "worse", ["w"]);

      const catalog = await discover([testDir]);

      expect(catalog.entries.map((entry) => entry.path)).toEqual([join(testDir, "clean")]);
    });

    it("should include the off/ directory when offensive sources are allowed", async () => {
      await writeSource(testDir, "clean", ["c"]);
      await writeSource(testDir, "rude-o", ["r"]);
      await mkdir(join(testDir, "off"));
      await writeSource(join(testDir, "off"), "worse", ["w"]);

      const all = await discover([testDir], { offensive: "include" });
      const only = await discover([testDir], { offensive: "only" });

      expect(all.entries.map((entry) => entry.path)).toEqual([
        join(testDir, "clean"),
        join(testDir, "rude-o"),
        join(testDir, "off", "worse"),
      ]);
      expect(only.entries.map((entry) => entry.path)).toEqual([
        join(testDir, "rude-o"),
        join(testDir, "off", "worse"),
      ]);
    });

    it("should fall back to the -o alternate of a missing path", async () => {
      await writeSource(testDir, "rude-o", ["r"]);

      const catalog = await discover([join(testDir, "rude")], { offensive: "include" });

      expect(catalog.entries.map((entry) => entry.path)).toEqual([join(testDir, "rude-o")]);
    });

    it("should drop empty corpora", async () => {
      await writeFile(join(testDir, "empty"), "");
      await writeSource(testDir, "full", ["f"]);

      const catalog = await discover([testDir]);

      expect(catalog.entries.map((entry) => entry.path)).toEqual([join(testDir, "full")]);
    });

    it("should report what was searched when nothing is usable", async () => {
      const missing = join(testDir, "missing");

      const error = await discover([missing]).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NoSourcesFoundError);
      expect(error).toMatchObject({ searched: [missing] });
    });

    it("should expand 'all' over the search path", async () => {
      const first = join(testDir, "first");
      const second = join(testDir, "second");
      await mkdir(first);
      await mkdir(second);
      await writeSource(first, "a", ["a1"]);
      await writeSource(second, "b", ["b1"]);

      const catalog = await discover(["all"], { searchPath: [first, join(testDir, "nope"), second] });

      expect(catalog.entries.map((entry) => entry.path)).toEqual([join(first, "a"), join(second, "b")]);
    });

    describe("default search", () => {
      it("should prefer locale subdirectories", async () => {
        await writeSource(testDir, "english", ["e"]);
        await mkdir(join(testDir, "de"));
        await writeSource(join(testDir, "de"), "deutsch", ["d"]);

        const catalog = await discover([], { searchPath: [testDir], locales: ["de_DE", "de"] });

        expect(catalog.entries.map((entry) => entry.path)).toEqual([join(testDir, "de", "deutsch")]);
      });

      it("should use the base directory when no locale matches", async () => {
        await writeSource(testDir, "english", ["e"]);

        const catalog = await discover([], { searchPath: [testDir], locales: ["fr"] });

        expect(catalog.entries.map((entry) => entry.path)).toEqual([join(testDir, "english")]);
      });

      it("should move on to the next search directory", async () => {
        const empty = join(testDir, "empty");
        const full = join(testDir, "full");
        await mkdir(empty);
        await mkdir(full);
        await writeSource(full, "q", ["q1"]);

        const catalog = await discover([], { searchPath: [empty, full], locales: [] });

        expect(catalog.entries.map((entry) => entry.path)).toEqual([join(full, "q")]);
      });

      it("should list every candidate when nothing is found", async () => {
        const error = await discover([], { searchPath: [testDir], locales: ["en"] }).catch(
          (err: unknown) => err
        );

        expect(error).toBeInstanceOf(NoSourcesFoundError);
        expect(error).toMatchObject({ searched: [join(testDir, "en"), testDir] });
      });
    });
  });
});
