/**
 * File system test utilities
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { buildIndex, encodeIndex, indexPathFor } from "@fortunate/sdk";
import type { BuildOptions } from "@fortunate/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "fortune-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "fortune-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Join quotations into corpus text: each ends with a newline, separated by "%" lines
 */
export function corpusText(quotes: readonly string[], delimiter = "%"): string {
  return quotes.map((quote) => (quote.endsWith("\n") ? quote : `${quote}\n`)).join(`${delimiter}\n`);
}

export interface WriteCorpusOptions extends Omit<BuildOptions, "delimiter"> {
  /** Also write the `.dat` sidecar (default true) */
  index?: boolean;
  /** Delimiter character (default "%") */
  delimiter?: string;
}

/**
 * Write a corpus file (and by default its index) under `dir`
 * @returns Path of the text file
 */
export async function writeCorpus(
  dir: string,
  name: string,
  quotes: readonly string[],
  options: WriteCorpusOptions = {}
): Promise<string> {
  const { index = true, delimiter = "%", ...buildOptions } = options;
  const textPath = join(dir, name);
  const text = Buffer.from(corpusText(quotes, delimiter), "utf-8");

  await mkdir(dirname(textPath), { recursive: true });
  await writeFile(textPath, text);

  if (index) {
    const built = buildIndex(text, { ...buildOptions, delimiter: delimiter.charCodeAt(0) });
    await writeFile(indexPathFor(textPath), encodeIndex(built.header, built.offsets));
  }

  return textPath;
}
