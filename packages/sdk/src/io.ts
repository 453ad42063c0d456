/**
 * File I/O for corpus text and index sidecars
 *
 * Invariants:
 * - Index writes are atomic: readers never observe a partially written `.dat`
 * - Temp files always reside in the same directory as the target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Directory listings are sorted for determinism
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import type { Stats } from "node:fs";
import { dirname, basename, join } from "node:path";
import { DirectoryError, IndexWriteError, SourceReadError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Files in a corpus directory that are never corpora themselves
 */
const IGNORED_SUFFIXES = [".dat", ".u8", ".tmp"];

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Atomically write bytes to a file using write-rename-sync
 * @throws IndexWriteError on any failure
 */
export async function atomicWrite(filePath: string, content: Uint8Array | string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content);

    // Sync file data to disk (prefer datasync, fall back to sync)
    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close_failed", { path: tmp, message: String(closeErr) });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      // ENOENT: the temp file was never created or was already renamed
      if (errorCode(unlinkErr) !== "ENOENT") {
        logger.debug("io.cleanup_failed", { path: tmp, message: String(unlinkErr) });
      }
    });

    throw new IndexWriteError(filePath, { cause: err });
  }
}

/**
 * Best-effort fsync of a directory after a rename
 */
async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Common on platforms without directory fsync: EINVAL, ENOTSUP, EBADF, EISDIR
    logger.debug("io.dir_fsync_failed", { path: dir, message: String(err) });
  }
}

/**
 * Read a corpus text file
 * @throws SourceReadError if the file cannot be read
 */
export async function readSource(filePath: string): Promise<Uint8Array> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    throw new SourceReadError(filePath, { cause: err });
  }
}

/**
 * Read an index file, returning null when it is missing or unreadable
 */
export async function readIndexBytes(filePath: string): Promise<Uint8Array | null> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (errorCode(err) !== "ENOENT") {
      logger.warn("index.unreadable", { path: filePath, message: String(err) });
    }
    return null;
  }
}

/**
 * stat() that returns null for missing paths
 */
export async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(filePath);
  } catch (err) {
    const code = errorCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return null;
    }
    throw new SourceReadError(filePath, { cause: err });
  }
}

/**
 * List the corpus files directly inside a directory
 * @returns Sorted absolute paths; dot-files, index sidecars and temp files are skipped
 * @throws DirectoryError if the directory cannot be read
 */
export async function listCorpusFiles(dirPath: string): Promise<string[]> {
  let names: string[];
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    names = entries
      .filter((entry) => entry.isFile() || entry.isSymbolicLink())
      .map((entry) => entry.name);
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }

  const files: string[] = [];
  for (const name of names.sort()) {
    if (name.startsWith(".") || IGNORED_SUFFIXES.some((suffix) => name.endsWith(suffix))) {
      continue;
    }
    const full = join(dirPath, name);
    // Symlinks count only when they resolve to a regular file
    const stats = await statOrNull(full);
    if (stats?.isFile()) {
      files.push(full);
    }
  }

  return files;
}
