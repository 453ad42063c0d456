/**
 * Binary codec for `.dat` index files
 *
 * Layout (all integers big-endian):
 *   version u32 | numStrings u32 | longestLen u32 | shortestLen u32 | flags u32 |
 *   delimChar u8 + 3 zero bytes | offsets u32 × (numStrings + 1)
 *
 * The final offset is the byte length of the source text.
 */

import { CorruptIndexError } from "./errors.js";
import type { DecodedIndex, IndexHeader, OffsetTable } from "./types.js";

export const INDEX_VERSION = 2;

export const HEADER_SIZE = 24;

export const DEFAULT_DELIMITER = 0x25; // "%"

export const IndexFlags = {
  RANDOM: 0x1,
  ORDERED: 0x2,
  ROTATED: 0x4,
} as const;

const U32_MAX = 0xffffffff;

/**
 * Path of the index sidecar for a corpus text file
 */
export function indexPathFor(textPath: string): string {
  return `${textPath}.dat`;
}

export function hasFlag(header: IndexHeader, flag: number): boolean {
  return (header.flags & flag) !== 0;
}

/**
 * Serialize a header and offset table
 * @throws CorruptIndexError if the table length disagrees with the header or a value is not a u32
 */
export function encodeIndex(header: IndexHeader, offsets: OffsetTable): Uint8Array {
  if (offsets.length !== header.numStrings + 1) {
    throw new CorruptIndexError(
      `offset table has ${offsets.length} entries, expected ${header.numStrings + 1}`
    );
  }

  const fields = [header.version, header.numStrings, header.longestLen, header.shortestLen, header.flags];
  for (const value of [...fields, ...offsets]) {
    if (!isU32(value)) {
      throw new CorruptIndexError(`value ${value} does not fit in an unsigned 32-bit field`);
    }
  }
  if (!Number.isInteger(header.delimChar) || header.delimChar < 0 || header.delimChar > 0xff) {
    throw new CorruptIndexError(`delimiter ${header.delimChar} is not a single byte`);
  }

  const bytes = new Uint8Array(HEADER_SIZE + offsets.length * 4);
  const view = new DataView(bytes.buffer);

  fields.forEach((value, i) => view.setUint32(i * 4, value, false));
  view.setUint8(20, header.delimChar);
  // bytes 21..23 stay zero

  offsets.forEach((offset, i) => view.setUint32(HEADER_SIZE + i * 4, offset, false));

  return bytes;
}

/**
 * Parse index bytes
 * @throws CorruptIndexError for truncated data or out-of-order offsets
 */
export function decodeIndex(bytes: Uint8Array, path?: string): DecodedIndex {
  if (bytes.length < HEADER_SIZE) {
    throw new CorruptIndexError(`${bytes.length} bytes is shorter than the ${HEADER_SIZE}-byte header`, path);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  const header: IndexHeader = {
    version: view.getUint32(0, false),
    numStrings: view.getUint32(4, false),
    longestLen: view.getUint32(8, false),
    shortestLen: view.getUint32(12, false),
    flags: view.getUint32(16, false),
    delimChar: view.getUint8(20),
  };

  const tableLength = header.numStrings + 1;
  const available = Math.floor((bytes.length - HEADER_SIZE) / 4);
  if (tableLength > available) {
    throw new CorruptIndexError(
      `header declares ${header.numStrings} strings but only ${available} offsets are present`,
      path
    );
  }

  const offsets: number[] = new Array(tableLength);
  for (let i = 0; i < tableLength; i++) {
    offsets[i] = view.getUint32(HEADER_SIZE + i * 4, false);
  }

  validateOffsets(header, offsets, path);

  return { header, offsets };
}

/**
 * Check ordering of an offset table
 *
 * Shuffled (RANDOM) tables only require every entry to sit at or before the end sentinel.
 */
export function validateOffsets(header: IndexHeader, offsets: OffsetTable, path?: string): void {
  const end = offsets[offsets.length - 1] ?? 0;

  if (hasFlag(header, IndexFlags.RANDOM)) {
    for (let i = 0; i < offsets.length - 1; i++) {
      const offset = offsets[i] ?? 0;
      if (offset > end) {
        throw new CorruptIndexError(`offset ${offset} at position ${i} is past end offset ${end}`, path);
      }
    }
    return;
  }

  for (let i = 1; i < offsets.length; i++) {
    const prev = offsets[i - 1] ?? 0;
    const current = offsets[i] ?? 0;
    if (current < prev) {
      throw new CorruptIndexError(`offset ${current} at position ${i} precedes ${prev}`, path);
    }
  }
}

function isU32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= U32_MAX;
}
