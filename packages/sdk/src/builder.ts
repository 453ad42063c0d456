/**
 * Index builder: scans corpus text into a header and offset table
 *
 * Invariants:
 * - A delimiter line is a line holding only the delimiter byte (optionally followed by \r)
 * - A trailing delimiter line terminates the last quotation; it never opens an empty one
 * - The offset table always ends with the text's byte length
 */

import { DEFAULT_DELIMITER, INDEX_VERSION, IndexFlags } from "./codec.js";
import { SystemRandom, shuffle } from "./rng.js";
import type { BuildOptions, BuiltIndex, IndexHeader } from "./types.js";

const LF = 0x0a;
const CR = 0x0d;

export interface EntrySpan {
  start: number;
  end: number;
}

const decoder = new TextDecoder("utf-8");

/**
 * End of the line starting at `cursor` (index of its \n, or the text length)
 */
function lineEnd(text: Uint8Array, cursor: number): number {
  const idx = text.indexOf(LF, cursor);
  return idx === -1 ? text.length : idx;
}

function isDelimiterLine(text: Uint8Array, cursor: number, end: number, delimiter: number): boolean {
  let contentEnd = end;
  if (contentEnd > cursor && text[contentEnd - 1] === CR) {
    contentEnd--;
  }
  return contentEnd - cursor === 1 && text[cursor] === delimiter;
}

/**
 * Split corpus text into quotation spans
 */
export function parseEntrySpans(
  text: Uint8Array,
  delimiter: number = DEFAULT_DELIMITER,
  allowEmpty = false
): EntrySpan[] {
  const spans: EntrySpan[] = [];
  let cursor = 0;
  let start = 0;

  while (cursor < text.length) {
    const end = lineEnd(text, cursor);
    const next = end < text.length ? end + 1 : end;

    if (isDelimiterLine(text, cursor, end, delimiter)) {
      if (allowEmpty || cursor > start) {
        spans.push({ start, end: cursor });
      }
      start = next;
    }

    cursor = next;
  }

  if (start < text.length) {
    spans.push({ start, end: text.length });
  }

  return spans;
}

/**
 * Locate the quotation beginning at `start`: it runs to the next delimiter line or end of text
 */
export function entrySpan(text: Uint8Array, start: number, delimiter: number = DEFAULT_DELIMITER): EntrySpan {
  let cursor = start;
  while (cursor < text.length) {
    const end = lineEnd(text, cursor);
    if (isDelimiterLine(text, cursor, end, delimiter)) {
      return { start, end: cursor };
    }
    cursor = end < text.length ? end + 1 : end;
  }
  return { start, end: text.length };
}

/**
 * Byte length of the quotation at `start`
 */
export function entryLength(text: Uint8Array, start: number, delimiter: number = DEFAULT_DELIMITER): number {
  const span = entrySpan(text, start, delimiter);
  return span.end - span.start;
}

/**
 * Decode the quotation at `start` as UTF-8 (invalid sequences become U+FFFD)
 */
export function entryText(text: Uint8Array, start: number, delimiter: number = DEFAULT_DELIMITER): string {
  const span = entrySpan(text, start, delimiter);
  return decoder.decode(text.subarray(span.start, span.end));
}

/**
 * ROT13 over ASCII letters
 */
export function rot13(input: string): string {
  return input.replace(/[a-zA-Z]/g, (ch) => {
    const base = ch <= "Z" ? 65 : 97;
    return String.fromCharCode(((ch.charCodeAt(0) - base + 13) % 26) + base);
  });
}

/**
 * Build a header and offset table for corpus text
 */
export function buildIndex(sourceText: Uint8Array, options: BuildOptions = {}): BuiltIndex {
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  const spans = parseEntrySpans(sourceText, delimiter, options.allowEmpty ?? false);

  let longest = 0;
  let shortest = spans.length > 0 ? Number.MAX_SAFE_INTEGER : 0;
  for (const span of spans) {
    const length = span.end - span.start;
    longest = Math.max(longest, length);
    shortest = Math.min(shortest, length);
  }

  const starts = spans.map((span) => span.start);
  let flags: number;
  if (options.randomize) {
    shuffle(starts, options.random ?? new SystemRandom());
    flags = IndexFlags.RANDOM;
  } else {
    flags = IndexFlags.ORDERED;
  }
  if (options.rotated) {
    flags |= IndexFlags.ROTATED;
  }

  const header: IndexHeader = {
    version: INDEX_VERSION,
    numStrings: spans.length,
    longestLen: longest,
    shortestLen: shortest,
    flags,
    delimChar: delimiter,
  };

  return {
    header,
    offsets: [...starts, sourceText.length],
    stats: { count: spans.length, longest, shortest },
  };
}
