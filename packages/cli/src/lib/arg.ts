/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  // Offsets and lengths are stored as u32
  if (parsed >= 0xffffffff) {
    throw new InvalidArgumentError(`${name} must be < 4294967295`);
  }

  return parsed;
}

/**
 * Parse a delimiter argument into its byte value
 */
export function parseDelimiter(value: string): number {
  const bytes = Buffer.from(value, "utf-8");
  const [byte] = bytes;
  if (bytes.length !== 1 || byte === undefined) {
    throw new InvalidArgumentError(`delimiter must be a single byte, got "${value}"`);
  }
  if (byte === 0x0a) {
    throw new InvalidArgumentError("delimiter cannot be a newline");
  }
  return byte;
}
