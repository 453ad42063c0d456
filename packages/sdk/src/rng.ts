/**
 * Randomness providers
 *
 * The selection engine only sees the `RandomSource` capability; which provider
 * backs it is decided by `RngConfig`, resolved from the environment at the edge.
 */

import { randomFillSync } from "node:crypto";
import type { RandomSource, RngConfig } from "./types.js";

const U32_RANGE = 0x1_0000_0000;

/**
 * Seed used by `SeededRandom` when none is given
 */
export const FIXED_SEED = 0x5eed;

function assertBound(bound: number): void {
  if (!Number.isInteger(bound) || bound <= 0 || bound > U32_RANGE) {
    throw new RangeError(`Random bound must be an integer in [1, 2^32], got ${bound}`);
  }
}

/**
 * Reduce a uniform u32 stream to [0, bound) without modulo bias
 */
function below(next: () => number, bound: number): number {
  assertBound(bound);
  const limit = U32_RANGE - (U32_RANGE % bound);
  let value = next();
  while (value >= limit) {
    value = next();
  }
  return value % bound;
}

/**
 * Uniform draws from the OS entropy source
 */
export class SystemRandom implements RandomSource {
  #pool = new Uint32Array(256);
  #cursor = this.#pool.length;

  nextU32(): number {
    if (this.#cursor >= this.#pool.length) {
      randomFillSync(this.#pool);
      this.#cursor = 0;
    }
    return this.#pool[this.#cursor++] ?? 0;
  }

  nextU32Below(bound: number): number {
    return below(() => this.nextU32(), bound);
  }
}

/**
 * Replays a fixed list of values in a cycle; for parity testing only
 *
 * Bounded draws are `value % bound`, so the default `[0]` always yields 0.
 */
export class HardCodedRandom implements RandomSource {
  readonly #values: readonly number[];
  #index = 0;

  constructor(values: readonly number[] = [0]) {
    if (values.length === 0) {
      throw new RangeError("HardCodedRandom needs at least one value");
    }
    for (const value of values) {
      if (!Number.isSafeInteger(value) || value < 0) {
        throw new RangeError(`Hard-coded random values must be non-negative integers, got ${value}`);
      }
    }
    this.#values = [...values];
  }

  #next(): number {
    const value = this.#values[this.#index % this.#values.length] ?? 0;
    this.#index++;
    return value;
  }

  nextU32(): number {
    return this.#next() % U32_RANGE;
  }

  nextU32Below(bound: number): number {
    assertBound(bound);
    return this.#next() % bound;
  }
}

/**
 * Mulberry32 generator; the same seed always produces the same sequence
 */
export class SeededRandom implements RandomSource {
  #state: number;

  constructor(seed: number = FIXED_SEED) {
    this.#state = seed >>> 0;
  }

  nextU32(): number {
    this.#state = (this.#state + 0x6d2b79f5) >>> 0;
    let t = this.#state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  nextU32Below(bound: number): number {
    return below(() => this.nextU32(), bound);
  }
}

/**
 * Instantiate the provider described by a config
 */
export function createRandomSource(config: RngConfig = { kind: "system" }): RandomSource {
  switch (config.kind) {
    case "hardcoded":
      return new HardCodedRandom(config.values);
    case "seeded":
      return new SeededRandom(config.seed);
    case "system":
      return new SystemRandom();
  }
}

/**
 * In-place Fisher-Yates shuffle
 */
export function shuffle<T>(items: T[], random: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = random.nextU32Below(i + 1);
    const a = items[i];
    const b = items[j];
    if (a === undefined || b === undefined) continue;
    items[i] = b;
    items[j] = a;
  }
  return items;
}
