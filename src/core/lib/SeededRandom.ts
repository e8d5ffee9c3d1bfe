import { Clock, Effect } from "effect";

const U64_RANGE = 1n << 64n;

// xorshift64 cannot leave the all-zero state
const ZERO_STATE_REPLACEMENT = 0xa5a5a5a55a5a5a5an;

const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;

/**
 * xorshift64 generator. The seed is the initial state, so a seed reproduces
 * the same sequence in any xorshift64 implementation. One instance per
 * distribution run, passed explicitly.
 */
export class SeededRandom {
  private state: bigint;

  constructor(seed: bigint) {
    const state = BigInt.asUintN(64, seed);
    this.state = state === 0n ? ZERO_STATE_REPLACEMENT : state;
  }

  nextU64(): bigint {
    let x = this.state;
    x = BigInt.asUintN(64, x ^ (x << 13n));
    x ^= x >> 7n;
    x = BigInt.asUintN(64, x ^ (x << 17n));
    this.state = x;
    return x;
  }

  /**
   * Uniform integer in [0, bound). Draws below 2^64 mod bound are rejected so
   * every residue is equally likely.
   */
  nextIndex(bound: number): number {
    if (!Number.isSafeInteger(bound) || bound < 1) {
      throw new RangeError(`bound must be a positive safe integer, got ${bound}`);
    }

    const n = BigInt(bound);
    const threshold = U64_RANGE % n;

    for (;;) {
      const x = this.nextU64();
      if (x >= threshold) {
        return Number(x % n);
      }
    }
  }
}

/**
 * In-place Fisher–Yates shuffle, walking from the last index down.
 */
export const shuffleInPlace = <A extends object>(items: A[], rng: SeededRandom): A[] => {
  for (let i = items.length - 1; i > 0; i--) {
    const j = rng.nextIndex(i + 1);
    const current = items[i];
    const swapWith = items[j];
    if (current === undefined || swapWith === undefined) continue;
    items[i] = swapWith;
    items[j] = current;
  }
  return items;
};

/**
 * Seed for runs that did not supply one: wall-clock nanoseconds mixed with the pid.
 */
export const generateSeed: Effect.Effect<bigint> = Effect.map(Clock.currentTimeNanos, (nanos) =>
  BigInt.asUintN(64, nanos ^ BigInt.asUintN(64, BigInt(process.pid) * GOLDEN_GAMMA))
);
