/**
 * Random Sources
 *
 * Seeded and cryptographic implementations of RandomSource. Both draw
 * 32-bit words and turn them into uniform bigints over any inclusive range
 * by rejection sampling, so ranges wider than 2^32 stay uniform.
 */

import { webcrypto } from 'crypto';
import type { RandomSource } from '../types.js';
import { invalidConfigError, invalidRangeError } from '../errors.js';

/**
 * Draw a uniform bigint from [lo, hi] using a 32-bit word generator
 *
 * Takes just enough words to cover the bit length of the range, masks off
 * the excess bits and retries out-of-range candidates. Each retry succeeds
 * with probability above 1/2.
 *
 * @throws IdentityTestingError (INVALID_RANGE) if hi < lo
 */
export function uniformBigInt(nextUint32: () => number, lo: bigint, hi: bigint): bigint {
  if (hi < lo) {
    throw invalidRangeError(lo, hi);
  }

  const span = hi - lo + 1n;
  if (span === 1n) {
    return lo;
  }

  const bits = (span - 1n).toString(2).length;
  const words = Math.ceil(bits / 32);
  const mask = (1n << BigInt(bits)) - 1n;

  for (;;) {
    let candidate = 0n;
    for (let i = 0; i < words; i++) {
      candidate = (candidate << 32n) | BigInt(nextUint32());
    }
    candidate &= mask;
    if (candidate < span) {
      return lo + candidate;
    }
  }
}

/**
 * Random source that can be replayed from its seed
 */
export interface SeededRandomSource extends RandomSource {
  /** The seed this source was created with */
  readonly seed: number;
}

/**
 * Create a Mulberry32 random source seeded once
 *
 * Keep one instance per process or per test and pass it to every call.
 * Re-seeding per call from a coarse clock makes successive trials
 * correlated.
 *
 * @param seed - Any integer; only its low 32 bits are used
 */
export function createSeededRandomSource(seed: number): SeededRandomSource {
  let state = seed >>> 0;

  const nextUint32 = (): number => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return (t ^ (t >>> 14)) >>> 0;
  };

  return {
    seed,
    nextInt: (lo, hi) => uniformBigInt(nextUint32, lo, hi),
  };
}

/**
 * Largest block getRandomValues fills in one call (65,536 bytes of 32-bit words)
 */
export const MAX_CRYPTO_BLOCK_SIZE = 16384;

/**
 * Create a random source backed by Web Crypto getRandomValues
 *
 * Words are fetched in blocks to avoid a system call per draw.
 *
 * @throws IdentityTestingError (INVALID_CONFIG) unless blockSize is an integer in [1, MAX_CRYPTO_BLOCK_SIZE]
 */
export function createCryptoRandomSource(blockSize = 256): RandomSource {
  if (!Number.isSafeInteger(blockSize) || blockSize < 1 || blockSize > MAX_CRYPTO_BLOCK_SIZE) {
    throw invalidConfigError('blockSize', blockSize);
  }
  const block = new Uint32Array(blockSize);
  let offset = blockSize;

  const nextUint32 = (): number => {
    if (offset >= block.length) {
      webcrypto.getRandomValues(block);
      offset = 0;
    }
    return block[offset++];
  };

  return {
    nextInt: (lo, hi) => uniformBigInt(nextUint32, lo, hi),
  };
}
