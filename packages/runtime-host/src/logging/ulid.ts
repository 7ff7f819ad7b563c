/**
 * DDM Status Runtime Host — ULID Generator
 *
 * 26-character Crockford Base32 identifiers: 10 characters of millisecond
 * timestamp followed by 16 characters (80 bits) of randomness.
 *
 * Used as event_id in the status history so the reader can drop lines that
 * were duplicated, e.g. when a home directory is restored from a backup over
 * a partially written log.
 *
 * Generators are monotonic: two ids minted in the same millisecond by the
 * same generator increment the random part instead of re-rolling it, so ids
 * from one process always sort in creation order.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford's alphabet: no I, L, O or U. */
const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_LENGTH = 10;
const RANDOM_LENGTH = 16;
const RANDOM_BITS = BigInt(80);
const RANDOM_MAX = (BigInt(1) << RANDOM_BITS) - BigInt(1);

function encode(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = ALPHABET.charAt(Number(v & BigInt(0x1f))) + out;
    v >>= BigInt(5);
  }
  return out;
}

function randomComponent(): bigint {
  return BigInt('0x' + randomBytes(10).toString('hex'));
}

export type UlidGenerator = () => string;

/**
 * Create a monotonic ULID generator.
 *
 * @param now - Millisecond clock, injectable for deterministic tests
 * @param random - Source of 80-bit random values, injectable likewise
 */
export function createUlidGenerator(
  now: () => number = Date.now,
  random: () => bigint = randomComponent,
): UlidGenerator {
  let lastTime = -1;
  let lastRandom = BigInt(0);

  return () => {
    const time = now();
    if (time === lastTime && lastRandom < RANDOM_MAX) {
      lastRandom += BigInt(1);
    } else {
      lastTime = time;
      lastRandom = random() & RANDOM_MAX;
    }
    return encode(BigInt(time), TIME_LENGTH) + encode(lastRandom, RANDOM_LENGTH);
  };
}

/** Process-wide generator. */
export const ulid: UlidGenerator = createUlidGenerator();
