/**
 * Crucible Runtime Host — ULID Generator
 *
 * 26-character Crockford Base32 identifiers: 10 characters of millisecond
 * timestamp followed by 16 characters of cryptographic randomness. Used as
 * `event_id` in events.jsonl so lines sort by creation time.
 *
 * The random part is not incremented within a millisecond; ordering of two
 * events from the same millisecond is unspecified.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford's alphabet excludes I, L, O and U. */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const BITS_PER_CHAR = 5;
const TIME_CHARS = 10;
const RANDOM_CHARS = 16;

/** Encode exactly `length` characters, zero-padded on the left. */
function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & BigInt(0x1f))) + out;
    v >>= BigInt(BITS_PER_CHAR);
  }
  return out;
}

/**
 * @example
 * ulid(); // e.g. '01JDKPF8X7M4VQN3BGHST6RWYZ'
 */
export function ulid(now: number = Date.now()): string {
  const timePart = encodeCrockford(BigInt(now), TIME_CHARS);

  let randValue = BigInt(0);
  for (const byte of randomBytes(10)) {
    randValue = (randValue << BigInt(8)) | BigInt(byte);
  }
  return timePart + encodeCrockford(randValue, RANDOM_CHARS);
}
