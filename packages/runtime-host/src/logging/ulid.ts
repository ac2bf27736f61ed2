/**
 * Plinth Runtime Host — ULID Generator
 *
 * 26 characters of Crockford Base32:
 *   - 10 chars: 48-bit millisecond timestamp (lexicographically sortable)
 *   - 16 chars: 80 random bits
 *
 * Used as `event_id` in events.jsonl so that log files merged from several
 * copies of a home directory can be deduplicated on read.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;

export type RandomSource = (size: number) => Uint8Array;

function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & 0x1fn)) + out;
    v >>= 5n;
  }
  return out;
}

/**
 * Generate a ULID.
 *
 * Both inputs are injectable so tests can pin the output. The random part is
 * not incremented within a millisecond; ordering within one ms is arbitrary.
 */
export function ulid(nowMs: number = Date.now(), random: RandomSource = randomBytes): string {
  let randValue = 0n;
  for (const byte of random(RANDOM_BYTES)) {
    randValue = (randValue << 8n) | BigInt(byte);
  }
  return encodeCrockford(BigInt(nowMs), TIME_CHARS) + encodeCrockford(randValue, RANDOM_CHARS);
}
