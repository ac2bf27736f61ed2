/**
 * Plinth Kernel — Hex Codec
 *
 * Conversions between hex strings, bytes, and the branded value types, plus
 * the SHA-256 derivations the registry depends on:
 *
 *   fingerprint    = sha256(bytecode)
 *   deployAddress  = last20(sha256(word(deployer) ‖ word(nonce)))
 *   distributorsId = sha256(word(id) ‖ word(initializer ?? 0))
 *
 * `word(x)` is the 32-byte big-endian, left-padded encoding of x.
 * node:crypto is used for hashing only (pure computation, not I/O).
 */

import { createHash } from 'node:crypto';
import { EncodingError } from '../errors.js';
import type { Address, Bytes32, Fingerprint, Hex } from '../types/values.js';
import { isAddress, isBytes32, isHex } from '../types/values.js';

const WORD_BYTES = 32;
const ADDRESS_BYTES = 20;

/** The empty byte string. */
export const EMPTY_BYTES: Hex = '0x';

// ---------------------------------------------------------------------------
// Branded constructors
// ---------------------------------------------------------------------------

/**
 * Normalize a string to a canonical Address.
 *
 * Accepts mixed case. Throws EncodingError for anything that is not exactly
 * 20 bytes of hex.
 */
export function asAddress(value: string): Address {
  const lower = value.toLowerCase();
  if (!isAddress(lower)) {
    throw new EncodingError(`Not a 20-byte address: "${value}"`);
  }
  return lower;
}

/** Normalize a string to a canonical 32-byte word. */
export function asBytes32(value: string): Bytes32 {
  const lower = value.toLowerCase();
  if (!isBytes32(lower)) {
    throw new EncodingError(`Not a 32-byte word: "${value}"`);
  }
  return lower;
}

/** Validate an arbitrary byte string. Case is normalized to lowercase. */
export function asHex(value: string): Hex {
  const lower = value.toLowerCase();
  if (!isHex(lower)) {
    throw new EncodingError(`Not a hex byte string: "${value}"`);
  }
  return lower;
}

export const ZERO_ADDRESS: Address = asAddress('0x' + '00'.repeat(ADDRESS_BYTES));

// ---------------------------------------------------------------------------
// Bytes
// ---------------------------------------------------------------------------

export function hexToBytes(value: Hex): Buffer {
  if (!isHex(value)) {
    throw new EncodingError(`Not a hex byte string: "${value}"`);
  }
  return Buffer.from(value.slice(2), 'hex');
}

export function bytesToHex(bytes: Uint8Array): Hex {
  return asHex('0x' + Buffer.from(bytes).toString('hex'));
}

/** Number of bytes encoded by a hex string. */
export function byteLength(value: Hex): number {
  return (value.length - 2) / 2;
}

export function concatHex(...parts: ReadonlyArray<Hex>): Hex {
  return asHex('0x' + parts.map((p) => p.slice(2)).join(''));
}

export function utf8ToHex(text: string): Hex {
  return bytesToHex(Buffer.from(text, 'utf8'));
}

export function hexToUtf8(value: Hex): string {
  return hexToBytes(value).toString('utf8');
}

// ---------------------------------------------------------------------------
// Word encoding
// ---------------------------------------------------------------------------

/** Left-pad an address to a 32-byte word. */
export function addressWord(address: Address): Hex {
  return asHex('0x' + '00'.repeat(WORD_BYTES - ADDRESS_BYTES) + address.slice(2));
}

/** Big-endian 32-byte encoding of a non-negative integer. */
export function uintWord(value: number | bigint): Hex {
  const n = BigInt(value);
  if (n < 0n) {
    throw new EncodingError(`Cannot encode negative integer ${n.toString()}`);
  }
  const digits = n.toString(16);
  if (digits.length > WORD_BYTES * 2) {
    throw new EncodingError(`Integer ${n.toString()} does not fit in 32 bytes`);
  }
  return asHex('0x' + digits.padStart(WORD_BYTES * 2, '0'));
}

/**
 * Decode an address from hook configuration bytes.
 *
 * Two encodings are accepted: a raw 20-byte address, and a 32-byte word whose
 * upper 12 bytes are zero. Anything else throws EncodingError.
 */
export function decodeAddress(config: Hex): Address {
  const size = byteLength(config);
  if (size === ADDRESS_BYTES) {
    return asAddress(config);
  }
  if (size === WORD_BYTES) {
    const body = config.slice(2);
    const padding = body.slice(0, (WORD_BYTES - ADDRESS_BYTES) * 2);
    if (/^0*$/.test(padding)) {
      return asAddress('0x' + body.slice(padding.length));
    }
  }
  throw new EncodingError(
    `Expected a 20-byte address or a 32-byte address word, got ${size} bytes`,
  );
}

// ---------------------------------------------------------------------------
// Hashing
// ---------------------------------------------------------------------------

export function sha256(...parts: ReadonlyArray<Hex>): Bytes32 {
  const hash = createHash('sha256');
  for (const part of parts) {
    hash.update(hexToBytes(part));
  }
  return asBytes32('0x' + hash.digest('hex'));
}

/** Content fingerprint of a bytecode string. */
export function fingerprintOf(bytecode: Hex): Fingerprint {
  return sha256(bytecode);
}

/**
 * Deterministic address of the `nonce`-th deployment made by `deployer`.
 * The same (deployer, nonce) pair always yields the same address.
 */
export function deriveAddress(deployer: Address, nonce: number): Address {
  const digest = sha256(addressWord(deployer), uintWord(nonce));
  return asAddress('0x' + digest.slice(-ADDRESS_BYTES * 2));
}
