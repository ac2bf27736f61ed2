/**
 * Plinth Kernel — Value Types
 *
 * Branded hex types shared by every package. A branded value can only be
 * produced by the guards in this file (or the codec built on them), so a
 * plain string can never stand in for an address or a content hash.
 *
 * Canonical form is lowercase: two values are equal iff their strings are
 * equal. Comparison is exact-equality only.
 */

// ---------------------------------------------------------------------------
// Branded Types
// ---------------------------------------------------------------------------

declare const __addressBrand: unique symbol;
declare const __bytes32Brand: unique symbol;

/** Any `0x`-prefixed byte string. Length and case are not constrained. */
export type Hex = `0x${string}`;

/**
 * A 20-byte account address, lowercase, `0x`-prefixed.
 * Produced by asAddress() or by the execution host at deploy time.
 */
export type Address = Hex & {
  readonly [__addressBrand]: 'Address';
};

/**
 * A 32-byte word, lowercase, `0x`-prefixed.
 *
 * Used for code fingerprints (DistributionId) and for derived registry keys
 * (DistributorsId). Both are opaque: only equality is meaningful.
 */
export type Bytes32 = Hex & {
  readonly [__bytes32Brand]: 'Bytes32';
};

/** Content fingerprint of deployed code: SHA-256 over the bytecode. */
export type Fingerprint = Bytes32;

/** A 4-byte function selector. Carried through the admission hooks untouched. */
export type Selector = Hex;

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

const HEX_PATTERN = /^0x(?:[0-9a-fA-F]{2})*$/;
const ADDRESS_PATTERN = /^0x[0-9a-f]{40}$/;
const BYTES32_PATTERN = /^0x[0-9a-f]{64}$/;

/** True for a `0x`-prefixed string with an even number of hex digits. */
export function isHex(value: unknown): value is Hex {
  return typeof value === 'string' && HEX_PATTERN.test(value);
}

/** True for a canonical (lowercase) address. */
export function isAddress(value: unknown): value is Address {
  return typeof value === 'string' && ADDRESS_PATTERN.test(value);
}

/** True for a canonical (lowercase) 32-byte word. */
export function isBytes32(value: unknown): value is Bytes32 {
  return typeof value === 'string' && BYTES32_PATTERN.test(value);
}

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

/** Semantic version reported by a code module for the bundle it produces. */
export interface Version {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

export function formatVersion(version: Version): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Parse a `major.minor.patch` string. Returns undefined for anything else,
 * including pre-release or build suffixes.
 */
export function parseVersion(value: string): Version | undefined {
  const match = /^(\d+)\.(\d+)\.(\d+)$/.exec(value.trim());
  if (match === null) return undefined;
  const [, major, minor, patch] = match;
  return { major: Number(major), minor: Number(minor), patch: Number(patch) };
}
