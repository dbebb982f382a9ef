/**
 * Bech32 / Bech32m Encoding
 * BIP-173 and BIP-350 codecs with explicit variant reporting
 */

import { BECH32_MAX_LENGTH } from '../constants';
import { hexToBytes } from './utils';

// =============================================================================
// Constants
// =============================================================================

/** Bech32 character set for encoding */
export const CHARSET = 'qpzry9x8gf2tvdw0s3jn54khce6mua7l';

/** Generator polynomial for checksum */
const GENERATOR = [0x3b6a57b2, 0x26508e6d, 0x1ea119fa, 0x3d4233dd, 0x2a1462b3];

export type Bech32Variant = 'bech32' | 'bech32m';

const CHECKSUM_CONSTANTS: Record<Bech32Variant, number> = {
  bech32: 1,
  bech32m: 0x2bc830a3,
};

export interface Bech32Decoded {
  /** Always lower-cased */
  hrp: string;
  /** 5-bit groups, checksum removed */
  words: number[];
  variant: Bech32Variant;
}

export interface Bech32BytesDecoded {
  hrp: string;
  data: Uint8Array;
  variant: Bech32Variant;
}

// =============================================================================
// Bit Conversion
// =============================================================================

/**
 * Regroup values between bit widths.
 * With `pad` the trailing partial group is zero-filled; without it any
 * leftover bits must be fewer than `fromBits` and all zero.
 */
export function convertBits(
  data: ArrayLike<number>,
  fromBits: number,
  toBits: number,
  pad: boolean,
): number[] | null {
  let acc = 0;
  let bits = 0;
  const ret: number[] = [];
  const maxv = (1 << toBits) - 1;

  for (let i = 0; i < data.length; i++) {
    const value = data[i];
    if (value < 0 || value >> fromBits !== 0) {
      return null;
    }
    acc = (acc << fromBits) | value;
    bits += fromBits;
    while (bits >= toBits) {
      bits -= toBits;
      ret.push((acc >> bits) & maxv);
    }
    acc &= (1 << bits) - 1;
  }

  if (pad) {
    if (bits > 0) {
      ret.push((acc << (toBits - bits)) & maxv);
    }
  } else if (bits >= fromBits || ((acc << (toBits - bits)) & maxv) !== 0) {
    return null;
  }

  return ret;
}

// =============================================================================
// Checksum
// =============================================================================

function polymod(values: number[]): number {
  let chk = 1;
  for (const value of values) {
    const top = chk >> 25;
    chk = ((chk & 0x1ffffff) << 5) ^ value;
    for (let i = 0; i < 5; i++) {
      if ((top >> i) & 1) {
        chk ^= GENERATOR[i];
      }
    }
  }
  return chk;
}

function hrpExpand(hrp: string): number[] {
  const ret: number[] = [];
  for (let i = 0; i < hrp.length; i++) {
    ret.push(hrp.charCodeAt(i) >> 5);
  }
  ret.push(0);
  for (let i = 0; i < hrp.length; i++) {
    ret.push(hrp.charCodeAt(i) & 31);
  }
  return ret;
}

function createChecksum(hrp: string, words: number[], variant: Bech32Variant): number[] {
  const values = [...hrpExpand(hrp), ...words, 0, 0, 0, 0, 0, 0];
  const mod = polymod(values) ^ CHECKSUM_CONSTANTS[variant];
  const ret: number[] = [];
  for (let p = 0; p < 6; p++) {
    ret.push((mod >> (5 * (5 - p))) & 31);
  }
  return ret;
}

function verifyChecksum(hrp: string, words: number[]): Bech32Variant | null {
  const check = polymod([...hrpExpand(hrp), ...words]);
  if (check === CHECKSUM_CONSTANTS.bech32) return 'bech32';
  if (check === CHECKSUM_CONSTANTS.bech32m) return 'bech32m';
  return null;
}

// =============================================================================
// Encode / Decode
// =============================================================================

/**
 * Encode 5-bit groups under the given HRP
 * @throws Error if the HRP is empty, a group is out of range, or the result exceeds `limit`
 */
export function bech32Encode(
  hrp: string,
  words: number[],
  variant: Bech32Variant = 'bech32',
  limit: number = BECH32_MAX_LENGTH,
): string {
  if (hrp.length === 0) {
    throw new Error('Invalid HRP: must not be empty');
  }
  for (let i = 0; i < hrp.length; i++) {
    const code = hrp.charCodeAt(i);
    if (code < 33 || code > 126) {
      throw new Error(`Invalid HRP character at position ${i}`);
    }
  }
  if (words.some((w) => w < 0 || w > 31)) {
    throw new Error('Invalid data: values must be 5-bit groups');
  }

  const lowerHrp = hrp.toLowerCase();
  const combined = [...words, ...createChecksum(lowerHrp, words, variant)];
  let result = lowerHrp + '1';
  for (const w of combined) {
    result += CHARSET[w];
  }

  if (result.length > limit) {
    throw new Error(`Bech32 string exceeds ${limit} characters`);
  }
  return result;
}

/**
 * Decode a Bech32 or Bech32m string, reporting which variant matched.
 * Returns null on any structural, case or checksum failure.
 */
export function bech32Decode(value: string, limit: number = BECH32_MAX_LENGTH): Bech32Decoded | null {
  if (value.length === 0 || value.length > limit) return null;

  let hasLower = false;
  let hasUpper = false;
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code < 33 || code > 126) return null;
    if (code >= 97 && code <= 122) hasLower = true;
    if (code >= 65 && code <= 90) hasUpper = true;
  }
  if (hasLower && hasUpper) return null;

  const lower = value.toLowerCase();
  const pos = lower.lastIndexOf('1');
  if (pos < 1 || pos + 7 > lower.length) return null;

  const hrp = lower.slice(0, pos);
  const words: number[] = [];
  for (let i = pos + 1; i < lower.length; i++) {
    const d = CHARSET.indexOf(lower[i]);
    if (d === -1) return null;
    words.push(d);
  }

  const variant = verifyChecksum(hrp, words);
  if (variant === null) return null;

  return { hrp, words: words.slice(0, -6), variant };
}

/**
 * Regroup bytes into 5-bit groups and encode them
 */
export function encodeBech32Bytes(
  hrp: string,
  data: Uint8Array | string,
  variant: Bech32Variant = 'bech32',
  limit?: number,
): string {
  const bytes = typeof data === 'string' ? hexToBytes(data) : data;
  const words = convertBits(bytes, 8, 5, true);
  if (!words) {
    throw new Error('Failed to convert bytes to 5-bit groups');
  }
  return bech32Encode(hrp, words, variant, limit);
}

/**
 * Decode a string whose data part is a byte payload (no witness version)
 */
export function decodeBech32Bytes(value: string, limit?: number): Bech32BytesDecoded | null {
  const decoded = bech32Decode(value, limit);
  if (!decoded) return null;
  const bytes = convertBits(decoded.words, 5, 8, false);
  if (!bytes) return null;
  return { hrp: decoded.hrp, data: Uint8Array.from(bytes), variant: decoded.variant };
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Check whether a string is valid Bech32 or Bech32m
 */
export function isValidBech32(value: string): boolean {
  return bech32Decode(value) !== null;
}

/**
 * Extract the lower-cased HRP, or null when the string does not decode
 */
export function getAddressHrp(value: string): string | null {
  return bech32Decode(value)?.hrp ?? null;
}
