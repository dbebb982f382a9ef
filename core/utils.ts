/**
 * Core Utilities
 * Hex and Base58 codecs plus small byte helpers
 */

import { bytesToHex, hexToBytes } from '@noble/hashes/utils.js';

// =============================================================================
// Hex
// =============================================================================

const HEX_BODY = /^[0-9a-fA-F]*$/;

/**
 * Strip a leading "0x"/"0X" if present
 */
export function stripHexPrefix(value: string): string {
  return value.startsWith('0x') || value.startsWith('0X') ? value.slice(2) : value;
}

/**
 * Check whether a string is hex, with or without "0x".
 * Bare hex must have an even number of digits; prefixed hex only needs a body.
 */
export function isHexString(value: string): boolean {
  if (value.startsWith('0x') || value.startsWith('0X')) {
    const body = value.slice(2);
    return body.length > 0 && HEX_BODY.test(body);
  }
  return value.length > 0 && value.length % 2 === 0 && HEX_BODY.test(value);
}

/**
 * Decode hex (optionally "0x"-prefixed) into bytes, or null when malformed
 */
export function tryHexDecode(value: string): Uint8Array | null {
  const body = stripHexPrefix(value);
  if (body.length === 0 || body.length % 2 !== 0 || !HEX_BODY.test(body)) {
    return null;
  }
  return hexToBytes(body.toLowerCase());
}

// =============================================================================
// Base58
// =============================================================================

export const BASE58_ALPHABET = '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';

const BASE58_MAP: ReadonlyMap<string, number> = new Map(
  Array.from(BASE58_ALPHABET, (char, index) => [char, index] as const),
);

/**
 * Check whether every character belongs to the Base58 alphabet
 */
export function isBase58String(value: string): boolean {
  if (value.length === 0) return false;
  for (const char of value) {
    if (!BASE58_MAP.has(char)) return false;
  }
  return true;
}

/**
 * Encode bytes (or a hex string) as Base58
 */
export function base58Encode(data: Uint8Array | string): string {
  const bytes = typeof data === 'string' ? hexToBytes(data) : data;

  let zeros = 0;
  while (zeros < bytes.length && bytes[zeros] === 0) zeros++;

  // Base-256 to base-58 long division, little-endian digits
  const digits: number[] = [];
  for (let i = zeros; i < bytes.length; i++) {
    let carry = bytes[i];
    for (let j = 0; j < digits.length; j++) {
      carry += digits[j] << 8;
      digits[j] = carry % 58;
      carry = Math.floor(carry / 58);
    }
    while (carry > 0) {
      digits.push(carry % 58);
      carry = Math.floor(carry / 58);
    }
  }

  let result = '1'.repeat(zeros);
  for (let i = digits.length - 1; i >= 0; i--) {
    result += BASE58_ALPHABET[digits[i]];
  }
  return result;
}

/**
 * Decode a Base58 string into bytes
 * @throws Error('Invalid base58 character') on any out-of-alphabet character
 */
export function base58Decode(value: string): Uint8Array {
  let zeros = 0;
  while (zeros < value.length && value[zeros] === '1') zeros++;

  const bytes: number[] = [];
  for (const char of value) {
    const digit = BASE58_MAP.get(char);
    if (digit === undefined) {
      throw new Error('Invalid base58 character');
    }
    let carry = digit;
    for (let j = 0; j < bytes.length; j++) {
      carry += bytes[j] * 58;
      bytes[j] = carry & 0xff;
      carry >>= 8;
    }
    while (carry > 0) {
      bytes.push(carry & 0xff);
      carry >>= 8;
    }
  }

  const result = new Uint8Array(zeros + bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    result[zeros + i] = bytes[bytes.length - 1 - i];
  }
  return result;
}

/**
 * Decode Base58, returning null instead of throwing
 */
export function tryBase58Decode(value: string): Uint8Array | null {
  if (!isBase58String(value)) return null;
  return base58Decode(value);
}

// =============================================================================
// Bytes
// =============================================================================

/**
 * Compare two byte arrays by length and contents
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}

export { bytesToHex, hexToBytes };
