/**
 * Tests for core/utils.ts
 * Covers hex and Base58 helpers
 */

import { describe, it, expect } from 'vitest';
import {
  stripHexPrefix,
  isHexString,
  tryHexDecode,
  isBase58String,
  base58Encode,
  base58Decode,
  tryBase58Decode,
  bytesEqual,
  bytesToHex,
} from '../../../core/utils';

import { BASE58_VECTORS } from '../../fixtures/test-vectors';

// =============================================================================
// Hex Tests
// =============================================================================

describe('stripHexPrefix()', () => {
  it('should strip 0x and 0X', () => {
    expect(stripHexPrefix('0xabcd')).toBe('abcd');
    expect(stripHexPrefix('0Xabcd')).toBe('abcd');
  });

  it('should leave bare hex unchanged', () => {
    expect(stripHexPrefix('abcd')).toBe('abcd');
  });
});

describe('isHexString()', () => {
  it('should accept prefixed hex of any body length', () => {
    expect(isHexString('0xabc')).toBe(true);
    expect(isHexString('0xDEADbeef')).toBe(true);
  });

  it('should require an even number of digits for bare hex', () => {
    expect(isHexString('abcd')).toBe(true);
    expect(isHexString('abc')).toBe(false);
  });

  it('should reject empty bodies and non-hex characters', () => {
    expect(isHexString('')).toBe(false);
    expect(isHexString('0x')).toBe(false);
    expect(isHexString('0xzz')).toBe(false);
  });
});

describe('tryHexDecode()', () => {
  it('should decode mixed-case hex with or without prefix', () => {
    expect(Array.from(tryHexDecode('0xABcd') ?? [])).toEqual([0xab, 0xcd]);
    expect(Array.from(tryHexDecode('0102') ?? [])).toEqual([1, 2]);
  });

  it('should return null for odd-length or malformed hex', () => {
    expect(tryHexDecode('0xabc')).toBeNull();
    expect(tryHexDecode('xyz1')).toBeNull();
    expect(tryHexDecode('0x')).toBeNull();
  });
});

// =============================================================================
// Base58 Tests
// =============================================================================

describe('base58Encode()', () => {
  it('should encode test vectors correctly', () => {
    for (const vector of BASE58_VECTORS) {
      expect(base58Encode(vector.hex)).toBe(vector.base58);
    }
  });

  it('should accept Uint8Array input', () => {
    expect(base58Encode(new Uint8Array([0, 0, 0xff]))).toBe('115Q');
  });
});

describe('base58Decode()', () => {
  it('should decode test vectors correctly', () => {
    for (const vector of BASE58_VECTORS) {
      expect(bytesToHex(base58Decode(vector.base58))).toBe(vector.hex);
    }
  });

  it('should throw on invalid characters', () => {
    // 0, O, I and l are not in the alphabet
    expect(() => base58Decode('0OIl')).toThrow('Invalid base58 character');
  });
});

describe('tryBase58Decode()', () => {
  it('should return null instead of throwing', () => {
    expect(tryBase58Decode('0abc')).toBeNull();
    expect(tryBase58Decode('')).toBeNull();
  });

  it('should decode valid strings', () => {
    expect(bytesToHex(tryBase58Decode('5Q') ?? new Uint8Array())).toBe('ff');
  });
});

describe('isBase58String()', () => {
  it('should check the alphabet only', () => {
    expect(isBase58String('xyz123abc')).toBe(true);
    expect(isBase58String('0x1234')).toBe(false);
    expect(isBase58String('')).toBe(false);
  });
});

// =============================================================================
// Bytes Tests
// =============================================================================

describe('bytesEqual()', () => {
  it('should compare contents and length', () => {
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false);
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2, 3]))).toBe(false);
  });
});
