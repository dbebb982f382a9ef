/**
 * Tests for core/ss58.ts
 */

import { describe, it, expect } from 'vitest';
import {
  ss58Encode,
  ss58Decode,
  isValidSs58,
  encodeSs58Prefix,
  ss58ChecksumLength,
} from '../../../core/ss58';
import { base58Decode, base58Encode, bytesToHex, hexToBytes } from '../../../core/utils';

import { SS58_ACCOUNT_ID, SS58_VECTORS } from '../../fixtures/test-vectors';

describe('ss58ChecksumLength()', () => {
  it('should use 2 bytes for single-account payloads', () => {
    expect(ss58ChecksumLength(35)).toBe(2);
    expect(ss58ChecksumLength(36)).toBe(2);
  });

  it('should follow the length table otherwise', () => {
    expect(ss58ChecksumLength(10)).toBe(1);
    expect(ss58ChecksumLength(100)).toBe(2);
    expect(ss58ChecksumLength(20000)).toBe(3);
  });
});

describe('encodeSs58Prefix()', () => {
  it('should use one byte below 64', () => {
    expect(Array.from(encodeSs58Prefix(42))).toEqual([42]);
  });

  it('should use two bytes from 64 upward', () => {
    expect(Array.from(encodeSs58Prefix(100))).toEqual([0x40, 0x64]);
    expect(Array.from(encodeSs58Prefix(16383))).toEqual([0x7f, 0xff]);
  });

  it('should reject prefixes above 16383', () => {
    expect(() => encodeSs58Prefix(16384)).toThrow('Invalid SS58 prefix: 16384');
  });
});

describe('ss58Encode()', () => {
  it('should encode test vectors correctly', () => {
    for (const vector of SS58_VECTORS) {
      expect(ss58Encode(vector.prefix, hexToBytes(SS58_ACCOUNT_ID))).toBe(vector.address);
    }
  });

  it('should reject account ids that are not 32 bytes', () => {
    expect(() => ss58Encode(0, new Uint8Array(33))).toThrow('Invalid SS58 account id length: 33 bytes');
  });
});

describe('ss58Decode()', () => {
  it('should decode prefix and account id', () => {
    for (const vector of SS58_VECTORS) {
      const decoded = ss58Decode(vector.address);
      expect(decoded?.prefix).toBe(vector.prefix);
      expect(decoded && bytesToHex(decoded.accountId)).toBe(SS58_ACCOUNT_ID);
    }
  });

  it('should reject a corrupted checksum', () => {
    const address = SS58_VECTORS[2].address;
    const corrupted = address.slice(0, -1) + (address.endsWith('Y') ? 'Z' : 'Y');
    expect(ss58Decode(corrupted)).toBeNull();
  });

  it('should reject every single-bit flip of the decoded bytes', () => {
    // One- and two-byte prefixes
    for (const vector of [SS58_VECTORS[0], SS58_VECTORS[3]]) {
      const bytes = base58Decode(vector.address);
      for (let index = 0; index < bytes.length; index++) {
        for (let bit = 0; bit < 8; bit++) {
          const flipped = bytes.slice();
          flipped[index] ^= 1 << bit;
          expect(ss58Decode(base58Encode(flipped))).toBeNull();
        }
      }
    }
  });

  it('should not decode strings longer than 50 characters', () => {
    expect(ss58Decode('2'.repeat(20000))).toBeNull();
  });

  it('should reject non-Base58 and short input', () => {
    expect(ss58Decode('0GrwvaEF5zXb26Fz9rcQpDWS57CtERHpNehXCPcNoHGKutQY')).toBeNull();
    expect(ss58Decode('5Q')).toBeNull();
  });
});

describe('isValidSs58()', () => {
  it('should mirror ss58Decode', () => {
    expect(isValidSs58(SS58_VECTORS[0].address)).toBe(true);
    expect(isValidSs58('1A1zP1eP5QGefi2DMPTfTL5SLmv7DivfNa')).toBe(false);
  });
});
