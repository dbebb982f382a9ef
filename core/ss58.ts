/**
 * SS58 Address Codec
 *
 * Layout: prefix (1 or 2 bytes) ‖ 32-byte account id ‖ checksum,
 * checksum = leading bytes of blake2b512("SS58PRE" ‖ prefix ‖ account id).
 */

import {
  SS58_ACCOUNT_ID_LENGTH,
  SS58_MAX_PREFIX,
  SS58_PREFIX_BYTES,
  SS58_STRING_LENGTH,
} from '../constants';
import { blake2b512 } from './crypto';
import { base58Encode, bytesEqual, tryBase58Decode } from './utils';

export interface Ss58Decoded {
  prefix: number;
  accountId: Uint8Array;
}

// =============================================================================
// Prefix & Checksum
// =============================================================================

/**
 * Number of checksum bytes for a decoded payload length.
 * 35/36-byte payloads (single account id, 1- or 2-byte prefix) always use 2.
 */
export function ss58ChecksumLength(decodedLength: number): number {
  if (decodedLength === 35 || decodedLength === 36) return 2;
  if (decodedLength < 64) return 1;
  if (decodedLength < 16384) return 2;
  return 3;
}

export function encodeSs58Prefix(prefix: number): Uint8Array {
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > SS58_MAX_PREFIX) {
    throw new Error(`Invalid SS58 prefix: ${prefix}`);
  }
  if (prefix < 64) {
    return Uint8Array.of(prefix);
  }
  return Uint8Array.of(0x40 | ((prefix >> 8) & 0x3f), prefix & 0xff);
}

function ss58Checksum(prefixBytes: Uint8Array, accountId: Uint8Array, length: number): Uint8Array {
  const preimage = new Uint8Array(SS58_PREFIX_BYTES.length + prefixBytes.length + accountId.length);
  preimage.set(SS58_PREFIX_BYTES);
  preimage.set(prefixBytes, SS58_PREFIX_BYTES.length);
  preimage.set(accountId, SS58_PREFIX_BYTES.length + prefixBytes.length);
  return blake2b512(preimage).slice(0, length);
}

// =============================================================================
// Encode / Decode
// =============================================================================

/**
 * @throws Error for an out-of-range prefix or an account id that is not 32 bytes
 */
export function ss58Encode(prefix: number, accountId: Uint8Array): string {
  if (accountId.length !== SS58_ACCOUNT_ID_LENGTH) {
    throw new Error(`Invalid SS58 account id length: ${accountId.length} bytes (expected 32)`);
  }
  const prefixBytes = encodeSs58Prefix(prefix);
  const checksumLength = ss58ChecksumLength(prefixBytes.length + accountId.length + 2);
  const checksum = ss58Checksum(prefixBytes, accountId, checksumLength);

  const full = new Uint8Array(prefixBytes.length + accountId.length + checksum.length);
  full.set(prefixBytes);
  full.set(accountId, prefixBytes.length);
  full.set(checksum, prefixBytes.length + accountId.length);
  return base58Encode(full);
}

/**
 * Decode and verify an SS58 address, or null on any failure
 */
export function ss58Decode(value: string): Ss58Decoded | null {
  if (value.length > SS58_STRING_LENGTH.max) return null;
  const bytes = tryBase58Decode(value);
  if (!bytes || bytes.length < 3) return null;

  const first = bytes[0];
  if (first >= 128) return null;

  const prefixLength = first < 64 ? 1 : 2;
  const prefix = prefixLength === 1 ? first : ((first & 0x3f) << 8) | bytes[1];

  const checksumLength = ss58ChecksumLength(bytes.length);
  const accountEnd = bytes.length - checksumLength;
  if (accountEnd - prefixLength !== SS58_ACCOUNT_ID_LENGTH) return null;

  const prefixBytes = bytes.slice(0, prefixLength);
  const accountId = bytes.slice(prefixLength, accountEnd);
  const checksum = bytes.slice(accountEnd);
  if (!bytesEqual(checksum, ss58Checksum(prefixBytes, accountId, checksumLength))) return null;

  return { prefix, accountId };
}

export function isValidSs58(value: string): boolean {
  return ss58Decode(value) !== null;
}
