/**
 * Base58Check
 * version ‖ payload ‖ first 4 bytes of doubleSha256(version ‖ payload)
 */

import {
  BASE58CHECK_CHECKSUM_LENGTH,
  BASE58CHECK_DECODED_LENGTH,
  BASE58CHECK_MAX_LENGTH,
} from '../constants';
import { doubleSha256 } from './crypto';
import { base58Encode, bytesEqual, tryBase58Decode } from './utils';

export interface Base58CheckDecoded {
  version: number;
  /** 20-byte payload */
  payload: Uint8Array;
}

/**
 * Encode a version byte and payload with a 4-byte checksum
 */
export function base58CheckEncode(version: number, payload: Uint8Array): string {
  if (!Number.isInteger(version) || version < 0 || version > 0xff) {
    throw new Error(`Invalid version byte: ${version}`);
  }
  const body = new Uint8Array(1 + payload.length);
  body[0] = version;
  body.set(payload, 1);
  const checksum = doubleSha256(body).slice(0, BASE58CHECK_CHECKSUM_LENGTH);

  const full = new Uint8Array(body.length + checksum.length);
  full.set(body);
  full.set(checksum, body.length);
  return base58Encode(full);
}

/**
 * Decode a 25-byte Base58Check string.
 * Returns null for bad alphabet, wrong length or checksum mismatch.
 * Strings too long to hold 25 bytes are rejected before decoding.
 */
export function base58CheckDecode(value: string): Base58CheckDecoded | null {
  if (value.length > BASE58CHECK_MAX_LENGTH) return null;
  const bytes = tryBase58Decode(value);
  if (!bytes || bytes.length !== BASE58CHECK_DECODED_LENGTH) return null;

  const split = bytes.length - BASE58CHECK_CHECKSUM_LENGTH;
  const body = bytes.slice(0, split);
  const checksum = bytes.slice(split);
  const expected = doubleSha256(body).slice(0, BASE58CHECK_CHECKSUM_LENGTH);
  if (!bytesEqual(checksum, expected)) return null;

  return { version: body[0], payload: body.slice(1) };
}

export function isValidBase58Check(value: string): boolean {
  return base58CheckDecode(value) !== null;
}
