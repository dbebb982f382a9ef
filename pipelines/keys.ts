/**
 * Public key normalization shared by the derivation pipelines
 */

import { PUBLIC_KEY_LENGTHS } from '../constants';
import { decompressPublicKey } from '../core/crypto';
import { IdentifyError } from '../types';

/**
 * Reduce a secp256k1 key to its 64-byte X ‖ Y form.
 * Accepts 33-byte compressed, 65-byte uncompressed (0x04) or raw 64-byte keys.
 */
export function toRawSecp256k1Key(key: Uint8Array): Uint8Array {
  if (key.length === PUBLIC_KEY_LENGTHS.SECP256K1_COMPRESSED) {
    return decompressPublicKey(key).slice(1);
  }
  if (key.length === PUBLIC_KEY_LENGTHS.SECP256K1_UNCOMPRESSED && key[0] === 0x04) {
    return key.slice(1);
  }
  if (key.length === PUBLIC_KEY_LENGTHS.SECP256K1_RAW) {
    return key;
  }
  throw new IdentifyError(
    `Invalid secp256k1 key length: ${key.length} bytes (expected 33, 64 or 65)`,
    'INVALID_KEY_LENGTH',
  );
}

export function requireEd25519Key(key: Uint8Array): Uint8Array {
  if (key.length !== PUBLIC_KEY_LENGTHS.ED25519) {
    throw new IdentifyError(
      `Invalid Ed25519 key length: ${key.length} bytes (expected 32)`,
      'INVALID_KEY_LENGTH',
    );
  }
  return key;
}

/**
 * Run a codec call, converting its plain Error into ENCODING_ERROR
 */
export function encodeOrThrow<T>(label: string, encode: () => T): T {
  try {
    return encode();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new IdentifyError(`${label} encoding failed: ${message}`, 'ENCODING_ERROR', error);
  }
}
