/**
 * Cryptographic Primitives
 * Pure hash functions and secp256k1 point decompression
 */

import { sha256 as nobleSha256 } from '@noble/hashes/sha2.js';
import { keccak_256, sha3_256 as nobleSha3_256 } from '@noble/hashes/sha3.js';
import { ripemd160 as nobleRipemd160 } from '@noble/hashes/ripemd160.js';
import { blake2b } from '@noble/hashes/blake2b.js';
import { secp256k1 } from '@noble/curves/secp256k1.js';
import { IdentifyError } from '../types';

// =============================================================================
// Hash Functions
// =============================================================================

export function sha256(data: Uint8Array): Uint8Array {
  return nobleSha256(data);
}

export function doubleSha256(data: Uint8Array): Uint8Array {
  return nobleSha256(nobleSha256(data));
}

export function keccak256(data: Uint8Array): Uint8Array {
  return keccak_256(data);
}

export function sha3_256(data: Uint8Array): Uint8Array {
  return nobleSha3_256(data);
}

export function ripemd160(data: Uint8Array): Uint8Array {
  return nobleRipemd160(data);
}

/**
 * HASH160 = RIPEMD160(SHA256(data))
 */
export function hash160(data: Uint8Array): Uint8Array {
  return nobleRipemd160(nobleSha256(data));
}

/**
 * BLAKE2b with a 32-byte digest (not a truncated 64-byte digest)
 */
export function blake2b256(data: Uint8Array): Uint8Array {
  return blake2b(data, { dkLen: 32 });
}

export function blake2b512(data: Uint8Array): Uint8Array {
  return blake2b(data, { dkLen: 64 });
}

// =============================================================================
// secp256k1
// =============================================================================

/**
 * Expand a 33-byte compressed secp256k1 key into its 65-byte uncompressed form
 * @throws IdentifyError DECOMPRESSION_FAILED when the bytes are not a curve point
 */
export function decompressPublicKey(compressed: Uint8Array): Uint8Array {
  if (compressed.length !== 33 || (compressed[0] !== 0x02 && compressed[0] !== 0x03)) {
    throw new IdentifyError(
      `Invalid compressed public key: expected 33 bytes with 0x02/0x03 prefix, got ${compressed.length} bytes`,
      'DECOMPRESSION_FAILED',
    );
  }
  try {
    return secp256k1.ProjectivePoint.fromHex(compressed).toRawBytes(false);
  } catch (error) {
    throw new IdentifyError('Public key is not a point on secp256k1', 'DECOMPRESSION_FAILED', error);
  }
}
