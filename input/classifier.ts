/**
 * Input Classifier
 *
 * Decides whether an input could be an address, a public key, or both,
 * without consulting any chain. Ambiguity is preserved for the matcher.
 */

import { ADDRESS_ENVELOPES, BASE58_KEY_MAX_LENGTH, PUBLIC_KEY_LENGTHS } from '../constants';
import { decodeBech32Bytes } from '../core/bech32';
import { tryBase58Decode, tryHexDecode } from '../core/utils';
import { IdentifyError } from '../types';
import type {
  EncodingType,
  InputCharacteristics,
  InputPossibility,
  PublicKeyPossibility,
} from '../types';

function within(length: number, envelope: { min: number; max: number }): boolean {
  return length >= envelope.min && length <= envelope.max;
}

/**
 * Whether any compatible encoding's address envelope is satisfied
 */
export function couldBeAddress(input: string, chars: InputCharacteristics): boolean {
  return chars.encodings.some((encoding) => {
    switch (encoding) {
      case 'hex':
        return input.startsWith('0x') && within(chars.length, ADDRESS_ENVELOPES.hex);
      case 'base58check':
        return within(chars.length, ADDRESS_ENVELOPES.base58check);
      case 'base58':
        return within(chars.length, ADDRESS_ENVELOPES.base58);
      case 'ss58':
        return within(chars.length, ADDRESS_ENVELOPES.ss58);
      case 'bech32':
      case 'bech32m':
        return chars.hrp !== undefined && within(chars.length, ADDRESS_ENVELOPES.bech32);
    }
  });
}

function decodeUnder(input: string, encoding: EncodingType): Uint8Array | null {
  switch (encoding) {
    case 'hex':
      return tryHexDecode(input);
    case 'base58':
    case 'base58check':
    case 'ss58':
      return input.length <= BASE58_KEY_MAX_LENGTH ? tryBase58Decode(input) : null;
    case 'bech32':
    case 'bech32m':
      return decodeBech32Bytes(input)?.data ?? null;
  }
}

/**
 * Public-key readings of the input, one per curve and compression form
 */
export function publicKeyPossibilities(input: string, chars: InputCharacteristics): PublicKeyPossibility[] {
  const found: PublicKeyPossibility[] = [];
  const seen = new Set<string>();

  const add = (possibility: PublicKeyPossibility): void => {
    const key = `${possibility.keyType}:${possibility.compressed ?? ''}`;
    if (seen.has(key)) return;
    seen.add(key);
    found.push(possibility);
  };

  for (const encoding of chars.encodings) {
    const keyBytes = decodeUnder(input, encoding);
    if (!keyBytes) continue;

    if (keyBytes.length === PUBLIC_KEY_LENGTHS.ED25519) {
      add({ kind: 'publicKey', keyType: 'ed25519', keyBytes, encoding });
      add({ kind: 'publicKey', keyType: 'sr25519', keyBytes, encoding });
    } else if (keyBytes.length === PUBLIC_KEY_LENGTHS.SECP256K1_COMPRESSED
      && (keyBytes[0] === 0x02 || keyBytes[0] === 0x03)) {
      add({ kind: 'publicKey', keyType: 'secp256k1', compressed: true, keyBytes, encoding });
    } else if (keyBytes.length === PUBLIC_KEY_LENGTHS.SECP256K1_UNCOMPRESSED && keyBytes[0] === 0x04) {
      add({ kind: 'publicKey', keyType: 'secp256k1', compressed: false, keyBytes, encoding });
    }
  }

  return found;
}

/**
 * Classify an input into address and public-key possibilities
 * @throws IdentifyError INVALID_INPUT when neither reading is possible
 */
export function classifyInput(input: string, chars: InputCharacteristics): InputPossibility[] {
  const possibilities: InputPossibility[] = [];
  if (couldBeAddress(input, chars)) {
    possibilities.push({ kind: 'address' });
  }
  possibilities.push(...publicKeyPossibilities(input, chars));

  if (possibilities.length === 0) {
    throw new IdentifyError(
      `Invalid input: "${input}" is neither a recognizable address nor a public key`,
      'INVALID_INPUT',
    );
  }
  return possibilities;
}
