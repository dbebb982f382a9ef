/**
 * Input Characteristics Extraction
 *
 * Collects every encoding a raw string is structurally compatible with.
 * Bech32 runs first because it is self-describing and yields the HRP;
 * the remaining checks are independent and never short-circuit each other.
 */

import { SS58_DECODED_LENGTH, SS58_STRING_LENGTH } from '../constants';
import { bech32Decode } from '../core/bech32';
import { base58CheckDecode } from '../core/base58check';
import { isBase58String, isHexString, tryBase58Decode } from '../core/utils';
import type { CharSet, EncodingType, EntropyClass, InputCharacteristics } from '../types';

const HEX_CHARS = /^(0x)?[0-9a-fA-F]+$/;
const ALPHANUMERIC_CHARS = /^[0-9a-zA-Z]+$/;

export function extractCharacteristics(input: string): InputCharacteristics {
  const encodings: EncodingType[] = [];

  const bech32 = bech32Decode(input);
  if (bech32) {
    encodings.push(bech32.variant);
  }

  if (isHexString(input)) {
    encodings.push('hex');
  }

  if (isBase58String(input)) {
    let claimed = false;

    if (base58CheckDecode(input)) {
      encodings.push('base58check');
      claimed = true;
    }

    if (input.length >= SS58_STRING_LENGTH.min && input.length <= SS58_STRING_LENGTH.max) {
      const decodedLength = tryBase58Decode(input)?.length ?? 0;
      if (decodedLength >= SS58_DECODED_LENGTH.min && decodedLength <= SS58_DECODED_LENGTH.max) {
        encodings.push('ss58');
        claimed = true;
      }
    }

    if (!claimed) {
      encodings.push('base58');
    }
  }

  const charSets = detectCharSets(input, bech32 !== null);

  return {
    length: input.length,
    charSet: charSets[0] ?? 'alphanumeric',
    charSets,
    prefixes: extractPrefixes(input),
    hrp: bech32?.hrp,
    encodings,
    normalized: input.toLowerCase(),
    entropyClass: classifyEntropy(input, encodings),
  };
}

function detectCharSets(input: string, isBech32: boolean): CharSet[] {
  const sets: CharSet[] = [];
  if (isBech32) sets.push('base32');
  if (HEX_CHARS.test(input)) sets.push('hex');
  if (isBase58String(input)) sets.push('base58');
  if (ALPHANUMERIC_CHARS.test(input)) sets.push('alphanumeric');
  return sets;
}

function extractPrefixes(input: string): string[] {
  const prefixes = new Set<string>();
  for (let n = 1; n <= Math.min(3, input.length); n++) {
    prefixes.add(input.slice(0, n));
  }
  if (input.startsWith('0x')) {
    prefixes.add('0x');
  }
  return [...prefixes];
}

function classifyEntropy(input: string, encodings: readonly EncodingType[]): EntropyClass {
  if ((input.startsWith('0x') && encodings.includes('hex'))
    || encodings.includes('bech32')
    || encodings.includes('bech32m')) {
    return 'low';
  }
  if (encodings.some((e) => e === 'base58' || e === 'base58check' || e === 'ss58')) {
    return 'medium';
  }
  return 'high';
}
