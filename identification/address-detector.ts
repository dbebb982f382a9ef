/**
 * Address Detector
 * Authoritative checksum validation, normalization and confidence scoring
 * for an accepted address match.
 */

import { CONFIDENCE } from '../constants';
import { base58CheckDecode } from '../core/base58check';
import { bech32Decode } from '../core/bech32';
import { eip55State, toChecksumAddress } from '../core/eip55';
import { ss58Decode } from '../core/ss58';
import { IdentifyError } from '../types';
import type { AddressMatch, AddressMetadata, IdentificationCandidate, InputCharacteristics } from '../types';

const ENCODING_LABELS: Record<AddressMetadata['encoding'], string> = {
  hex: 'Hex',
  base58: 'Base58',
  base58check: 'Base58Check',
  bech32: 'Bech32',
  bech32m: 'Bech32m',
  ss58: 'SS58',
};

function formatByte(value: number): string {
  return `0x${value.toString(16).padStart(2, '0')}`;
}

/**
 * Canonical form of an address: EIP-55 casing for hex, lower case for Bech32,
 * unchanged for the case-sensitive Base58 family
 */
export function normalizeAddress(input: string, format: AddressMetadata): string {
  switch (format.encoding) {
    case 'hex':
      return format.checksum === 'eip55' ? toChecksumAddress(input) : input.toLowerCase();
    case 'bech32':
    case 'bech32m':
      return input.toLowerCase();
    case 'base58':
    case 'base58check':
    case 'ss58':
      return input;
  }
}

/**
 * Verify the format's checksum.
 * Returns whether a checksum was present and valid; false means no checksum to check.
 * @throws IdentifyError CHECKSUM_MISMATCH
 */
function verifyChecksum(input: string, format: AddressMetadata, notes: string[]): boolean {
  switch (format.checksum) {
    case 'eip55': {
      const state = eip55State(input);
      if (state === 'invalid') {
        throw new IdentifyError(`EIP-55 checksum mismatch for ${input}`, 'CHECKSUM_MISMATCH');
      }
      notes.push(state === 'valid' ? 'EIP-55 checksum valid' : 'no EIP-55 checksum (uniform case)');
      return state === 'valid';
    }
    case 'base58check': {
      const decoded = base58CheckDecode(input);
      if (!decoded) {
        throw new IdentifyError(`Base58Check checksum mismatch for ${input}`, 'CHECKSUM_MISMATCH');
      }
      notes.push(`Base58Check checksum valid, version byte ${formatByte(decoded.version)}`);
      return true;
    }
    case 'bech32':
    case 'bech32m': {
      const decoded = bech32Decode(input);
      if (!decoded || decoded.variant !== format.checksum) {
        throw new IdentifyError(`${ENCODING_LABELS[format.checksum]} checksum mismatch for ${input}`, 'CHECKSUM_MISMATCH');
      }
      notes.push(`${ENCODING_LABELS[format.checksum]} checksum valid, HRP "${decoded.hrp}"`);
      return true;
    }
    case 'ss58': {
      const decoded = ss58Decode(input);
      if (!decoded) {
        throw new IdentifyError(`SS58 checksum mismatch for ${input}`, 'CHECKSUM_MISMATCH');
      }
      notes.push(`SS58 checksum valid, prefix ${decoded.prefix}`);
      return true;
    }
    case undefined:
      notes.push('no checksum');
      return false;
  }
}

/**
 * Whether the format pinned a version byte, HRP or SS58 prefix.
 * Structural validation has already confirmed it is satisfied.
 */
function requiresNetworkTag(format: AddressMetadata): boolean {
  return format.versionBytes.length > 0 || format.hrps.length > 0 || format.ss58Prefixes.length > 0;
}

export function scoreAddress(checksumValid: boolean, networkTag: boolean, exactLength: boolean): number {
  let score: number = CONFIDENCE.BASE;
  if (checksumValid) score += CONFIDENCE.CHECKSUM_VALID;
  if (networkTag) score += CONFIDENCE.NETWORK_TAG_MATCHED;
  if (exactLength) score += CONFIDENCE.EXACT_LENGTH;
  // Round away floating-point noise from the additions
  return Math.min(CONFIDENCE.MAX, Math.round(score * 100) / 100);
}

/**
 * Turn an accepted address match into a candidate
 * @throws IdentifyError CHECKSUM_MISMATCH
 */
export function detectAddress(
  match: AddressMatch,
  input: string,
  chars: InputCharacteristics,
): IdentificationCandidate {
  const { chain, format } = match;
  const notes: string[] = [];

  const checksumValid = verifyChecksum(input, format, notes);
  const networkTag = requiresNetworkTag(format);
  const exactLength = format.exactLength !== undefined && format.exactLength === chars.length;
  if (exactLength) {
    notes.push(`length ${chars.length}`);
  }

  return {
    inputType: 'address',
    chain: chain.id,
    encoding: format.encoding,
    normalized: normalizeAddress(input, format),
    confidence: scoreAddress(checksumValid, networkTag, exactLength),
    reasoning: `${ENCODING_LABELS[format.encoding]} address for ${chain.name}: ${notes.join(', ')}`,
  };
}
