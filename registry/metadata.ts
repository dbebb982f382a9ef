/**
 * Address Format Validation
 * Structural acceptance of a raw string against one address format
 */

import { base58CheckDecode } from '../core/base58check';
import { bech32Decode } from '../core/bech32';
import { ss58Decode } from '../core/ss58';
import { tryBase58Decode, tryHexDecode } from '../core/utils';
import type { AddressMetadata, InputCharacteristics } from '../types';

export function lengthSatisfied(format: AddressMetadata, length: number): boolean {
  if (format.exactLength !== undefined && length !== format.exactLength) return false;
  if (format.lengthRange && (length < format.lengthRange.min || length > format.lengthRange.max)) {
    return false;
  }
  return true;
}

/**
 * Whether `input` is structurally a valid address of this format.
 *
 * Checks encoding compatibility, length, prefix and HRP, then decodes under the
 * format's encoding. Base58Check and SS58 decoding verify their checksums here;
 * EIP-55 casing is left to the detector since uniform-case input is acceptable.
 */
export function validateRawAddress(
  format: AddressMetadata,
  input: string,
  chars: InputCharacteristics,
): boolean {
  if (!chars.encodings.includes(format.encoding)) return false;
  if (!lengthSatisfied(format, chars.length)) return false;

  // Version bytes identify Base58Check formats; leading characters are not checked
  const checkPrefix = !(format.encoding === 'base58check' && format.versionBytes.length > 0);
  if (checkPrefix && format.prefixes.length > 0 && !format.prefixes.some((p) => input.startsWith(p))) {
    return false;
  }

  // Chain HRPs are prefixes: "cosmos" also covers "cosmosvaloper"
  const hrp = chars.hrp;
  if (format.hrps.length > 0 && (hrp === undefined || !format.hrps.some((h) => hrp.startsWith(h)))) {
    return false;
  }

  switch (format.encoding) {
    case 'hex':
      return tryHexDecode(input) !== null;
    case 'bech32':
    case 'bech32m':
      return bech32Decode(input)?.variant === format.encoding;
    case 'base58check': {
      const decoded = base58CheckDecode(input);
      if (!decoded) return false;
      return format.versionBytes.length === 0 || format.versionBytes.includes(decoded.version);
    }
    case 'ss58': {
      const decoded = ss58Decode(input);
      if (!decoded) return false;
      return format.ss58Prefixes.length === 0 || format.ss58Prefixes.includes(decoded.prefix);
    }
    case 'base58':
      return tryBase58Decode(input) !== null;
  }
}
