/**
 * Category Signatures
 *
 * Structural fingerprints used to filter chain formats without per-chain
 * branching. A signature built from format metadata states requirements;
 * one built from input characteristics states what was observed.
 */

import type {
  AddressMetadata,
  CharSet,
  EncodingType,
  InputCharacteristics,
  LengthRange,
  PublicKeyMetadata,
} from '../types';

export interface CategorySignature {
  /** Observed: every alphabet the input fits. Required: at most one entry. */
  readonly charSets: readonly CharSet[];
  readonly minLength: number;
  readonly maxLength: number;
  readonly hasHrp: boolean;
  readonly prefixes: readonly string[];
  readonly hrpPrefixes: readonly string[];
  /** Observed: every compatible encoding. Required: the format's encoding. */
  readonly encodings: readonly EncodingType[];
}

// =============================================================================
// Construction
// =============================================================================

export function signatureFromCharacteristics(chars: InputCharacteristics): CategorySignature {
  return {
    charSets: chars.charSets,
    minLength: chars.length,
    maxLength: chars.length,
    hasHrp: chars.hrp !== undefined,
    prefixes: chars.prefixes,
    hrpPrefixes: chars.hrp !== undefined ? [chars.hrp] : [],
    encodings: chars.encodings,
  };
}

function lengthBounds(exactLength?: number, lengthRange?: LengthRange): { min: number; max: number } {
  if (exactLength !== undefined) return { min: exactLength, max: exactLength };
  if (lengthRange) return { min: lengthRange.min, max: lengthRange.max };
  return { min: 0, max: Number.POSITIVE_INFINITY };
}

/**
 * Requirements stated by an address or public-key format
 */
export function signatureFromFormat(format: AddressMetadata | PublicKeyMetadata): CategorySignature {
  const { min, max } = lengthBounds(format.exactLength, format.lengthRange);
  return {
    charSets: format.charSet ? [format.charSet] : [],
    minLength: min,
    maxLength: max,
    hasHrp: format.hrps.length > 0,
    prefixes: format.prefixes,
    hrpPrefixes: format.hrps,
    encodings: [format.encoding],
  };
}

// =============================================================================
// Matching
// =============================================================================

/**
 * True when every requirement of `required` is satisfied by `observed`
 */
export function signatureMatches(required: CategorySignature, observed: CategorySignature): boolean {
  if (!required.encodings.some((e) => observed.encodings.includes(e))) {
    return false;
  }
  if (required.charSets.length > 0 && !required.charSets.some((c) => observed.charSets.includes(c))) {
    return false;
  }
  if (observed.minLength < required.minLength || observed.maxLength > required.maxLength) {
    return false;
  }
  if (required.hasHrp && !observed.hasHrp) {
    return false;
  }
  if (required.prefixes.length > 0 && !required.prefixes.some((p) => observed.prefixes.includes(p))) {
    return false;
  }
  if (required.hrpPrefixes.length > 0
    && !required.hrpPrefixes.some((h) => observed.hrpPrefixes.some((o) => o.startsWith(h)))) {
    return false;
  }
  return true;
}
