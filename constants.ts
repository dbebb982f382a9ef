/**
 * Constants
 * Default configuration values, codec parameters and confidence weights
 */

// =============================================================================
// Confidence Weights
// =============================================================================

export const CONFIDENCE = {
  /** Every structurally valid address starts here */
  BASE: 0.5,
  /** Checksum was present and verified */
  CHECKSUM_VALID: 0.3,
  /** Version byte, HRP or SS58 prefix was required and satisfied */
  NETWORK_TAG_MATCHED: 0.1,
  /** Input length matched an exact (not ranged) constraint */
  EXACT_LENGTH: 0.05,
  MAX: 1.0,
  /** Fixed score for candidates derived from a public key */
  PUBLIC_KEY_DERIVED: 0.8,
} as const;

// =============================================================================
// Pipeline Defaults
// =============================================================================

export const DEFAULT_VERSION_BYTE = 0x00;

/** Bitcoin P2SH version, used when a chain's P2PKH version is 0 */
export const DEFAULT_P2SH_VERSION_BYTE = 0x05;

export const DEFAULT_SS58_PREFIX = 0;

export const DEFAULT_CARDANO_HEADER = 0x00;

export const TRON_VERSION_BYTE = 0x41;

export const DEFAULT_HRPS = {
  bitcoin_bech32: 'bc',
  cosmos: 'cosmos',
  cardano: 'addr',
} as const;

// =============================================================================
// Codec Parameters
// =============================================================================

/** BIP-173 maximum overall string length */
export const BECH32_MAX_LENGTH = 90;

/** 1 version + 20 payload + 4 checksum */
export const BASE58CHECK_DECODED_LENGTH = 25;

export const BASE58CHECK_CHECKSUM_LENGTH = 4;

/** 25 bytes never encode to more than 35 Base58 characters */
export const BASE58CHECK_MAX_LENGTH = 35;

/** Longest Base58 string still decoded as a candidate public key (65 bytes fit in 89) */
export const BASE58_KEY_MAX_LENGTH = 90;

export const SS58_PREFIX_BYTES = new TextEncoder().encode('SS58PRE');

/** Largest prefix representable by the two-byte SS58 encoding */
export const SS58_MAX_PREFIX = 16383;

export const SS58_ACCOUNT_ID_LENGTH = 32;

// =============================================================================
// Structural Envelopes
// =============================================================================

/**
 * Length windows the classifier uses to decide whether an input could be an
 * address at all, before any chain is consulted.
 */
export const ADDRESS_ENVELOPES = {
  hex: { min: 42, max: 42 },
  base58check: { min: 26, max: 48 },
  base58: { min: 32, max: 44 },
  ss58: { min: 35, max: 50 },
  bech32: { min: 14, max: 90 },
} as const;

/** String length window for SS58 candidacy in the extractor */
export const SS58_STRING_LENGTH = { min: 35, max: 50 } as const;

/** Decoded byte length window for SS58 candidacy (1- or 2-byte prefix) */
export const SS58_DECODED_LENGTH = { min: 35, max: 36 } as const;

export const PUBLIC_KEY_LENGTHS = {
  ED25519: 32,
  SECP256K1_COMPRESSED: 33,
  SECP256K1_RAW: 64,
  SECP256K1_UNCOMPRESSED: 65,
} as const;
