/**
 * Core Types
 * Platform-independent type definitions shared by every stage of identification
 */

// =============================================================================
// Encoding & Character Set Types
// =============================================================================

/**
 * Structural encodings an input string can be compatible with.
 * An input may be compatible with several at once.
 */
export type EncodingType = 'hex' | 'base58' | 'base58check' | 'bech32' | 'bech32m' | 'ss58';

export type CharSet = 'hex' | 'base58' | 'base32' | 'alphanumeric';

/** Soft signal only, never used to accept or reject a candidate */
export type EntropyClass = 'low' | 'medium' | 'high';

export type ChecksumType = 'eip55' | 'base58check' | 'bech32' | 'bech32m' | 'ss58';

export type Network = 'mainnet' | 'testnet';

/** Curve of a public key, doubling as the chain's declared curve */
export type KeyType = 'secp256k1' | 'ed25519' | 'sr25519';

// =============================================================================
// Input Types
// =============================================================================

export interface InputCharacteristics {
  readonly length: number;
  readonly charSet: CharSet;
  /** Every alphabet the string fits, most specific first */
  readonly charSets: readonly CharSet[];
  /** First 1, 2 and 3 characters, plus "0x" when present */
  readonly prefixes: readonly string[];
  /** Lower-cased human-readable part, only when the input decodes as Bech32/Bech32m */
  readonly hrp?: string;
  readonly encodings: readonly EncodingType[];
  readonly normalized: string;
  readonly entropyClass: EntropyClass;
}

export interface AddressPossibility {
  readonly kind: 'address';
}

export interface PublicKeyPossibility {
  readonly kind: 'publicKey';
  readonly keyType: KeyType;
  /** Only meaningful for secp256k1 */
  readonly compressed?: boolean;
  readonly keyBytes: Uint8Array;
  /** Encoding the key bytes were decoded from */
  readonly encoding: EncodingType;
}

export type InputPossibility = AddressPossibility | PublicKeyPossibility;

// =============================================================================
// Chain Metadata Types
// =============================================================================

export interface LengthRange {
  readonly min: number;
  readonly max: number;
}

export interface AddressMetadata {
  readonly encoding: EncodingType;
  readonly charSet?: CharSet;
  readonly exactLength?: number;
  readonly lengthRange?: LengthRange;
  readonly prefixes: readonly string[];
  readonly hrps: readonly string[];
  /** Accepted Base58Check version bytes */
  readonly versionBytes: readonly number[];
  /** Accepted SS58 network prefixes (empty accepts any) */
  readonly ss58Prefixes: readonly number[];
  readonly checksum?: ChecksumType;
  readonly network: Network;
}

export interface PublicKeyMetadata {
  readonly encoding: EncodingType;
  readonly charSet?: CharSet;
  readonly exactLength?: number;
  readonly lengthRange?: LengthRange;
  readonly prefixes: readonly string[];
  readonly hrps: readonly string[];
  readonly keyType: KeyType;
  readonly checksum?: ChecksumType;
}

export interface ChainMetadata {
  readonly id: string;
  readonly name: string;
  readonly curve: KeyType;
  readonly addressFormats: readonly AddressMetadata[];
  readonly publicKeyFormats: readonly PublicKeyMetadata[];
}

// =============================================================================
// Definition Types (loader shapes)
// =============================================================================

/** Free-form pipeline parameters such as `hrp` or `version_byte` */
export type PipelineParams = Readonly<Record<string, unknown>>;

export interface PublicKeyFormatDefinition {
  readonly encoding: string;
  readonly exact_length?: number;
  readonly length_range?: readonly [number, number];
  readonly prefixes: readonly string[];
}

export interface PipelineBinding {
  readonly pipeline: string;
  readonly params: PipelineParams;
}

export interface ChainConfig {
  readonly id: string;
  readonly name: string;
  readonly curve: string;
  readonly address_pipeline: string;
  readonly address_params: PipelineParams;
  /** Chains whose canonical address needs two keys are excluded from derivation */
  readonly requires_stake_key: boolean;
  /** Extra derivations beyond the primary pipeline */
  readonly additional_pipelines: readonly PipelineBinding[];
  readonly public_key_formats: readonly PublicKeyFormatDefinition[];
}

export interface CurveDefinition {
  readonly id: string;
  readonly key_lengths: readonly number[];
  readonly compression: boolean;
  readonly compatible_pipelines: readonly string[];
}

export interface MetadataIndex {
  readonly curves: readonly string[];
  readonly pipelines: { readonly addresses: readonly string[] };
  readonly chains: readonly string[];
}

// =============================================================================
// Match & Result Types
// =============================================================================

export interface AddressMatch {
  readonly kind: 'address';
  readonly chain: ChainMetadata;
  readonly format: AddressMetadata;
}

export interface PublicKeyMatch {
  readonly kind: 'publicKey';
  readonly chain: ChainMetadata;
  readonly possibility: PublicKeyPossibility;
  readonly pipeline: string;
  readonly params: PipelineParams;
  /** Declared public-key format the input also satisfies, if any */
  readonly declaredFormat?: PublicKeyMetadata;
}

export type ChainMatch = AddressMatch | PublicKeyMatch;

export type InputType = 'address' | 'publicKey';

export interface IdentificationCandidate {
  readonly inputType: InputType;
  readonly chain: string;
  readonly encoding: EncodingType;
  readonly normalized: string;
  /** Heuristic score in [0, 1] */
  readonly confidence: number;
  readonly reasoning: string;
  /** Derivation pipeline, for public-key candidates */
  readonly pipeline?: string;
}

// =============================================================================
// Logging
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = (level: LogLevel, message: string, data?: unknown) => void;

// =============================================================================
// Error Types
// =============================================================================

export type IdentifyErrorCode =
  | 'INVALID_INPUT'        // Malformed input or no surviving candidate (surfaced)
  | 'CHECKSUM_MISMATCH'    // Checksum failed during detection
  | 'INVALID_KEY_LENGTH'   // Pipeline got a key length it does not handle
  | 'DECOMPRESSION_FAILED' // Compressed secp256k1 point is not on the curve
  | 'UNKNOWN_PIPELINE'     // Chain references an unregistered pipeline
  | 'ENCODING_ERROR'       // Codec refused a value
  | 'DEFINITION_ERROR';    // Chain/curve definition failed to parse or convert

export class IdentifyError extends Error {
  readonly code: IdentifyErrorCode;
  readonly cause?: unknown;

  constructor(message: string, code: IdentifyErrorCode, cause?: unknown) {
    super(message);
    this.name = 'IdentifyError';
    this.code = code;
    this.cause = cause;
  }

  /** Only INVALID_INPUT ever leaves `identify()` */
  get isTerminal(): boolean {
    return this.code === 'INVALID_INPUT';
  }
}
