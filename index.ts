/**
 * chain-fingerprint
 *
 * Identifies which blockchains an address or public key could belong to.
 *
 * Architecture:
 * - Chain knowledge lives in JSON definitions, converted into format metadata
 * - Identification is metadata-driven: no per-chain branching in the pipeline
 * - Public keys fan out into derived addresses, one per chain and pipeline
 * - File-system loaders live in ./impl/nodejs/
 *
 * @example
 * ```ts
 * import { identify } from 'chain-fingerprint';
 *
 * const [top] = identify('0xd8da6bf26964af9d7eed9e03e53415d37aa96045');
 * console.log(top.chain);      // 'ethereum'
 * console.log(top.normalized); // '0xd8dA6BF26964aF9D7eEd9e03E53415D37aA96045'
 *
 * // Public keys yield one candidate per derivation
 * for (const candidate of identify('0x0279be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798')) {
 *   console.log(candidate.chain, candidate.pipeline, candidate.normalized);
 * }
 * ```
 */

// =============================================================================
// Identification
// =============================================================================

export { identify, identifyOrNull } from './identification';
export {
  deriveCandidate,
  detectAddress,
  normalizeAddress,
  scoreAddress,
  matchChains,
  matchAddress,
  matchPublicKey,
} from './identification';

// =============================================================================
// Input Analysis
// =============================================================================

export {
  extractCharacteristics,
  classifyInput,
  couldBeAddress,
  publicKeyPossibilities,
  signatureFromCharacteristics,
  signatureFromFormat,
  signatureMatches,
} from './input';
export type { CategorySignature } from './input';

// =============================================================================
// Registry
// =============================================================================

export {
  ChainRegistry,
  BundledDefinitionLoader,
  InMemoryDefinitionLoader,
  convertChainConfig,
  addressFormatsForPipeline,
  parseChainConfig,
  parseCurveDefinition,
  parseMetadataIndex,
  validateRawAddress,
  validateDefinitions,
} from './registry';
export type {
  ChainRegistryConfig,
  SkippedDefinition,
  DefinitionLoader,
  DefinitionIssue,
} from './registry';

// =============================================================================
// Derivation Pipelines
// =============================================================================

export { executePipeline, isKnownPipeline, PIPELINES } from './pipelines';
export type { AddressPipeline } from './pipelines';

// =============================================================================
// Codecs & Hashing
// =============================================================================

export {
  base58Encode,
  base58Decode,
  base58CheckEncode,
  base58CheckDecode,
  bech32Encode,
  bech32Decode,
  encodeBech32Bytes,
  decodeBech32Bytes,
  convertBits,
  toChecksumAddress,
  eip55State,
  isValidEip55,
  ss58Encode,
  ss58Decode,
  sha256,
  doubleSha256,
  keccak256,
  sha3_256,
  hash160,
  blake2b256,
  blake2b512,
  decompressPublicKey,
} from './core';
export type { Bech32Variant, Eip55State } from './core';

// =============================================================================
// Types
// =============================================================================

export { IdentifyError } from './types';
export type {
  IdentifyErrorCode,
  IdentificationCandidate,
  InputType,
  InputCharacteristics,
  InputPossibility,
  AddressPossibility,
  PublicKeyPossibility,
  EncodingType,
  CharSet,
  EntropyClass,
  ChecksumType,
  KeyType,
  Network,
  LengthRange,
  AddressMetadata,
  PublicKeyMetadata,
  ChainMetadata,
  ChainConfig,
  CurveDefinition,
  MetadataIndex,
  PipelineParams,
  PipelineBinding,
  ChainMatch,
  AddressMatch,
  PublicKeyMatch,
  Logger,
  LogLevel,
} from './types';

export * from './constants';
