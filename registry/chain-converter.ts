/**
 * Chain Converter
 * Turns a chain definition into the address and public-key format metadata
 * the matcher works from.
 */

import {
  BECH32_MAX_LENGTH,
  DEFAULT_HRPS,
  DEFAULT_P2SH_VERSION_BYTE,
  DEFAULT_SS58_PREFIX,
  DEFAULT_VERSION_BYTE,
  TRON_VERSION_BYTE,
} from '../constants';
import { numberParam, stringListParam, stringParam } from '../pipelines/params';
import { IdentifyError } from '../types';
import type {
  AddressMetadata,
  ChainConfig,
  ChainMetadata,
  CharSet,
  EncodingType,
  KeyType,
  PipelineParams,
  PublicKeyFormatDefinition,
  PublicKeyMetadata,
} from '../types';

// =============================================================================
// Lookups
// =============================================================================

const ENCODINGS: readonly EncodingType[] = ['hex', 'base58', 'base58check', 'bech32', 'bech32m', 'ss58'];

const KEY_TYPES: readonly KeyType[] = ['secp256k1', 'ed25519', 'sr25519'];

export function parseEncoding(value: string): EncodingType | undefined {
  return ENCODINGS.find((e) => e === value);
}

export function parseKeyType(value: string): KeyType | undefined {
  return KEY_TYPES.find((k) => k === value);
}

function charSetFor(encoding: EncodingType): CharSet | undefined {
  switch (encoding) {
    case 'hex':
      return 'hex';
    case 'base58':
    case 'base58check':
    case 'ss58':
      return 'base58';
    case 'bech32':
    case 'bech32m':
      return 'base32';
  }
}

// =============================================================================
// Address Formats
// =============================================================================

function format(encoding: EncodingType, fields: Partial<AddressMetadata>): AddressMetadata {
  return {
    encoding,
    charSet: charSetFor(encoding),
    prefixes: [],
    hrps: [],
    versionBytes: [],
    ss58Prefixes: [],
    network: 'mainnet',
    ...fields,
  };
}

/**
 * Address formats produced by a pipeline, or undefined for an unknown pipeline id
 */
export function addressFormatsForPipeline(
  pipeline: string,
  params: PipelineParams,
): AddressMetadata[] | undefined {
  switch (pipeline) {
    case 'evm':
      return [format('hex', { exactLength: 42, prefixes: ['0x'], checksum: 'eip55' })];

    case 'bitcoin_p2pkh': {
      const version = numberParam(params, 'version_byte', DEFAULT_VERSION_BYTE);
      const p2sh = numberParam(params, 'p2sh_version_byte')
        ?? (version === DEFAULT_VERSION_BYTE ? DEFAULT_P2SH_VERSION_BYTE : undefined);
      const formats = [
        format('base58check', {
          lengthRange: { min: 26, max: 35 },
          versionBytes: [version],
          checksum: 'base58check',
        }),
      ];
      if (p2sh !== undefined) {
        formats.push(format('base58check', {
          lengthRange: { min: 26, max: 35 },
          versionBytes: [p2sh],
          checksum: 'base58check',
        }));
      }
      return formats;
    }

    case 'bitcoin_bech32': {
      const hrp = stringParam(params, 'hrp', DEFAULT_HRPS.bitcoin_bech32);
      return [
        format('bech32', { lengthRange: { min: 14, max: 74 }, hrps: [hrp], checksum: 'bech32' }),
        // Taproot outputs
        format('bech32m', { lengthRange: { min: 14, max: 74 }, hrps: [hrp], checksum: 'bech32m' }),
      ];
    }

    case 'cosmos':
      return [format('bech32', {
        lengthRange: { min: 20, max: 90 },
        hrps: stringListParam(params, 'hrp', 'hrps', [DEFAULT_HRPS.cosmos]),
        checksum: 'bech32',
      })];

    case 'cardano':
      return [format('bech32', {
        lengthRange: { min: 50, max: BECH32_MAX_LENGTH },
        hrps: stringListParam(params, 'hrp', 'hrps', [DEFAULT_HRPS.cardano]),
        checksum: 'bech32',
      })];

    case 'solana':
      return [format('base58', { lengthRange: { min: 32, max: 44 } })];

    case 'ss58':
      return [format('ss58', {
        lengthRange: { min: 35, max: 50 },
        ss58Prefixes: [numberParam(params, 'prefix', DEFAULT_SS58_PREFIX)],
        checksum: 'ss58',
      })];

    case 'tron':
      return [format('base58check', {
        exactLength: 34,
        versionBytes: [TRON_VERSION_BYTE],
        checksum: 'base58check',
      })];

    default:
      return undefined;
  }
}

// =============================================================================
// Public Key Formats
// =============================================================================

function convertPublicKeyFormat(
  chainId: string,
  definition: PublicKeyFormatDefinition,
  keyType: KeyType,
): PublicKeyMetadata {
  const encoding = parseEncoding(definition.encoding);
  if (!encoding) {
    throw new IdentifyError(
      `Chain "${chainId}" declares unknown public key encoding "${definition.encoding}"`,
      'DEFINITION_ERROR',
    );
  }
  const range = definition.length_range;
  return {
    encoding,
    charSet: encoding === 'hex' || encoding === 'base58' ? encoding : undefined,
    exactLength: definition.exact_length,
    lengthRange: range ? { min: range[0], max: range[1] } : undefined,
    prefixes: definition.prefixes,
    hrps: [],
    keyType,
  };
}

// =============================================================================
// Conversion
// =============================================================================

/**
 * Build frozen chain metadata from a definition
 * @throws IdentifyError DEFINITION_ERROR for an unknown curve, pipeline or encoding
 */
export function convertChainConfig(config: ChainConfig): ChainMetadata {
  const curve = parseKeyType(config.curve);
  if (!curve) {
    throw new IdentifyError(`Chain "${config.id}" uses unknown curve "${config.curve}"`, 'DEFINITION_ERROR');
  }

  const bindings = [
    { pipeline: config.address_pipeline, params: config.address_params },
    ...config.additional_pipelines,
  ];
  const addressFormats: AddressMetadata[] = [];
  for (const binding of bindings) {
    const formats = addressFormatsForPipeline(binding.pipeline, binding.params);
    if (!formats) {
      throw new IdentifyError(
        `Chain "${config.id}" uses unknown pipeline "${binding.pipeline}"`,
        'DEFINITION_ERROR',
      );
    }
    addressFormats.push(...formats);
  }

  const publicKeyFormats = config.public_key_formats.map((def) =>
    Object.freeze(convertPublicKeyFormat(config.id, def, curve)));

  return Object.freeze({
    id: config.id,
    name: config.name,
    curve,
    addressFormats: Object.freeze(addressFormats.map((f) => Object.freeze(f))),
    publicKeyFormats: Object.freeze(publicKeyFormats),
  });
}
