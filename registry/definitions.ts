/**
 * Definition Parsing
 * Validates raw loader output into typed chain, curve and index definitions
 */

import { IdentifyError } from '../types';
import type {
  ChainConfig,
  CurveDefinition,
  MetadataIndex,
  PipelineBinding,
  PipelineParams,
  PublicKeyFormatDefinition,
} from '../types';

// =============================================================================
// Guards
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

function fail(what: string, reason: string): never {
  throw new IdentifyError(`Invalid ${what}: ${reason}`, 'DEFINITION_ERROR');
}

function requireString(record: Record<string, unknown>, key: string, what: string): string {
  const value = record[key];
  if (typeof value !== 'string' || value.length === 0) {
    fail(what, `"${key}" must be a non-empty string`);
  }
  return value;
}

function optionalParams(record: Record<string, unknown>, key: string, what: string): PipelineParams {
  const value = record[key];
  if (value === undefined) return {};
  if (!isRecord(value)) fail(what, `"${key}" must be an object`);
  return value;
}

// =============================================================================
// Chain
// =============================================================================

function parsePublicKeyFormat(value: unknown, what: string): PublicKeyFormatDefinition {
  if (!isRecord(value)) fail(what, 'public key format must be an object');

  const encoding = requireString(value, 'encoding', what);
  const prefixes = value.prefixes ?? [];
  if (!isStringArray(prefixes)) fail(what, '"prefixes" must be a string array');

  const exact = value.exact_length;
  let exactLength: number | undefined;
  if (exact !== undefined) {
    if (typeof exact !== 'number') fail(what, '"exact_length" must be a number');
    exactLength = exact;
  }

  const range = value.length_range;
  let lengthRange: [number, number] | undefined;
  if (range !== undefined) {
    if (!isNumberArray(range) || range.length !== 2) fail(what, '"length_range" must be [min, max]');
    lengthRange = [range[0], range[1]];
  }

  return { encoding, exact_length: exactLength, length_range: lengthRange, prefixes };
}

function parsePipelineBinding(value: unknown, what: string): PipelineBinding {
  if (!isRecord(value)) fail(what, 'additional pipeline must be an object');
  return {
    pipeline: requireString(value, 'pipeline', what),
    params: optionalParams(value, 'params', what),
  };
}

export function parseChainConfig(raw: unknown): ChainConfig {
  if (!isRecord(raw)) fail('chain definition', 'expected an object');
  const id = requireString(raw, 'id', 'chain definition');
  const what = `chain definition "${id}"`;

  const stakeKey = raw.requires_stake_key ?? false;
  if (typeof stakeKey !== 'boolean') fail(what, '"requires_stake_key" must be a boolean');

  const formats = raw.public_key_formats ?? [];
  if (!Array.isArray(formats)) fail(what, '"public_key_formats" must be an array');

  const additional = raw.additional_pipelines ?? [];
  if (!Array.isArray(additional)) fail(what, '"additional_pipelines" must be an array');

  return {
    id,
    name: requireString(raw, 'name', what),
    curve: requireString(raw, 'curve', what),
    address_pipeline: requireString(raw, 'address_pipeline', what),
    address_params: optionalParams(raw, 'address_params', what),
    requires_stake_key: stakeKey,
    additional_pipelines: additional.map((b: unknown) => parsePipelineBinding(b, what)),
    public_key_formats: formats.map((f: unknown) => parsePublicKeyFormat(f, what)),
  };
}

// =============================================================================
// Curve & Index
// =============================================================================

export function parseCurveDefinition(raw: unknown): CurveDefinition {
  if (!isRecord(raw)) fail('curve definition', 'expected an object');
  const id = requireString(raw, 'id', 'curve definition');
  const what = `curve definition "${id}"`;

  const keyLengths = raw.key_lengths;
  if (!isNumberArray(keyLengths)) fail(what, '"key_lengths" must be a number array');

  const compression = raw.compression ?? false;
  if (typeof compression !== 'boolean') fail(what, '"compression" must be a boolean');

  const pipelines = raw.compatible_pipelines;
  if (!isStringArray(pipelines)) fail(what, '"compatible_pipelines" must be a string array');

  return { id, key_lengths: keyLengths, compression, compatible_pipelines: pipelines };
}

export function parseMetadataIndex(raw: unknown): MetadataIndex {
  const what = 'metadata index';
  if (!isRecord(raw)) fail(what, 'expected an object');

  const { curves, chains, pipelines } = raw;
  if (!isStringArray(curves)) fail(what, '"curves" must be a string array');
  if (!isStringArray(chains)) fail(what, '"chains" must be a string array');

  const addresses = isRecord(pipelines) ? pipelines.addresses : undefined;
  if (!isStringArray(addresses)) fail(what, '"pipelines.addresses" must be a string array');

  return { curves, chains, pipelines: { addresses } };
}
