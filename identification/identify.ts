/**
 * Identification
 *
 * Extract → Classify → Match → detect or derive per match → rank.
 * A failed match only drops that candidate; the call fails only when no
 * candidate survives.
 */

import { CONFIDENCE } from '../constants';
import { classifyInput } from '../input/classifier';
import { extractCharacteristics } from '../input/characteristics';
import { executePipeline } from '../pipelines';
import { ChainRegistry } from '../registry/ChainRegistry';
import { validateRawAddress } from '../registry/metadata';
import { IdentifyError } from '../types';
import type { IdentificationCandidate, PublicKeyMatch } from '../types';
import { detectAddress, normalizeAddress } from './address-detector';
import { matchChains } from './matcher';

/**
 * Derive the chain's address from the key and confirm the chain accepts it
 * @throws IdentifyError from the pipeline, or ENCODING_ERROR when no address format accepts the result
 */
export function deriveCandidate(match: PublicKeyMatch): IdentificationCandidate {
  const { chain, possibility, pipeline } = match;
  const address = executePipeline(pipeline, possibility.keyBytes, match.params);

  const derivedChars = extractCharacteristics(address);
  const format = chain.addressFormats.find((f) => validateRawAddress(f, address, derivedChars));
  if (!format) {
    throw new IdentifyError(
      `Pipeline "${pipeline}" produced "${address}", which no ${chain.name} address format accepts`,
      'ENCODING_ERROR',
    );
  }

  const form = possibility.keyType === 'secp256k1'
    ? `${possibility.compressed ? 'compressed' : 'uncompressed'} secp256k1`
    : possibility.keyType;
  const declared = match.declaredFormat ? `, matches declared ${match.declaredFormat.encoding} key format` : '';

  return {
    inputType: 'publicKey',
    chain: chain.id,
    encoding: format.encoding,
    normalized: normalizeAddress(address, format),
    confidence: CONFIDENCE.PUBLIC_KEY_DERIVED,
    reasoning: `${form} public key; derived ${chain.name} address via ${pipeline} pipeline${declared}`,
    pipeline,
  };
}

/**
 * Identify every chain an address or public key could belong to, best first
 * @throws IdentifyError INVALID_INPUT when the input is malformed or nothing matches
 */
export function identify(
  input: string,
  registry: ChainRegistry = ChainRegistry.getInstance(),
): IdentificationCandidate[] {
  const chars = extractCharacteristics(input);
  const possibilities = classifyInput(input, chars);
  const matches = matchChains(input, chars, possibilities, registry);

  const candidates: IdentificationCandidate[] = [];
  for (const match of matches) {
    try {
      candidates.push(match.kind === 'address' ? detectAddress(match, input, chars) : deriveCandidate(match));
    } catch (error) {
      if (!(error instanceof IdentifyError)) throw error;
      // A derived address the chain rejects is a pipeline defect, not bad input
      const level = match.kind === 'publicKey' && error.code === 'ENCODING_ERROR' ? 'warn' : 'debug';
      registry.log(level, `Discarded ${match.kind} candidate for ${match.chain.id}: ${error.message}`, error.code);
    }
  }

  if (candidates.length === 0) {
    throw new IdentifyError(`Invalid input: no chain matched "${input}"`, 'INVALID_INPUT');
  }

  // Array.prototype.sort is stable, so equal scores keep registry order
  return candidates.sort((a, b) => b.confidence - a.confidence);
}

/**
 * Like `identify`, but returns null instead of throwing for unrecognized input
 */
export function identifyOrNull(
  input: string,
  registry: ChainRegistry = ChainRegistry.getInstance(),
): IdentificationCandidate[] | null {
  try {
    return identify(input, registry);
  } catch (error) {
    if (error instanceof IdentifyError && error.code === 'INVALID_INPUT') return null;
    throw error;
  }
}
